import path from 'path';
import type { Logger } from 'pino';
import type { ZodError } from 'zod';
import { configFileSchema } from '../schemas/config.js';
import type { Weekday } from '../schemas/config.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { readJsonFile } from '../utils/json-file.js';

export interface InstallationPaths {
  rootDir: string;
  clipsDir: string;
  sentDir: string;
  logsDir: string;
  trackingFile: string;
  historyFile: string;
  errorLogFile: string;
  lockFile: string;
  backupDir: string;
  configFile: string;
  youtubeClientSecretsFile: string;
  youtubeTokenFile: string;
  tiktokClientSecretsFile: string;
  tiktokTokenFile: string;
}

export function resolveInstallationPaths(rootDir: string = process.env.BULK_UPLOADER_HOME || process.cwd()): InstallationPaths {
  const root = path.resolve(rootDir);
  const logsDir = path.join(root, 'logs');
  return {
    rootDir: root,
    clipsDir: path.join(root, 'clips'),
    sentDir: path.join(root, 'sent'),
    logsDir,
    trackingFile: path.join(logsDir, 'upload_tracking.json'),
    historyFile: path.join(logsDir, 'upload_history.json'),
    errorLogFile: path.join(logsDir, 'error_log.txt'),
    lockFile: path.join(root, '.script.lock'),
    backupDir: path.join(root, 'backups'),
    configFile: path.join(root, 'config.json'),
    youtubeClientSecretsFile: path.join(root, 'client_secret.json'),
    youtubeTokenFile: path.join(root, 'token.json'),
    tiktokClientSecretsFile: path.join(root, 'tiktok_client_secret.json'),
    tiktokTokenFile: path.join(root, 'tiktok_token.json')
  };
}

export type PrivacyStatus = 'private' | 'unlisted' | 'public';

export type TikTokPrivacyLevel =
  | 'PUBLIC_TO_EVERYONE'
  | 'MUTUAL_FOLLOW_FRIENDS'
  | 'FOLLOWER_OF_CREATOR'
  | 'SELF_ONLY';

export interface Settings {
  defaultTimezone: string;
  defaultHourSlots: number[];
  defaultCategoryId: string;
  /** Lowercase, dot-prefixed. */
  videoExtensions: string[];
  privacyStatus: PrivacyStatus;
  tiktokPrivacyLevel: TikTokPrivacyLevel;
  description: string;
  tags: string[];
  schedule: {
    mode: 'daily' | 'weekly';
    weekday: Weekday;
    hour: number;
  };
  playlist: {
    id: string | null;
    create: boolean;
    title: string;
  };
  chunkSizeBytes: number;
}

export const DEFAULT_CHUNK_SIZE_BYTES = 5 * 1024 * 1024;

// YouTube accepts chunk sizes that are multiples of 256KB; TikTok has no such rule.
const CHUNK_UNIT_BYTES = 256 * 1024;

function chunkSizeFromMegabytes(mb: number | undefined): number {
  if (mb === undefined || !Number.isFinite(mb)) return DEFAULT_CHUNK_SIZE_BYTES;
  const raw = Math.max(1, Math.min(64, mb)) * 1024 * 1024;
  return Math.floor(raw / CHUNK_UNIT_BYTES) * CHUNK_UNIT_BYTES;
}

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

function formatZodIssues(error: ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/** Validate a raw config object (already parsed JSON) into settings. */
export function parseSettings(raw: unknown, configPath = 'config.json'): Settings {
  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration in ${configPath}: ${formatZodIssues(parsed.error)}`);
  }
  const cfg = parsed.data;
  const envChunkMb = process.env.YOUTUBE_UPLOAD_CHUNK_MB ? Number(process.env.YOUTUBE_UPLOAD_CHUNK_MB) : undefined;

  return {
    defaultTimezone: cfg.default_timezone,
    defaultHourSlots: cfg.default_hour_slots,
    defaultCategoryId: cfg.default_category_id,
    videoExtensions: [...new Set(cfg.video_extensions.map(normalizeExtension))],
    privacyStatus: cfg.privacy_status,
    tiktokPrivacyLevel: cfg.tiktok_privacy_level,
    description: cfg.description,
    tags: cfg.tags,
    schedule: {
      mode: cfg.schedule_mode,
      weekday: cfg.schedule_day,
      hour: cfg.schedule_hour
    },
    playlist: {
      id: cfg.playlist_id ?? null,
      create: cfg.create_playlist,
      title: cfg.playlist_title
    },
    chunkSizeBytes: chunkSizeFromMegabytes(cfg.chunk_size_mb ?? envChunkMb)
  };
}

/**
 * Load config.json. A missing or unparseable file falls back to the defaults
 * with a warning; a file that parses but holds invalid values is a
 * ConfigurationError.
 */
export async function loadSettings(configPath: string, logger: Logger): Promise<Settings> {
  let raw: unknown = null;
  try {
    raw = await readJsonFile(configPath);
  } catch (error) {
    logger.warn({ configPath, error: errorMessage(error) }, 'Could not read configuration, using defaults');
    raw = null;
  }
  return parseSettings(raw, configPath);
}
