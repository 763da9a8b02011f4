import { copyFile, mkdir, readdir, rename, stat, unlink } from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import { storedPlatformStatusSchema, trackingEntrySchema, trackingFileSchema } from '../schemas/records.js';
import type { StoredPlatformStatus } from '../schemas/records.js';
import { PLATFORM_IDS } from '../types/upload.js';
import type {
  PlatformId,
  PlatformStatus,
  PlatformStatusMap,
  TrackingRecords,
  VideoAsset
} from '../types/upload.js';
import { errorMessage } from '../utils/errors.js';
import { atomicWriteJson, isErrnoException, readJsonFile } from '../utils/json-file.js';

export interface MarkUploadedDetails {
  remoteId?: string;
  scheduledTime?: string;
  /** Present when the attempt failed. */
  error?: string;
}

export interface UploadSummary {
  totalVideos: number;
  perPlatform: Record<PlatformId, number>;
  deliveredToAll: number;
}

function toDomainStatus(stored: StoredPlatformStatus): PlatformStatus {
  return {
    uploaded: stored.uploaded,
    uploadedAt: stored.uploaded_at ?? undefined,
    remoteId: stored.video_id ?? undefined,
    scheduledTime: stored.scheduled_time ?? undefined,
    error: stored.error ?? undefined
  };
}

function toStoredStatus(status: PlatformStatus): StoredPlatformStatus {
  return {
    uploaded: status.uploaded,
    uploaded_at: status.uploadedAt ?? null,
    video_id: status.remoteId ?? null,
    scheduled_time: status.scheduledTime ?? null,
    error: status.error ?? null
  };
}

/**
 * True when every platform in `platforms` is marked uploaded for `filename`.
 * Vacuously true for an empty platform list.
 */
export function isUploadedToAllIn(records: TrackingRecords, filename: string, platforms: readonly PlatformId[]): boolean {
  const statuses = records[filename] ?? {};
  return platforms.every((platform) => statuses[platform]?.uploaded === true);
}

function isPlatformId(key: string): key is PlatformId {
  return PLATFORM_IDS.some((platform) => platform === key);
}

function compareFilenames(a: VideoAsset, b: VideoAsset): number {
  if (a.filename < b.filename) return -1;
  if (a.filename > b.filename) return 1;
  return 0;
}

/**
 * Per-file, per-platform delivery status, persisted as one JSON object.
 * This class is the only writer of the tracking file.
 */
export class UploadTracker {
  constructor(
    private readonly filePath: string,
    private readonly sentDir: string,
    private readonly logger: Logger
  ) {}

  /**
   * Never throws: an absent or unreadable file is an empty record set. Entries
   * that do not validate are dropped one by one, the rest are kept.
   */
  async load(): Promise<TrackingRecords> {
    const stored = await this.readStored();
    const records: TrackingRecords = {};
    for (const [filename, platforms] of Object.entries(stored)) {
      const statuses: PlatformStatusMap = {};
      for (const platform of PLATFORM_IDS) {
        if (!(platform in platforms)) continue;
        const status = storedPlatformStatusSchema.safeParse(platforms[platform]);
        if (status.success) {
          statuses[platform] = toDomainStatus(status.data);
        } else {
          this.logger.warn({ filename, platform }, 'Dropping malformed tracking entry');
        }
      }
      records[filename] = statuses;
    }
    return records;
  }

  /**
   * Resolves false (after logging a warning) when the file could not be written.
   * Keys for platforms this version does not know are carried over from disk.
   */
  async save(records: TrackingRecords): Promise<boolean> {
    const previous = await this.readStored({ quiet: true });
    const stored: Record<string, Record<string, unknown>> = {};
    for (const [filename, statuses] of Object.entries(records)) {
      const entry: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(previous[filename] ?? {})) {
        if (!isPlatformId(key)) entry[key] = value;
      }
      for (const platform of PLATFORM_IDS) {
        const status = statuses[platform];
        if (status) entry[platform] = toStoredStatus(status);
      }
      stored[filename] = entry;
    }

    try {
      await atomicWriteJson(this.filePath, stored);
      return true;
    } catch (error) {
      this.logger.warn({ file: this.filePath, error: errorMessage(error) }, 'Could not save tracking data');
      return false;
    }
  }

  async getStatus(filename: string): Promise<PlatformStatusMap> {
    const records = await this.load();
    return records[filename] ?? {};
  }

  /**
   * Replace the status object of one platform. Without `error` the platform is
   * marked uploaded; with it, marked failed and the message kept.
   */
  async markUploaded(filename: string, platform: PlatformId, details: MarkUploadedDetails = {}): Promise<PlatformStatus> {
    const records = await this.load();
    const status: PlatformStatus = {
      uploaded: details.error === undefined,
      uploadedAt: new Date().toISOString(),
      remoteId: details.remoteId,
      scheduledTime: details.scheduledTime,
      error: details.error
    };
    records[filename] = { ...(records[filename] ?? {}), [platform]: status };
    await this.save(records);
    return status;
  }

  /** Vacuously true for an empty platform list. */
  async isUploadedToAll(filename: string, platforms: readonly PlatformId[]): Promise<boolean> {
    return isUploadedToAllIn(await this.load(), filename, platforms);
  }

  /** Relocation gate: same rule as isUploadedToAll. */
  async shouldMoveToSent(filename: string, platforms: readonly PlatformId[]): Promise<boolean> {
    return this.isUploadedToAll(filename, platforms);
  }

  /**
   * Video files in `directory` not yet uploaded to every platform, sorted by
   * filename so the same directory contents always yield the same order.
   */
  async getPendingVideos(
    directory: string,
    platforms: readonly PlatformId[],
    extensions: readonly string[]
  ): Promise<VideoAsset[]> {
    const records = await this.load();
    const videos = await this.scanVideos(directory, extensions);
    return videos.filter((video) => !isUploadedToAllIn(records, video.filename, platforms));
  }

  /** Resolves false when the file stays where it is; tracking is never touched. */
  async relocate(asset: VideoAsset): Promise<boolean> {
    const target = path.join(this.sentDir, asset.filename);
    try {
      await mkdir(this.sentDir, { recursive: true });
      try {
        await rename(asset.path, target);
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EXDEV') throw error;
        await copyFile(asset.path, target);
        await unlink(asset.path);
      }
      this.logger.info({ filename: asset.filename, target }, 'Moved to sent folder');
      return true;
    } catch (error) {
      this.logger.warn(
        { filename: asset.filename, error: errorMessage(error) },
        'Could not move file to sent folder, will retry next run'
      );
      return false;
    }
  }

  /**
   * Relocate every file still in `directory` that is already tracked as
   * delivered to all `platforms`, e.g. after an earlier relocation failed or a
   * status was completed out of band.
   */
  async relocateDelivered(
    directory: string,
    platforms: readonly PlatformId[],
    extensions: readonly string[]
  ): Promise<string[]> {
    const records = await this.load();
    const videos = await this.scanVideos(directory, extensions);
    const moved: string[] = [];
    for (const video of videos) {
      if (!isUploadedToAllIn(records, video.filename, platforms)) continue;
      if (await this.relocate(video)) moved.push(video.filename);
    }
    return moved;
  }

  async getSummary(platforms: readonly PlatformId[] = PLATFORM_IDS): Promise<UploadSummary> {
    const records = await this.load();
    const filenames = Object.keys(records);
    const uploadedTo = (platform: PlatformId) =>
      filenames.filter((filename) => records[filename]?.[platform]?.uploaded === true).length;

    return {
      totalVideos: filenames.length,
      perPlatform: { youtube: uploadedTo('youtube'), tiktok: uploadedTo('tiktok') },
      deliveredToAll: filenames.filter((filename) => isUploadedToAllIn(records, filename, platforms)).length
    };
  }

  /** Raw per-filename objects from disk; anything else is skipped. */
  private async readStored(options: { quiet?: boolean } = {}): Promise<Record<string, Record<string, unknown>>> {
    const warn = (context: object, message: string) => {
      if (!options.quiet) this.logger.warn(context, message);
    };

    let raw: unknown;
    try {
      raw = await readJsonFile(this.filePath);
    } catch (error) {
      warn({ file: this.filePath, error: errorMessage(error) }, 'Tracking file unreadable, starting empty');
      return {};
    }
    if (raw === null) return {};

    const parsed = trackingFileSchema.safeParse(raw);
    if (!parsed.success) {
      warn({ file: this.filePath }, 'Tracking file is not an object, starting empty');
      return {};
    }

    const entries: Record<string, Record<string, unknown>> = {};
    for (const [filename, value] of Object.entries(parsed.data)) {
      const entry = trackingEntrySchema.safeParse(value);
      if (entry.success) {
        entries[filename] = entry.data;
      } else {
        warn({ filename }, 'Skipping tracking record that is not an object');
      }
    }
    return entries;
  }

  private async scanVideos(directory: string, extensions: readonly string[]): Promise<VideoAsset[]> {
    const allowed = new Set(extensions.map((ext) => ext.toLowerCase()));
    const entries = await readdir(directory, { withFileTypes: true }).catch((error: unknown) => {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw error;
    });

    const videos: VideoAsset[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      if (!allowed.has(path.extname(entry.name).toLowerCase())) continue;
      const fullPath = path.join(directory, entry.name);
      const info = await stat(fullPath);
      videos.push({ path: fullPath, filename: entry.name, sizeBytes: info.size });
    }
    return videos.sort(compareFilenames);
  }
}
