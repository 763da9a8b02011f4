import { appendFile, mkdir } from 'fs/promises';
import path from 'path';
import { DateTime } from 'luxon';
import type { Logger } from 'pino';
import { historyEntrySchema } from '../schemas/records.js';
import type { ExecutionSummaryEntry, HistoryEntry, PlatformId, UploadAttemptEntry } from '../types/upload.js';
import { errorMessage } from '../utils/errors.js';
import { formatDuration, formatFileSize, formatSpeed } from '../utils/format.js';
import { atomicWriteJson, readJsonFile } from '../utils/json-file.js';

export interface BackupSource {
  /** Backup file is `<name>_backup.json`. */
  name: string;
  path: string;
}

export interface AttemptDetails {
  filename: string;
  platform: PlatformId;
  remoteId: string | null;
  scheduledTime: DateTime;
  fileSizeBytes: number;
  uploadTimeSeconds: number;
  speedBytesPerSecond: number;
  error?: string;
  now?: Date;
}

export interface RunTotals {
  platforms: PlatformId[];
  totalVideos: number;
  successful: number;
  failed: number;
  stopReason: string | null;
  totalBytes: number;
  totalSeconds: number;
  now?: Date;
  /** Zone for `execution_date`; the machine's zone when omitted. */
  zone?: string;
}

export function buildAttemptEntry(details: AttemptDetails): UploadAttemptEntry {
  return {
    type: 'upload',
    timestamp: (details.now ?? new Date()).toISOString(),
    filename: details.filename,
    platform: details.platform,
    video_id: details.remoteId,
    scheduled_time: details.scheduledTime.toISO() ?? '',
    scheduled_time_readable: details.scheduledTime.toFormat('yyyy-MM-dd HH:mm:ss ZZZZ'),
    file_size_bytes: details.fileSizeBytes,
    file_size_readable: formatFileSize(details.fileSizeBytes),
    upload_time_seconds: details.uploadTimeSeconds,
    upload_time_readable: formatDuration(details.uploadTimeSeconds),
    upload_speed_bytes_per_second: details.speedBytesPerSecond,
    upload_speed_readable: formatSpeed(details.speedBytesPerSecond),
    status: details.error === undefined ? 'success' : 'failed',
    error_message: details.error ?? null
  };
}

export function buildRunSummary(totals: RunTotals): ExecutionSummaryEntry {
  const now = totals.now ?? new Date();
  const averageSpeed = totals.totalSeconds > 0 ? totals.totalBytes / totals.totalSeconds : 0;
  return {
    type: 'execution_summary',
    execution_timestamp: now.toISOString(),
    execution_date: DateTime.fromJSDate(now, { zone: totals.zone ?? 'system' }).toFormat('yyyy-MM-dd HH:mm:ss'),
    platforms: totals.platforms,
    total_videos: totals.totalVideos,
    successful_uploads: totals.successful,
    failed_uploads: totals.failed,
    stopped_early: totals.stopReason !== null,
    stop_reason: totals.stopReason,
    total_uploaded_size_bytes: totals.totalBytes,
    total_uploaded_size_readable: formatFileSize(totals.totalBytes),
    total_upload_time_seconds: totals.totalSeconds,
    total_upload_time_readable: formatDuration(totals.totalSeconds),
    average_speed_bytes_per_second: averageSpeed,
    average_speed_readable: formatSpeed(averageSpeed)
  };
}

/**
 * Append-only ledger of upload attempts and run summaries, plus JSON-lines
 * snapshots of the installation's state files.
 */
export class UploadHistory {
  constructor(
    private readonly filePath: string,
    private readonly backupDir: string,
    private readonly logger: Logger
  ) {}

  /** Entries that match a known shape; a missing or corrupt file is empty. */
  async list(): Promise<HistoryEntry[]> {
    const raw = await this.readRaw();
    const entries: HistoryEntry[] = [];
    for (const item of raw) {
      const parsed = historyEntrySchema.safeParse(item);
      if (parsed.success) entries.push(parsed.data);
    }
    return entries;
  }

  /** Entries written by older versions are kept as they are. */
  async append(entry: HistoryEntry): Promise<boolean> {
    const raw = await this.readRaw();
    raw.push(entry);
    try {
      await atomicWriteJson(this.filePath, raw);
      return true;
    } catch (error) {
      this.logger.warn({ file: this.filePath, error: errorMessage(error) }, 'Could not save upload history');
      return false;
    }
  }

  async backupSnapshot(sources: readonly BackupSource[], now: Date = new Date()): Promise<string[]> {
    const written: string[] = [];
    try {
      await mkdir(this.backupDir, { recursive: true });
    } catch (error) {
      this.logger.warn({ backupDir: this.backupDir, error: errorMessage(error) }, 'Failed to create backup directory');
      return written;
    }

    const timestamp = now.toISOString();
    for (const source of sources) {
      const backupPath = path.join(this.backupDir, `${source.name}_backup.json`);
      try {
        const data = await readJsonFile(source.path);
        if (data === null) continue;
        await appendFile(backupPath, `${JSON.stringify({ timestamp, data })}\n`, 'utf-8');
        written.push(backupPath);
      } catch (error) {
        this.logger.warn({ source: source.path, error: errorMessage(error) }, `Failed to backup ${source.name}`);
      }
    }
    return written;
  }

  private async readRaw(): Promise<unknown[]> {
    try {
      const raw = await readJsonFile(this.filePath);
      return Array.isArray(raw) ? raw : [];
    } catch (error) {
      this.logger.warn({ file: this.filePath, error: errorMessage(error) }, 'Upload history unreadable, starting empty');
      return [];
    }
  }
}
