import path from 'path';
import { DateTime } from 'luxon';
import type { Logger } from 'pino';
import type { InstallationPaths, Settings } from '../config/settings.js';
import { uploadRequestSchema } from '../schemas/config.js';
import type { UploadRunRequest, ValidatedUploadRunRequest } from '../schemas/config.js';
import { assertValidTimezone, computePublishTime, parseStartDate, validateHourSlots } from '../services/publish-scheduler.js';
import type { ScheduleSpec } from '../services/publish-scheduler.js';
import { RunLock } from '../services/run-lock.js';
import { sanitizeTitle } from '../services/title-sanitizer.js';
import { classifyHttpFailure } from '../services/transfer/error-signatures.js';
import type { TransferClientFactory } from '../services/transfer/index.js';
import { findRelatedFiles } from '../services/transfer/related-files.js';
import { planSchedule } from '../services/transfer/schedule-window.js';
import type { TransferClient } from '../services/transfer/types.js';
import { UploadHistory, buildAttemptEntry, buildRunSummary } from '../services/upload-history.js';
import { UploadTracker } from '../services/upload-tracker.js';
import type { PlatformId, VideoAsset } from '../types/upload.js';
import {
  AlreadyRunningError,
  AuthenticationError,
  ConfigurationError,
  TransferError,
  errorMessage
} from '../utils/errors.js';
import { formatDuration, formatFileSize, formatSpeed } from '../utils/format.js';

export const EXIT_CODES = {
  success: 0,
  configError: 1,
  alreadyRunning: 2,
  authFailure: 3,
  stoppedEarly: 4
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

export interface UploadPreview {
  index: number;
  filename: string;
  title: string;
  titleWarnings: string[];
  sizeBytes: number;
  /** ISO timestamp in the run's timezone. */
  publishTime: string;
  hasSubtitle: boolean;
  hasThumbnail: boolean;
  /** Schedule-window problems, prefixed with the platform. */
  issues: string[];
}

export interface RunReport {
  exitCode: ExitCode;
  dryRun: boolean;
  /** Set when a configuration, lock or auth problem aborted the run. */
  error: string | null;
  /** Set when quota exhaustion or lost credentials stopped the batch. */
  stopReason: string | null;
  totalVideos: number;
  successful: number;
  failed: number;
  relocated: string[];
  previews: UploadPreview[];
  warnings: string[];
}

export interface BulkUploadRunDeps {
  paths: InstallationPaths;
  settings: Settings;
  logger: Logger;
  createClient: TransferClientFactory;
  clock?: () => DateTime;
}

interface PreparedRun {
  request: ValidatedUploadRunRequest;
  targets: PlatformId[];
  schedule: ScheduleSpec;
  startDate: DateTime;
}

interface BatchTotals {
  successful: number;
  failed: number;
  bytes: number;
  seconds: number;
}

function emptyReport(dryRun: boolean): RunReport {
  return {
    exitCode: EXIT_CODES.success,
    dryRun,
    error: null,
    stopReason: null,
    totalVideos: 0,
    successful: 0,
    failed: 0,
    relocated: [],
    previews: [],
    warnings: []
  };
}

function titleFor(asset: VideoAsset): ReturnType<typeof sanitizeTitle> {
  return sanitizeTitle(path.parse(asset.filename).name);
}

/**
 * One batch run against an installation: lock, scan, schedule, transfer,
 * record, relocate. Only one run per installation holds the lock at a time.
 */
export class BulkUploadRun {
  private readonly tracker: UploadTracker;
  private readonly history: UploadHistory;
  private readonly clock: () => DateTime;

  constructor(private readonly deps: BulkUploadRunDeps) {
    this.tracker = new UploadTracker(deps.paths.trackingFile, deps.paths.sentDir, deps.logger);
    this.history = new UploadHistory(deps.paths.historyFile, deps.paths.backupDir, deps.logger);
    this.clock = deps.clock ?? (() => DateTime.now());
  }

  async run(input: UploadRunRequest): Promise<RunReport> {
    const { logger } = this.deps;
    const report = emptyReport(input.dryRun === true);

    let prepared: PreparedRun;
    try {
      prepared = this.prepare(input);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Invalid run configuration');
      return { ...report, exitCode: EXIT_CODES.configError, error: errorMessage(error) };
    }

    let lock: RunLock;
    try {
      lock = await RunLock.acquire(this.deps.paths.lockFile);
    } catch (error) {
      if (!(error instanceof AlreadyRunningError)) throw error;
      logger.error({ holderPid: error.holderPid }, error.message);
      return { ...report, exitCode: EXIT_CODES.alreadyRunning, error: error.message };
    }

    try {
      return prepared.request.dryRun
        ? await this.preview(prepared, report)
        : await this.execute(prepared, report);
    } finally {
      await lock.release();
    }
  }

  private prepare(input: UploadRunRequest): PreparedRun {
    const parsed = uploadRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError(parsed.error.errors.map((issue) => issue.message).join('; '));
    }
    const request = parsed.data;
    assertValidTimezone(request.timezone);

    const { schedule: configured } = this.deps.settings;
    const schedule: ScheduleSpec =
      configured.mode === 'weekly'
        ? { mode: 'weekly', weekday: configured.weekday, hour: configured.hour }
        : { mode: 'daily', hourSlots: request.hourSlots };
    if (schedule.mode === 'daily') validateHourSlots(schedule.hourSlots);

    const startDate = parseStartDate(request.startDate, request.timezone, this.clock());
    const targets = [...new Set(request.targets ?? request.platforms)];
    return { request, targets, schedule, startDate };
  }

  private async preview(prepared: PreparedRun, report: RunReport): Promise<RunReport> {
    const { request, targets, schedule, startDate } = prepared;
    const { paths, settings, logger } = this.deps;
    const pending = await this.tracker.getPendingVideos(paths.clipsDir, request.platforms, settings.videoExtensions);
    const clients = targets.map((platform) => this.deps.createClient(platform, { categoryId: request.categoryId }));
    const now = this.clock();

    const previews: UploadPreview[] = [];
    for (const [index, asset] of pending.entries()) {
      const publishTime = computePublishTime(index, schedule, startDate);
      const { title, warnings } = titleFor(asset);
      const related = await findRelatedFiles(asset.path);
      const issues: string[] = [];
      for (const client of clients) {
        try {
          planSchedule(client.platform, publishTime, now, client.scheduleWindow);
        } catch (error) {
          issues.push(`${client.platform}: ${errorMessage(error)}`);
        }
      }

      previews.push({
        index,
        filename: asset.filename,
        title,
        titleWarnings: warnings,
        sizeBytes: asset.sizeBytes,
        publishTime: publishTime.toISO() ?? '',
        hasSubtitle: related.subtitle !== null,
        hasThumbnail: related.thumbnail !== null,
        issues
      });
      logger.info(
        { index: index + 1, filename: asset.filename, title, size: formatFileSize(asset.sizeBytes), publishTime: publishTime.toFormat('yyyy-MM-dd HH:mm ZZZZ'), issues },
        'Dry run: would upload'
      );
    }

    return { ...report, totalVideos: pending.length, previews };
  }

  private async execute(prepared: PreparedRun, report: RunReport): Promise<RunReport> {
    const { request, targets, schedule, startDate } = prepared;
    const { paths, settings, logger } = this.deps;
    const gating = request.platforms;

    await this.history.backupSnapshot([
      { name: 'config', path: paths.configFile },
      { name: 'history', path: paths.historyFile },
      { name: 'tracking', path: paths.trackingFile }
    ]);

    const relocated = await this.tracker.relocateDelivered(paths.clipsDir, gating, settings.videoExtensions);
    if (relocated.length > 0) {
      logger.info({ count: relocated.length }, 'Relocated previously delivered files');
    }

    const pending = await this.tracker.getPendingVideos(paths.clipsDir, gating, settings.videoExtensions);
    if (pending.length === 0) {
      logger.info({ clipsDir: paths.clipsDir }, 'No pending videos found');
      return { ...report, relocated };
    }

    const clients: TransferClient[] = [];
    for (const platform of targets) {
      const client = this.deps.createClient(platform, { categoryId: request.categoryId });
      try {
        await client.authenticate();
      } catch (error) {
        const message = error instanceof AuthenticationError ? error.message : `${platform} authentication failed: ${errorMessage(error)}`;
        logger.error({ platform, error: message }, 'Authentication failed');
        return { ...report, exitCode: EXIT_CODES.authFailure, error: message, relocated };
      }
      clients.push(client);
    }

    logger.info({ count: pending.length, platforms: targets }, 'Starting uploads');

    const totals: BatchTotals = { successful: 0, failed: 0, bytes: 0, seconds: 0 };
    const uploadedIds = new Map<PlatformId, string[]>();
    const warnings: string[] = [];
    let stopReason: string | null = null;

    for (const [index, asset] of pending.entries()) {
      const publishTime = computePublishTime(index, schedule, startDate);
      const { title, warnings: titleWarnings } = titleFor(asset);
      for (const warning of titleWarnings) {
        logger.warn({ filename: asset.filename }, warning);
      }

      const statuses = await this.tracker.getStatus(asset.filename);
      for (const client of clients) {
        if (statuses[client.platform]?.uploaded) continue;

        const failure = await this.transferOne(client, asset, title, publishTime, request, totals, uploadedIds, warnings);
        if (failure?.isFatal) {
          stopReason = failure.message;
          break;
        }
      }

      if (await this.tracker.shouldMoveToSent(asset.filename, gating)) {
        if (await this.tracker.relocate(asset)) relocated.push(asset.filename);
      }
      if (stopReason !== null) {
        logger.error({ reason: stopReason, remaining: pending.length - index - 1 }, 'Stopping batch early');
        break;
      }
    }

    for (const client of clients) {
      const ids = uploadedIds.get(client.platform) ?? [];
      if (!client.finalizeBatch || ids.length === 0) continue;
      for (const warning of await client.finalizeBatch(ids)) {
        logger.warn({ platform: client.platform }, warning);
        warnings.push(warning);
      }
    }

    await this.history.append(
      buildRunSummary({
        platforms: targets,
        totalVideos: pending.length,
        successful: totals.successful,
        failed: totals.failed,
        stopReason,
        totalBytes: totals.bytes,
        totalSeconds: totals.seconds
      })
    );

    logger.info(
      {
        successful: totals.successful,
        failed: totals.failed,
        uploaded: formatFileSize(totals.bytes),
        time: formatDuration(totals.seconds),
        averageSpeed: formatSpeed(totals.seconds > 0 ? totals.bytes / totals.seconds : 0)
      },
      'Batch finished'
    );

    return {
      ...report,
      exitCode: stopReason !== null ? EXIT_CODES.stoppedEarly : EXIT_CODES.success,
      stopReason,
      totalVideos: pending.length,
      successful: totals.successful,
      failed: totals.failed,
      relocated,
      warnings
    };
  }

  /** Resolves the recorded failure, or null on success. */
  private async transferOne(
    client: TransferClient,
    asset: VideoAsset,
    title: string,
    publishTime: DateTime,
    request: ValidatedUploadRunRequest,
    totals: BatchTotals,
    uploadedIds: Map<PlatformId, string[]>,
    warnings: string[]
  ): Promise<TransferError | null> {
    const { logger } = this.deps;
    const { platform } = client;
    const scheduledTime = publishTime.toISO() ?? '';

    try {
      const outcome = await client.upload(
        { asset, title, description: request.description, tags: request.tags, publishTime },
        (progress) =>
          logger.debug(
            {
              filename: asset.filename,
              platform,
              percent: Math.floor((progress.bytesTransferred / progress.totalBytes) * 100),
              speed: formatSpeed(progress.speedBytesPerSecond),
              eta: formatDuration(progress.etaSeconds)
            },
            'Upload progress'
          )
      );

      await this.tracker.markUploaded(asset.filename, platform, { remoteId: outcome.remoteId, scheduledTime });
      await this.history.append(
        buildAttemptEntry({
          filename: asset.filename,
          platform,
          remoteId: outcome.remoteId,
          scheduledTime: publishTime,
          fileSizeBytes: asset.sizeBytes,
          uploadTimeSeconds: outcome.uploadTimeSeconds,
          speedBytesPerSecond: outcome.averageSpeed
        })
      );

      totals.successful++;
      totals.bytes += outcome.bytesTransferred;
      totals.seconds += outcome.uploadTimeSeconds;
      uploadedIds.set(platform, [...(uploadedIds.get(platform) ?? []), outcome.remoteId]);
      for (const warning of outcome.warnings) {
        logger.warn({ filename: asset.filename, platform }, warning);
        warnings.push(`${asset.filename} (${platform}): ${warning}`);
      }
      logger.info(
        {
          filename: asset.filename,
          platform,
          remoteId: outcome.remoteId,
          size: formatFileSize(asset.sizeBytes),
          time: formatDuration(outcome.uploadTimeSeconds),
          speed: formatSpeed(outcome.averageSpeed),
          scheduledAt: outcome.scheduledAt ?? 'immediately'
        },
        'Uploaded'
      );
      return null;
    } catch (error) {
      const failure = error instanceof TransferError ? error : classifyHttpFailure(platform, error, 'Upload');
      logger.error({ filename: asset.filename, platform, category: failure.category, error: failure.message }, 'Upload failed');

      await this.tracker.markUploaded(asset.filename, platform, { scheduledTime, error: failure.message });
      await this.history.append(
        buildAttemptEntry({
          filename: asset.filename,
          platform,
          remoteId: null,
          scheduledTime: publishTime,
          fileSizeBytes: asset.sizeBytes,
          uploadTimeSeconds: 0,
          speedBytesPerSecond: 0,
          error: failure.message
        })
      );
      totals.failed++;
      return failure;
    }
  }
}
