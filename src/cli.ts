#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { openInstallation } from './config/installation.js';
import { parseTags, platformIdSchema } from './schemas/config.js';
import { createTransferClientFactory } from './services/transfer/index.js';
import { UploadHistory } from './services/upload-history.js';
import { UploadTracker } from './services/upload-tracker.js';
import { PLATFORM_IDS } from './types/upload.js';
import type { PlatformId } from './types/upload.js';
import { errorMessage } from './utils/errors.js';
import { formatFileSize } from './utils/format.js';
import { BulkUploadRun, EXIT_CODES } from './workflows/bulk-upload-run.js';

interface GlobalFlags {
  home?: string;
  logLevel?: string;
}

interface UploadFlags {
  startDate?: string;
  timezone?: string;
  hourSlots: number[];
  categoryId?: string;
  description?: string;
  tags?: string;
  dryRun?: boolean;
  platforms: PlatformId[];
  targets: PlatformId[];
}

function collectHour(value: string, previous: number[]): number[] {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Invalid hour slot '${value}'. Must be between 0 and 23.`);
  }
  return [...previous, parseInt(value, 10)];
}

function collectPlatform(value: string, previous: PlatformId[]): PlatformId[] {
  const parsed = platformIdSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new InvalidArgumentError(`Unknown platform '${value}'. Use one of: ${PLATFORM_IDS.join(', ')}`);
  }
  return [...previous, parsed.data];
}

const program = new Command();
program
  .name('bulk-video-scheduler')
  .description('Schedule and upload a folder of videos to YouTube and TikTok')
  .version('1.0.0')
  .option('--home <dir>', 'installation directory (clips/, sent/, logs/, credentials)', process.env.BULK_UPLOADER_HOME)
  .option('--log-level <level>', 'pino log level');

program
  .command('upload')
  .description('Upload every pending video in clips/ and schedule its publication')
  .option('--start-date <date>', 'first publish day, YYYY-MM-DD (default: today)')
  .option('--timezone <zone>', 'IANA timezone for publish times (default: config)')
  .option('--hour-slots <hours...>', 'hours of the day to publish at, e.g. 8 18', collectHour, [])
  .option('--category-id <id>', 'YouTube category id (default: config)')
  .option('--description <text>', 'description for every video (default: config)')
  .option('--tags <tags>', 'comma-separated tags (default: config)')
  .option('--platforms <ids...>', 'platforms a file must reach before it moves to sent/', collectPlatform, [])
  .option('--targets <ids...>', 'platforms to upload to in this run (default: --platforms)', collectPlatform, [])
  .option('--dry-run', 'preview titles, schedule and sizes without uploading')
  .action(async (flags: UploadFlags) => {
    const { paths, settings, logger } = await openInstallation({
      ...program.opts<GlobalFlags>(),
      errorLog: flags.dryRun !== true
    });
    const run = new BulkUploadRun({
      paths,
      settings,
      logger,
      createClient: createTransferClientFactory(paths, settings, logger)
    });

    const report = await run.run({
      startDate: flags.startDate,
      timezone: flags.timezone ?? settings.defaultTimezone,
      hourSlots: flags.hourSlots.length > 0 ? flags.hourSlots : settings.defaultHourSlots,
      categoryId: flags.categoryId ?? settings.defaultCategoryId,
      description: flags.description ?? settings.description,
      tags: flags.tags !== undefined ? parseTags(flags.tags) : settings.tags,
      dryRun: flags.dryRun === true,
      platforms: flags.platforms.length > 0 ? flags.platforms : ['youtube'],
      targets: flags.targets.length > 0 ? flags.targets : undefined
    });

    if (report.dryRun) {
      for (const preview of report.previews) {
        const issues = preview.issues.length > 0 ? `  [${preview.issues.join('; ')}]` : '';
        console.log(`${preview.index + 1}. ${preview.publishTime}  ${preview.title}  (${formatFileSize(preview.sizeBytes)})${issues}`);
      }
      console.log(`${report.totalVideos} video(s) would be uploaded.`);
    } else if (report.exitCode === EXIT_CODES.success || report.exitCode === EXIT_CODES.stoppedEarly) {
      console.log(`Uploaded: ${report.successful}  Failed: ${report.failed}  Moved to sent/: ${report.relocated.length}`);
      if (report.stopReason) console.log(`Stopped early: ${report.stopReason}`);
    }
    process.exitCode = report.exitCode;
  });

program
  .command('status')
  .description('Show per-platform upload status from the tracking file')
  .option('--platforms <ids...>', 'platforms that count as delivered', collectPlatform, [])
  .action(async (flags: { platforms: PlatformId[] }) => {
    const { paths, logger } = await openInstallation(program.opts<GlobalFlags>());
    const tracker = new UploadTracker(paths.trackingFile, paths.sentDir, logger);
    const platforms = flags.platforms.length > 0 ? flags.platforms : [...PLATFORM_IDS];

    const records = await tracker.load();
    for (const [filename, statuses] of Object.entries(records).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      const cells = PLATFORM_IDS.map((platform) => {
        const status = statuses[platform];
        if (!status) return `${platform}: -`;
        return `${platform}: ${status.uploaded ? 'ok' : `failed (${status.error ?? 'unknown error'})`}`;
      });
      console.log(`${filename}  ${cells.join('  ')}`);
    }

    const summary = await tracker.getSummary(platforms);
    console.log(
      `Tracked: ${summary.totalVideos}  YouTube: ${summary.perPlatform.youtube}  TikTok: ${summary.perPlatform.tiktok}  Delivered to ${platforms.join('+')}: ${summary.deliveredToAll}`
    );
  });

program
  .command('history')
  .description('Show the most recent upload history entries')
  .option('--limit <count>', 'number of entries to show', (value: string) => {
    const parsed = parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed <= 0) throw new InvalidArgumentError('Limit must be a positive integer.');
    return parsed;
  }, 20)
  .action(async (flags: { limit: number }) => {
    const { paths, logger } = await openInstallation(program.opts<GlobalFlags>());
    const history = new UploadHistory(paths.historyFile, paths.backupDir, logger);
    const entries = await history.list();

    for (const entry of entries.slice(-flags.limit)) {
      if (entry.type === 'upload') {
        const result = entry.status === 'success' ? entry.video_id : `FAILED: ${entry.error_message ?? ''}`;
        console.log(`${entry.timestamp}  ${entry.platform}  ${entry.filename}  ${entry.scheduled_time_readable}  ${result}`);
      } else {
        const stopped = entry.stopped_early ? `  stopped: ${entry.stop_reason ?? ''}` : '';
        console.log(
          `${entry.execution_timestamp}  run  ${entry.successful_uploads} ok / ${entry.failed_uploads} failed  ${entry.total_uploaded_size_readable} at ${entry.average_speed_readable}${stopped}`
        );
      }
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = EXIT_CODES.configError;
});
