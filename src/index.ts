export { resolveInstallationPaths, loadSettings, parseSettings, DEFAULT_CHUNK_SIZE_BYTES } from './config/settings.js';
export type { InstallationPaths, Settings, PrivacyStatus, TikTokPrivacyLevel } from './config/settings.js';
export { openInstallation, installationLoggerOptions } from './config/installation.js';
export type { Installation, InstallationOptions } from './config/installation.js';
export { RunLock, withRunLock } from './services/run-lock.js';
export { UploadTracker, isUploadedToAllIn } from './services/upload-tracker.js';
export type { MarkUploadedDetails, UploadSummary } from './services/upload-tracker.js';
export {
  assertValidTimezone,
  buildSchedule,
  computePublishTime,
  computeScheduleSlot,
  parseStartDate,
  validateHourSlots
} from './services/publish-scheduler.js';
export type { ScheduleSpec, DailySchedule, WeeklySchedule } from './services/publish-scheduler.js';
export { sanitizeTitle } from './services/title-sanitizer.js';
export { UploadHistory, buildAttemptEntry, buildRunSummary } from './services/upload-history.js';
export { YouTubeUploader, GoogleYouTubeDataApi } from './services/transfer/youtube-uploader.js';
export type { YouTubeDataApi, YouTubeUploaderOptions } from './services/transfer/youtube-uploader.js';
export { TikTokUploader } from './services/transfer/tiktok-uploader.js';
export type { TikTokUploaderOptions } from './services/transfer/tiktok-uploader.js';
export { createTransferClientFactory } from './services/transfer/index.js';
export type { TransferClientFactory } from './services/transfer/index.js';
export type { TransferClient, ProgressListener } from './services/transfer/types.js';
export { planSchedule, TIKTOK_SCHEDULE_WINDOW, YOUTUBE_SCHEDULE_WINDOW } from './services/transfer/schedule-window.js';
export type { ScheduleWindow, SchedulePlan } from './services/transfer/schedule-window.js';
export { classifyHttpFailure, classifySignature } from './services/transfer/error-signatures.js';
export { BulkUploadRun, EXIT_CODES } from './workflows/bulk-upload-run.js';
export type { RunReport, UploadPreview, ExitCode } from './workflows/bulk-upload-run.js';
export { RunSupervisor, buildUploadArgs } from './workflows/run-supervisor.js';
export type { SupervisorMessage, UploadCommandOptions } from './workflows/run-supervisor.js';
export * from './utils/errors.js';
export { createLogger } from './utils/logger.js';
export type {
  PlatformId,
  VideoAsset,
  PlatformStatus,
  PlatformStatusMap,
  TrackingRecords,
  ScheduleSlot,
  TransferProgress,
  UploadRequest,
  UploadOutcome,
  UploadAttemptEntry,
  ExecutionSummaryEntry,
  HistoryEntry
} from './types/upload.js';
export { PLATFORM_IDS } from './types/upload.js';
