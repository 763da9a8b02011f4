import type { PlatformId, TransferProgress, UploadOutcome, UploadRequest } from '../../types/upload.js';
import type { ScheduleWindow } from './schedule-window.js';

export type ProgressListener = (progress: TransferProgress) => void;

/**
 * One remote platform. Implementations throw TransferError (or
 * AuthenticationError from `authenticate`); every other failure is classified
 * before it leaves the client.
 */
export interface TransferClient {
  readonly platform: PlatformId;
  readonly scheduleWindow: ScheduleWindow;

  /** Load stored credentials, refreshing them if needed. No consent flow. */
  authenticate(): Promise<void>;

  upload(request: UploadRequest, onProgress?: ProgressListener): Promise<UploadOutcome>;

  /** Runs once after the batch with the ids uploaded in it; resolves warnings. */
  finalizeBatch?(remoteIds: readonly string[]): Promise<string[]>;
}
