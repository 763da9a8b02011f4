import type { PlatformId } from '../types/upload.js';

export type TransferErrorCategory = 'quota' | 'auth' | 'transport' | 'validation';

export class UploaderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad timezone, hour slots, start date, request or config file. */
export class ConfigurationError extends UploaderError {}

export class AlreadyRunningError extends UploaderError {
  readonly holderPid: number | null;

  constructor(lockPath: string, holderPid: number | null) {
    super(
      holderPid !== null
        ? `Another instance is already running (pid ${holderPid}, lock ${lockPath}). Please wait for it to finish.`
        : `Another instance is already running (lock ${lockPath}). Please wait for it to finish.`
    );
    this.holderPid = holderPid;
  }
}

export class AuthenticationError extends UploaderError {
  readonly platform: PlatformId;

  constructor(platform: PlatformId, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.platform = platform;
  }
}

export class TransferError extends UploaderError {
  readonly platform: PlatformId;
  readonly category: TransferErrorCategory;
  readonly status?: number;

  constructor(
    platform: PlatformId,
    category: TransferErrorCategory,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options);
    this.platform = platform;
    this.category = category;
    this.status = options?.status;
  }

  /** Stops the whole batch rather than just the current file. */
  get isFatal(): boolean {
    return this.category === 'quota' || this.category === 'auth';
  }
}

/** Publish time outside what the platform accepts; raised before any network call. */
export class ScheduleWindowError extends TransferError {
  constructor(platform: PlatformId, message: string) {
    super(platform, 'validation', message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
