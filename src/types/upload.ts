import type { DateTime } from 'luxon';

export const PLATFORM_IDS = ['youtube', 'tiktok'] as const;

export type PlatformId = typeof PLATFORM_IDS[number];

export interface VideoAsset {
  path: string;
  /** Unique key within the clips directory. */
  filename: string;
  sizeBytes: number;
}

export interface PlatformStatus {
  uploaded: boolean;
  uploadedAt?: string;
  remoteId?: string;
  scheduledTime?: string;
  error?: string;
}

export type PlatformStatusMap = Partial<Record<PlatformId, PlatformStatus>>;

export type TrackingRecords = Record<string, PlatformStatusMap>;

export interface ScheduleSlot {
  dayOffset: number;
  hourOfDay: number;
}

export interface TransferProgress {
  bytesTransferred: number;
  totalBytes: number;
  elapsedSeconds: number;
  speedBytesPerSecond: number;
  etaSeconds: number;
}

export interface UploadRequest {
  asset: VideoAsset;
  title: string;
  description: string;
  tags: string[];
  publishTime: DateTime;
}

export interface UploadOutcome {
  remoteId: string;
  uploadTimeSeconds: number;
  bytesTransferred: number;
  /** bytes per second */
  averageSpeed: number;
  /** ISO timestamp the platform was asked to publish at; null when published immediately. */
  scheduledAt: string | null;
  sideAssets: {
    subtitle: boolean;
    thumbnail: boolean;
  };
  warnings: string[];
}

export interface UploadAttemptEntry {
  type: 'upload';
  timestamp: string;
  filename: string;
  platform: PlatformId;
  video_id: string | null;
  scheduled_time: string;
  scheduled_time_readable: string;
  file_size_bytes: number;
  file_size_readable: string;
  upload_time_seconds: number;
  upload_time_readable: string;
  upload_speed_bytes_per_second: number;
  upload_speed_readable: string;
  status: 'success' | 'failed';
  error_message: string | null;
}

export interface ExecutionSummaryEntry {
  type: 'execution_summary';
  execution_timestamp: string;
  execution_date: string;
  platforms: PlatformId[];
  total_videos: number;
  successful_uploads: number;
  failed_uploads: number;
  stopped_early: boolean;
  stop_reason: string | null;
  total_uploaded_size_bytes: number;
  total_uploaded_size_readable: string;
  total_upload_time_seconds: number;
  total_upload_time_readable: string;
  average_speed_bytes_per_second: number;
  average_speed_readable: string;
}

export type HistoryEntry = UploadAttemptEntry | ExecutionSummaryEntry;
