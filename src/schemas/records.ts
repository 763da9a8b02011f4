import { z } from 'zod';
import { PLATFORM_IDS } from '../types/upload.js';

export const storedPlatformStatusSchema = z.object({
  uploaded: z.boolean(),
  uploaded_at: z.string().nullish(),
  video_id: z.string().nullish(),
  scheduled_time: z.string().nullish(),
  error: z.string().nullish()
});

export type StoredPlatformStatus = z.infer<typeof storedPlatformStatusSchema>;

export const trackingFileSchema = z.record(z.string(), z.unknown());

/** One filename's platform map; arrays and null are rejected. */
export const trackingEntrySchema = z.record(z.string(), z.unknown());

const platformSchema = z.enum(PLATFORM_IDS);

export const uploadAttemptEntrySchema = z.object({
  type: z.literal('upload'),
  timestamp: z.string(),
  filename: z.string(),
  platform: platformSchema,
  video_id: z.string().nullable(),
  scheduled_time: z.string(),
  scheduled_time_readable: z.string(),
  file_size_bytes: z.number(),
  file_size_readable: z.string(),
  upload_time_seconds: z.number(),
  upload_time_readable: z.string(),
  upload_speed_bytes_per_second: z.number(),
  upload_speed_readable: z.string(),
  status: z.enum(['success', 'failed']),
  error_message: z.string().nullable()
});

export const executionSummaryEntrySchema = z.object({
  type: z.literal('execution_summary'),
  execution_timestamp: z.string(),
  execution_date: z.string(),
  platforms: z.array(platformSchema),
  total_videos: z.number(),
  successful_uploads: z.number(),
  failed_uploads: z.number(),
  stopped_early: z.boolean(),
  stop_reason: z.string().nullable(),
  total_uploaded_size_bytes: z.number(),
  total_uploaded_size_readable: z.string(),
  total_upload_time_seconds: z.number(),
  total_upload_time_readable: z.string(),
  average_speed_bytes_per_second: z.number(),
  average_speed_readable: z.string()
});

export const historyEntrySchema = z.discriminatedUnion('type', [
  uploadAttemptEntrySchema,
  executionSummaryEntrySchema
]);
