import { z } from 'zod';
import { PLATFORM_IDS } from '../types/upload.js';

export const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday'
] as const;

export type Weekday = typeof WEEKDAYS[number];

export const DEFAULT_VIDEO_EXTENSIONS = ['.mp4', '.mov', '.avi', '.mkv', '.flv', '.wmv', '.webm'];

/** Comma-separated string or list -> trimmed, non-empty tags. */
export function parseTags(value: string | string[]): string[] {
  const parts = typeof value === 'string' ? value.split(',') : value;
  return parts.map((tag) => tag.trim()).filter(Boolean);
}

const lowercase = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

export const configFileSchema = z.object({
  default_timezone: z.string().min(1).default('America/Sao_Paulo'),
  default_hour_slots: z.array(z.number()).default([8, 18]),
  default_category_id: z.string().min(1).default('20'),
  video_extensions: z
    .array(z.string().min(1))
    .min(1, 'video_extensions must list at least one extension')
    .default(DEFAULT_VIDEO_EXTENSIONS),
  privacy_status: z.enum(['private', 'unlisted', 'public']).default('private'),
  tiktok_privacy_level: z
    .enum(['PUBLIC_TO_EVERYONE', 'MUTUAL_FOLLOW_FRIENDS', 'FOLLOWER_OF_CREATOR', 'SELF_ONLY'])
    .default('PUBLIC_TO_EVERYONE'),
  description: z.string().max(5000).default(''),
  tags: z.union([z.string(), z.array(z.string())]).default([]).transform(parseTags),
  schedule_mode: z.preprocess(lowercase, z.enum(['daily', 'weekly'])).default('daily'),
  schedule_day: z.preprocess(lowercase, z.enum(WEEKDAYS)).default('monday'),
  schedule_hour: z.number().int().min(0).max(23).default(10),
  playlist_id: z.string().min(1).nullish(),
  create_playlist: z.boolean().default(false),
  playlist_title: z.string().min(1).default('Uploaded Videos'),
  chunk_size_mb: z.number().positive().max(64).optional()
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export const platformIdSchema = z.enum(PLATFORM_IDS);

export const uploadRequestSchema = z.object({
  startDate: z.string().optional(),
  timezone: z.string().min(1, 'timezone is required'),
  hourSlots: z.array(z.number()),
  categoryId: z.string().min(1, 'categoryId is required'),
  description: z.string().max(5000, 'description must be at most 5000 characters'),
  tags: z.array(z.string().max(30, 'tags must be at most 30 characters each')),
  dryRun: z.boolean().default(false),
  platforms: z.array(platformIdSchema).min(1, 'At least one platform must be specified'),
  targets: z.array(platformIdSchema).min(1).optional()
});

export type UploadRunRequest = z.input<typeof uploadRequestSchema>;
export type ValidatedUploadRunRequest = z.output<typeof uploadRequestSchema>;
