import type { DateTime } from 'luxon';
import type { PlatformId } from '../../types/upload.js';
import { ScheduleWindowError } from '../../utils/errors.js';

export interface ScheduleWindow {
  /** Furthest day ahead a publish time may fall on; null when unlimited. */
  maxDaysAhead: number | null;
  /** Publish times at most this far away are published immediately. */
  minLeadSeconds: number;
}

export interface SchedulePlan {
  publishTime: DateTime;
  daysAhead: number;
  /** null means publish immediately. */
  scheduleAt: DateTime | null;
}

export const YOUTUBE_SCHEDULE_WINDOW: ScheduleWindow = { maxDaysAhead: null, minLeadSeconds: 0 };
export const TIKTOK_SCHEDULE_WINDOW: ScheduleWindow = { maxDaysAhead: 10, minLeadSeconds: 900 };

const PLATFORM_LABELS: Record<PlatformId, string> = {
  youtube: 'YouTube',
  tiktok: 'TikTok'
};

/** Decide how a publish time is sent to the platform. Runs before any network call. */
export function planSchedule(
  platform: PlatformId,
  publishTime: DateTime,
  now: DateTime,
  window: ScheduleWindow
): SchedulePlan {
  const diffSeconds = publishTime.toSeconds() - now.toSeconds();
  const daysAhead = Math.floor(diffSeconds / 86400);

  if (daysAhead < 0) {
    throw new ScheduleWindowError(platform, 'Cannot schedule videos in the past');
  }
  if (window.maxDaysAhead !== null && daysAhead > window.maxDaysAhead) {
    throw new ScheduleWindowError(
      platform,
      `${PLATFORM_LABELS[platform]} only allows scheduling up to ${window.maxDaysAhead} days in advance`
    );
  }

  return {
    publishTime,
    daysAhead,
    scheduleAt: diffSeconds > window.minLeadSeconds ? publishTime : null
  };
}
