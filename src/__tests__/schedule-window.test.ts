import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { TIKTOK_SCHEDULE_WINDOW, YOUTUBE_SCHEDULE_WINDOW, planSchedule } from '../services/transfer/schedule-window.js';
import { ScheduleWindowError } from '../utils/errors.js';

const NOW = DateTime.fromISO('2024-01-01T12:00:00Z', { zone: 'utc' });

describe('planSchedule', () => {
  it('rejects publish times beyond the platform ceiling', () => {
    const publish = NOW.plus({ days: 11 });
    const error = (() => {
      try {
        planSchedule('tiktok', publish, NOW, TIKTOK_SCHEDULE_WINDOW);
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ScheduleWindowError);
    expect(error instanceof ScheduleWindowError && error.category).toBe('validation');
    expect(error instanceof ScheduleWindowError && error.message).toBe('TikTok only allows scheduling up to 10 days in advance');
  });

  it('accepts the last allowed day', () => {
    const plan = planSchedule('tiktok', NOW.plus({ days: 10, hours: 5 }), NOW, TIKTOK_SCHEDULE_WINDOW);
    expect(plan.daysAhead).toBe(10);
  });

  it('rejects publish times in the past', () => {
    expect(() => planSchedule('youtube', NOW.minus({ hours: 1 }), NOW, YOUTUBE_SCHEDULE_WINDOW)).toThrow(
      'Cannot schedule videos in the past'
    );
  });

  it('publishes immediately inside the minimum lead time', () => {
    const plan = planSchedule('tiktok', NOW.plus({ minutes: 10 }), NOW, TIKTOK_SCHEDULE_WINDOW);

    expect(plan.scheduleAt).toBeNull();
    expect(plan.daysAhead).toBe(0);
  });

  it('schedules beyond the minimum lead time', () => {
    const publish = NOW.plus({ minutes: 20 });
    expect(planSchedule('tiktok', publish, NOW, TIKTOK_SCHEDULE_WINDOW).scheduleAt).toBe(publish);
  });

  it('has no ceiling on YouTube', () => {
    const publish = NOW.plus({ days: 60 });
    const plan = planSchedule('youtube', publish, NOW, YOUTUBE_SCHEDULE_WINDOW);

    expect(plan.daysAhead).toBe(60);
    expect(plan.scheduleAt).toBe(publish);
  });
});
