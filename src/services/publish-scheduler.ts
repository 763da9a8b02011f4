import { DateTime, IANAZone } from 'luxon';
import { WEEKDAYS } from '../schemas/config.js';
import type { Weekday } from '../schemas/config.js';
import type { ScheduleSlot } from '../types/upload.js';
import { ConfigurationError } from '../utils/errors.js';

export interface DailySchedule {
  mode: 'daily';
  hourSlots: readonly number[];
}

export interface WeeklySchedule {
  mode: 'weekly';
  weekday: Weekday;
  hour: number;
}

export type ScheduleSpec = DailySchedule | WeeklySchedule;

export function assertValidTimezone(timezone: string): void {
  if (!IANAZone.isValidZone(timezone)) {
    throw new ConfigurationError(
      `Invalid timezone '${timezone}'. Common timezones: America/Sao_Paulo, America/New_York, Europe/London, Asia/Tokyo`
    );
  }
}

export function validateHourSlots(hourSlots: readonly number[]): void {
  if (hourSlots.length === 0) {
    throw new ConfigurationError('At least one hour slot must be specified');
  }
  for (const hour of hourSlots) {
    if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
      throw new ConfigurationError(`Invalid hour slot '${hour}'. Must be between 0 and 23.`);
    }
  }
}

/** `YYYY-MM-DD` at midnight in `timezone`; today's midnight when absent. */
export function parseStartDate(value: string | undefined, timezone: string, now: DateTime = DateTime.now()): DateTime {
  assertValidTimezone(timezone);
  if (!value) {
    return now.setZone(timezone).startOf('day');
  }
  const parsed = DateTime.fromFormat(value, 'yyyy-MM-dd', { zone: timezone });
  if (!parsed.isValid) {
    throw new ConfigurationError(`Invalid date format '${value}'. Use YYYY-MM-DD format. Error: ${parsed.invalidExplanation ?? parsed.invalidReason ?? 'unparseable'}`);
  }
  return parsed;
}

export function computeScheduleSlot(index: number, hourSlots: readonly number[]): ScheduleSlot {
  return {
    dayOffset: Math.floor(index / hourSlots.length),
    hourOfDay: hourSlots[index % hourSlots.length]
  };
}

/** First date at or after `startDate` that falls on `weekday`, at midnight. */
export function firstWeekdayOnOrAfter(startDate: DateTime, weekday: Weekday): DateTime {
  const target = WEEKDAYS.indexOf(weekday) + 1; // luxon: Monday = 1
  let daysAhead = target - startDate.weekday;
  if (daysAhead < 0) daysAhead += 7;
  return startDate.startOf('day').plus({ days: daysAhead });
}

/**
 * Publish time for the `index`-th pending file (0-based). Pure: depends only
 * on its arguments, so a dry run previews exactly what a real run will use.
 * Indexes are positions among the files still pending, not stable global slots.
 */
export function computePublishTime(index: number, spec: ScheduleSpec, startDate: DateTime): DateTime {
  const day = startDate.startOf('day');
  if (spec.mode === 'weekly') {
    return firstWeekdayOnOrAfter(day, spec.weekday).set({ hour: spec.hour }).plus({ weeks: index });
  }
  const slot = computeScheduleSlot(index, spec.hourSlots);
  return day.plus({ days: slot.dayOffset }).set({ hour: slot.hourOfDay, minute: 0, second: 0, millisecond: 0 });
}

export function buildSchedule(count: number, spec: ScheduleSpec, startDate: DateTime): DateTime[] {
  if (spec.mode === 'daily') validateHourSlots(spec.hourSlots);
  return Array.from({ length: count }, (_, index) => computePublishTime(index, spec, startDate));
}
