/**
 * Time slot helpers
 *
 * A week is 5 days × 6 periods. Slots are plain immutable values compared
 * by (day, period); `slotKey` gives the string used for map lookups.
 */

import type { Day, TimeSlot } from '../types/index.js';
import { InvalidTimeSlotError } from './errors.js';

export const DAYS: readonly Day[] = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri'];

export const DAY_NAMES: Readonly<Record<Day, string>> = {
  Mon: 'Monday',
  Tue: 'Tuesday',
  Wed: 'Wednesday',
  Thu: 'Thursday',
  Fri: 'Friday',
};

export const PERIODS_PER_DAY = 6;

export const PERIODS: readonly number[] = Array.from({ length: PERIODS_PER_DAY }, (_, i) => i + 1);

export function isDay(value: string): value is Day {
  return (DAYS as readonly string[]).includes(value);
}

/** Accepts "Mon" or "Monday" in any case. */
export function lookupDay(value: string): Day | undefined {
  const wanted = value.trim().toLowerCase();
  return DAYS.find(d => d.toLowerCase() === wanted || DAY_NAMES[d].toLowerCase() === wanted);
}

export function parseDay(value: string): Day {
  const match = lookupDay(value);
  if (!match) {
    throw new InvalidTimeSlotError(`Unknown day: "${value}" (expected one of ${DAYS.join(', ')})`);
  }
  return match;
}

export function createTimeSlot(day: Day, period: number): TimeSlot {
  assertValidTimeSlot({ day, period });
  return Object.freeze({ day, period });
}

export function assertValidTimeSlot(timeSlot: TimeSlot): void {
  if (!isDay(timeSlot.day)) {
    throw new InvalidTimeSlotError(`Invalid day in time slot: "${String(timeSlot.day)}"`);
  }
  if (!Number.isInteger(timeSlot.period) || timeSlot.period < 1 || timeSlot.period > PERIODS_PER_DAY) {
    throw new InvalidTimeSlotError(
      `Invalid period in time slot: ${timeSlot.period} (expected 1-${PERIODS_PER_DAY})`
    );
  }
}

export function slotKey(timeSlot: TimeSlot): string {
  return `${timeSlot.day}-${timeSlot.period}`;
}

export function sameSlot(a: TimeSlot, b: TimeSlot): boolean {
  return a.day === b.day && a.period === b.period;
}

export function compareTimeSlots(a: TimeSlot, b: TimeSlot): number {
  return DAYS.indexOf(a.day) - DAYS.indexOf(b.day) || a.period - b.period;
}

export function slotsOfDay(day: Day): TimeSlot[] {
  return PERIODS.map(period => createTimeSlot(day, period));
}

export function allTimeSlots(): TimeSlot[] {
  return DAYS.flatMap(day => slotsOfDay(day));
}

export function formatTimeSlot(timeSlot: TimeSlot): string {
  return `${DAY_NAMES[timeSlot.day]} period ${timeSlot.period}`;
}
