/**
 * Check result cache
 *
 * Whole point-check results per grid, keyed by (slot, class, subject,
 * teacher). Several constraints look across classes, so any change to a
 * grid, lock changes included, clears that grid's entries.
 */

import type { Assignment, CheckResult, TimeSlot } from '../types/index.js';
import { classKey } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import { slotKey } from '../model/time-slot.js';

export class CheckResultCache {
  private entries = new WeakMap<ScheduleGrid, Map<string, CheckResult>>();
  private readonly subscribed = new WeakSet<ScheduleGrid>();

  static key(timeSlot: TimeSlot, assignment: Assignment): string {
    return [
      slotKey(timeSlot),
      classKey(assignment.classRef),
      assignment.subject,
      assignment.teacher?.name ?? '',
    ].join('|');
  }

  get(schedule: ScheduleGrid, key: string): CheckResult | undefined {
    const cached = this.entries.get(schedule)?.get(key);
    return cached ? copy(cached) : undefined;
  }

  set(schedule: ScheduleGrid, key: string, result: CheckResult): void {
    let entries = this.entries.get(schedule);
    if (!entries) {
      entries = new Map();
      this.entries.set(schedule, entries);
    }
    if (!this.subscribed.has(schedule)) {
      schedule.subscribe(() => this.invalidate(schedule));
      this.subscribed.add(schedule);
    }
    entries.set(key, copy(result));
  }

  size(schedule: ScheduleGrid): number {
    return this.entries.get(schedule)?.size ?? 0;
  }

  invalidate(schedule: ScheduleGrid): void {
    this.entries.get(schedule)?.clear();
  }

  clear(): void {
    this.entries = new WeakMap();
  }
}

function copy(result: CheckResult): CheckResult {
  return { ...result, warnings: [...result.warnings] };
}
