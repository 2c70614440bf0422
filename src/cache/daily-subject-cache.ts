/**
 * Daily subject cache
 *
 * Keeps one summary per (grid, class, day): subject -> periods. Each grid
 * seen is subscribed to, and any assignment or removal in a cell drops the
 * summary of that cell's (class, day) and nothing else.
 */

import type { ClassRef, Day, Subject } from '../types/index.js';
import type { DailySubjectIndex } from '../constraints/daily-duplication.js';
import { classKey } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { CacheCounters } from './teacher-availability-cache.js';

type DaySummary = Map<Subject, number[]>;

export class DailySubjectCache implements DailySubjectIndex {
  private rows = new WeakMap<ScheduleGrid, Map<string, DaySummary>>();
  private readonly subscribed = new WeakSet<ScheduleGrid>();
  private counters: CacheCounters = { hits: 0, misses: 0 };

  periodsOf(schedule: ScheduleGrid, classRef: ClassRef, day: Day, subject: Subject): readonly number[] {
    const rows = this.rowsFor(schedule);
    const key = rowKey(classRef, day);
    let summary = rows.get(key);
    if (summary) {
      this.counters.hits++;
    } else {
      this.counters.misses++;
      summary = summarize(schedule, classRef, day);
      rows.set(key, summary);
    }
    return summary.get(subject) ?? [];
  }

  /** Whether a summary is currently held for (class, day) of this grid. */
  has(schedule: ScheduleGrid, classRef: ClassRef, day: Day): boolean {
    return this.rows.get(schedule)?.has(rowKey(classRef, day)) ?? false;
  }

  invalidate(schedule: ScheduleGrid, classRef: ClassRef, day: Day): void {
    this.rows.get(schedule)?.delete(rowKey(classRef, day));
  }

  clear(): void {
    this.rows = new WeakMap();
  }

  stats(): CacheCounters {
    return { ...this.counters };
  }

  private rowsFor(schedule: ScheduleGrid): Map<string, DaySummary> {
    let rows = this.rows.get(schedule);
    if (!rows) {
      rows = new Map();
      this.rows.set(schedule, rows);
    }
    if (!this.subscribed.has(schedule)) {
      schedule.subscribe(change => {
        // Locks do not change which subjects a row holds.
        if (change.kind === 'cell') this.invalidate(schedule, change.classRef, change.timeSlot.day);
      });
      this.subscribed.add(schedule);
    }
    return rows;
  }
}

function rowKey(classRef: ClassRef, day: Day): string {
  return `${classKey(classRef)}|${day}`;
}

function summarize(schedule: ScheduleGrid, classRef: ClassRef, day: Day): DaySummary {
  const summary: DaySummary = new Map();
  schedule.getDayRow(classRef, day).forEach((assignment, index) => {
    if (!assignment) return;
    const periods = summary.get(assignment.subject) || [];
    periods.push(index + 1);
    summary.set(assignment.subject, periods);
  });
  return summary;
}
