/**
 * Teacher availability cache
 *
 * Memoises absence lookups by (day, period, teacher). Absences come from the
 * static calendar, not the grid, so grid mutations never invalidate this
 * cache; only an explicit `clear()` does.
 */

import type { TimeSlot } from '../types/index.js';
import type { AbsenceRepository } from '../model/absence-repository.js';
import { slotKey } from '../model/time-slot.js';

export interface CacheCounters {
  hits: number;
  misses: number;
}

export class TeacherAvailabilityCache implements AbsenceRepository {
  private readonly source: AbsenceRepository;
  private readonly absent = new Map<string, boolean>();
  private readonly absentBySlot = new Map<string, ReadonlySet<string>>();
  private counters: CacheCounters = { hits: 0, misses: 0 };

  constructor(source: AbsenceRepository) {
    this.source = source;
  }

  isAbsent(teacherName: string, timeSlot: TimeSlot): boolean {
    const key = `${slotKey(timeSlot)}|${teacherName}`;
    const cached = this.absent.get(key);
    if (cached !== undefined) {
      this.counters.hits++;
      return cached;
    }
    this.counters.misses++;
    const value = this.source.isAbsent(teacherName, timeSlot);
    this.absent.set(key, value);
    return value;
  }

  getAbsentTeachers(timeSlot: TimeSlot): ReadonlySet<string> {
    const key = slotKey(timeSlot);
    const cached = this.absentBySlot.get(key);
    if (cached) {
      this.counters.hits++;
      return cached;
    }
    this.counters.misses++;
    const value = new Set(this.source.getAbsentTeachers(timeSlot));
    this.absentBySlot.set(key, value);
    return value;
  }

  clear(): void {
    this.absent.clear();
    this.absentBySlot.clear();
  }

  stats(): CacheCounters {
    return { ...this.counters };
  }

  resetStats(): void {
    this.counters = { hits: 0, misses: 0 };
  }
}
