/**
 * Teacher absence lookup
 *
 * Constraints depend on the AbsenceRepository interface only, so absence data
 * can come from the school calendar, parsed notes or a cache in front of
 * either.
 */

import type { AbsenceEntry, TimeSlot } from '../types/index.js';
import { PERIODS, slotKey } from './time-slot.js';

export interface AbsenceRepository {
  isAbsent(teacherName: string, timeSlot: TimeSlot): boolean;
  getAbsentTeachers(timeSlot: TimeSlot): ReadonlySet<string>;
}

const NONE: ReadonlySet<string> = new Set();

export class InMemoryAbsenceRepository implements AbsenceRepository {
  // slotKey -> teacher names
  private readonly bySlot = new Map<string, Set<string>>();

  constructor(entries: Iterable<AbsenceEntry> = []) {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  add(entry: AbsenceEntry): void {
    const periods = entry.periods === 'all' ? PERIODS : entry.periods;
    for (const period of periods) {
      const key = slotKey({ day: entry.day, period });
      let names = this.bySlot.get(key);
      if (!names) {
        names = new Set();
        this.bySlot.set(key, names);
      }
      names.add(entry.teacher);
    }
  }

  isAbsent(teacherName: string, timeSlot: TimeSlot): boolean {
    return this.bySlot.get(slotKey(timeSlot))?.has(teacherName) ?? false;
  }

  getAbsentTeachers(timeSlot: TimeSlot): ReadonlySet<string> {
    return this.bySlot.get(slotKey(timeSlot)) ?? NONE;
  }
}
