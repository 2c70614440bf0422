/**
 * Schedule Grid
 *
 * Mutable week × class grid of assignments. At most one assignment per
 * (time slot, class) cell. Cells can be locked explicitly, and a cell that
 * already holds a protected subject is treated as locked: `assign` and
 * `remove` refuse to touch it.
 *
 * Every successful mutation, and every change to a cell's lock, is
 * published to subscribers so that caches built on top of the grid can
 * invalidate exactly what changed.
 */

import type { Assignment, ClassRef, Day, PlacedAssignment, Subject, TimeSlot } from '../types/index.js';
import { classKey, compareClassRefs, formatClassRef } from './class-ref.js';
import { InvalidAssignmentError } from './errors.js';
import {
  DAYS,
  PERIODS,
  assertValidTimeSlot,
  compareTimeSlots,
  createTimeSlot,
  formatTimeSlot,
  slotKey,
} from './time-slot.js';

export type GridChange =
  | {
      kind: 'cell';
      timeSlot: TimeSlot;
      classRef: ClassRef;
      previous: Assignment | undefined;
      current: Assignment | undefined;
    }
  | { kind: 'lock'; timeSlot: TimeSlot; classRef: ClassRef; locked: boolean };

export type GridChangeListener = (change: GridChange) => void;

export interface ScheduleGridOptions {
  protectedSubjects?: Iterable<Subject>;
}

interface Cell {
  timeSlot: TimeSlot;
  assignment: Assignment;
}

export class ScheduleGrid {
  // slotKey -> classKey -> cell
  private readonly cells = new Map<string, Map<string, Cell>>();
  private readonly locked = new Map<string, { timeSlot: TimeSlot; classRef: ClassRef }>();
  private readonly classes = new Map<string, ClassRef>();
  private readonly listeners = new Set<GridChangeListener>();
  private readonly protectedSubjects: ReadonlySet<Subject>;

  constructor(options: ScheduleGridOptions = {}) {
    this.protectedSubjects = new Set(options.protectedSubjects ?? []);
  }

  /**
   * Deep copy of assignments and locks, for speculative placements.
   * Subscribers stay with the original grid.
   */
  clone(): ScheduleGrid {
    const copy = new ScheduleGrid({ protectedSubjects: this.protectedSubjects });
    for (const [key, row] of this.cells) {
      copy.cells.set(key, new Map(Array.from(row, ([ck, cell]): [string, Cell] => [ck, { ...cell }])));
    }
    for (const [key, entry] of this.locked) {
      copy.locked.set(key, { ...entry });
    }
    for (const [key, classRef] of this.classes) {
      copy.classes.set(key, classRef);
    }
    return copy;
  }

  get size(): number {
    let count = 0;
    for (const row of this.cells.values()) {
      count += row.size;
    }
    return count;
  }

  // ===========================================================================
  // Mutation
  // ===========================================================================

  assign(timeSlot: TimeSlot, assignment: Assignment): void {
    assertValidTimeSlot(timeSlot);
    this.assertUnlocked(timeSlot, assignment.classRef, 'assign');

    const sk = slotKey(timeSlot);
    const ck = classKey(assignment.classRef);
    let row = this.cells.get(sk);
    if (!row) {
      row = new Map();
      this.cells.set(sk, row);
    }
    const previous = row.get(ck)?.assignment;
    row.set(ck, { timeSlot: createTimeSlot(timeSlot.day, timeSlot.period), assignment });
    this.classes.set(ck, assignment.classRef);

    this.emit({ kind: 'cell', timeSlot, classRef: assignment.classRef, previous, current: assignment });
  }

  remove(timeSlot: TimeSlot, classRef: ClassRef): Assignment | undefined {
    assertValidTimeSlot(timeSlot);
    this.assertUnlocked(timeSlot, classRef, 'remove');

    const row = this.cells.get(slotKey(timeSlot));
    const previous = row?.get(classKey(classRef))?.assignment;
    if (!row || !previous) return undefined;

    row.delete(classKey(classRef));
    this.emit({ kind: 'cell', timeSlot, classRef, previous, current: undefined });
    return previous;
  }

  lock(timeSlot: TimeSlot, classRef: ClassRef): void {
    assertValidTimeSlot(timeSlot);
    const key = cellKey(timeSlot, classRef);
    this.classes.set(classKey(classRef), classRef);
    if (this.locked.has(key)) return;

    this.locked.set(key, { timeSlot: createTimeSlot(timeSlot.day, timeSlot.period), classRef });
    this.emit({ kind: 'lock', timeSlot, classRef, locked: true });
  }

  unlock(timeSlot: TimeSlot, classRef: ClassRef): void {
    if (this.locked.delete(cellKey(timeSlot, classRef))) {
      this.emit({ kind: 'lock', timeSlot, classRef, locked: false });
    }
  }

  subscribe(listener: GridChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ===========================================================================
  // Locking
  // ===========================================================================

  isExplicitlyLocked(timeSlot: TimeSlot, classRef: ClassRef): boolean {
    return this.locked.has(cellKey(timeSlot, classRef));
  }

  isLocked(timeSlot: TimeSlot, classRef: ClassRef): boolean {
    if (this.isExplicitlyLocked(timeSlot, classRef)) return true;
    const existing = this.getAssignment(timeSlot, classRef);
    return existing !== undefined && this.protectedSubjects.has(existing.subject);
  }

  lockedCells(): Array<{ timeSlot: TimeSlot; classRef: ClassRef }> {
    return Array.from(this.locked.values()).sort(
      (a, b) => compareCells(a.timeSlot, a.classRef, b.timeSlot, b.classRef)
    );
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  getAssignment(timeSlot: TimeSlot, classRef: ClassRef): Assignment | undefined {
    return this.cells.get(slotKey(timeSlot))?.get(classKey(classRef))?.assignment;
  }

  getAssignmentsAt(timeSlot: TimeSlot): Assignment[] {
    const row = this.cells.get(slotKey(timeSlot));
    if (!row) return [];
    return Array.from(row.values(), cell => cell.assignment).sort(
      (a, b) => compareClassRefs(a.classRef, b.classRef)
    );
  }

  getAssignmentsForClass(classRef: ClassRef): PlacedAssignment[] {
    const ck = classKey(classRef);
    const result: PlacedAssignment[] = [];
    for (const day of DAYS) {
      for (const period of PERIODS) {
        const cell = this.cells.get(`${day}-${period}`)?.get(ck);
        if (cell) result.push({ timeSlot: cell.timeSlot, assignment: cell.assignment });
      }
    }
    return result;
  }

  /** One entry per period of the day (index 0 = period 1). */
  getDayRow(classRef: ClassRef, day: Day): Array<Assignment | undefined> {
    const ck = classKey(classRef);
    return PERIODS.map(period => this.cells.get(`${day}-${period}`)?.get(ck)?.assignment);
  }

  getAllAssignments(): PlacedAssignment[] {
    const result: PlacedAssignment[] = [];
    for (const day of DAYS) {
      for (const period of PERIODS) {
        const row = this.cells.get(`${day}-${period}`);
        if (!row) continue;
        const cells = Array.from(row.values()).sort(
          (a, b) => compareClassRefs(a.assignment.classRef, b.assignment.classRef)
        );
        for (const cell of cells) {
          result.push({ timeSlot: cell.timeSlot, assignment: cell.assignment });
        }
      }
    }
    return result;
  }

  /** Every class that has ever held an assignment or a lock in this grid. */
  getClasses(): ClassRef[] {
    return Array.from(this.classes.values()).sort(compareClassRefs);
  }

  private assertUnlocked(timeSlot: TimeSlot, classRef: ClassRef, operation: 'assign' | 'remove'): void {
    if (this.isExplicitlyLocked(timeSlot, classRef)) {
      throw new InvalidAssignmentError(
        `Cannot ${operation} ${formatClassRef(classRef)} at ${formatTimeSlot(timeSlot)}: cell is locked`,
        timeSlot,
        classRef
      );
    }
    const existing = this.getAssignment(timeSlot, classRef);
    if (existing && this.protectedSubjects.has(existing.subject)) {
      throw new InvalidAssignmentError(
        `Cannot ${operation} ${formatClassRef(classRef)} at ${formatTimeSlot(timeSlot)}: ` +
          `cell holds protected subject ${existing.subject}`,
        timeSlot,
        classRef
      );
    }
  }

  private emit(change: GridChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}

function cellKey(timeSlot: TimeSlot, classRef: ClassRef): string {
  return `${slotKey(timeSlot)}|${classKey(classRef)}`;
}

function compareCells(aSlot: TimeSlot, aClass: ClassRef, bSlot: TimeSlot, bClass: ClassRef): number {
  return compareTimeSlots(aSlot, bSlot) || compareClassRefs(aClass, bClass);
}
