/**
 * Constraint base class
 *
 * A constraint is one independently testable rule with two operations:
 *
 *   check    - would placing `assignment` at `timeSlot` violate this rule,
 *              given everything already in the grid? Evaluated against the
 *              grid *before* the placement. Pure.
 *   validate - every violation of this rule standing in the grid now.
 *
 * The two are deliberately separate code paths: `check` reasons about a
 * transition, `validate` about a settled state, and on in-flight grids they
 * can disagree.
 */

import type {
  Assignment,
  ClassRef,
  ConstraintPriority,
  ConstraintResult,
  ConstraintSettings,
  ConstraintType,
  ConstraintViolation,
  Severity,
  TimeSlot,
} from '../types/index.js';
import { compareClassRefs, formatClassRef } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { formatTimeSlot } from '../model/time-slot.js';

export const PRIORITY_WEIGHTS: Readonly<Record<ConstraintPriority, number>> = {
  critical: 100,
  high: 80,
  medium: 60,
  low: 40,
  suggestion: 20,
};

export interface ConstraintMetadata {
  name: string;
  description: string;
  type: ConstraintType;
  priority: ConstraintPriority;
}

export abstract class Constraint {
  readonly name: string;
  readonly description: string;
  readonly type: ConstraintType;
  readonly priority: ConstraintPriority;
  /** Initial state only; toggle through `ConstraintValidator.setEnabled`. */
  readonly enabled: boolean;

  protected constructor(metadata: ConstraintMetadata, settings: ConstraintSettings = {}) {
    this.name = metadata.name;
    this.description = metadata.description;
    this.type = settings.type ?? metadata.type;
    this.priority = settings.priority ?? metadata.priority;
    this.enabled = settings.enabled ?? true;
  }

  get isHard(): boolean {
    return this.type === 'hard';
  }

  get severity(): Severity {
    return this.isHard ? 'error' : 'warning';
  }

  abstract check(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): boolean;

  abstract validate(schedule: ScheduleGrid, school: SchoolModel): ConstraintResult;

  /** Human-readable reason for a placement `check` refused. */
  rejectionReason(
    _schedule: ScheduleGrid,
    _school: SchoolModel,
    timeSlot: TimeSlot,
    assignment: Assignment
  ): string {
    return `${this.name}: ${assignment.subject} for ${formatClassRef(assignment.classRef)} at ${formatTimeSlot(timeSlot)} is not allowed`;
  }

  toString(): string {
    return `${this.name} (${this.type}, priority ${this.priority})`;
  }

  protected violation(description: string, timeSlot: TimeSlot, assignment: Assignment): ConstraintViolation {
    return {
      constraintName: this.name,
      description,
      timeSlot,
      assignment,
      severity: this.severity,
    };
  }

  protected result(violations: ConstraintViolation[], subject: string): ConstraintResult {
    return {
      constraintName: this.name,
      violations,
      message:
        violations.length === 0
          ? `${this.name}: ${subject} OK`
          : `${this.name}: ${violations.length} violation${violations.length === 1 ? '' : 's'} (${subject})`,
    };
  }
}

/** Higher priority first; equal priorities keep registration order. */
export function sortByPriority<T extends Constraint>(constraints: readonly T[]): T[] {
  return constraints
    .map((constraint, index) => ({ constraint, index }))
    .sort(
      (a, b) =>
        PRIORITY_WEIGHTS[b.constraint.priority] - PRIORITY_WEIGHTS[a.constraint.priority] || a.index - b.index
    )
    .map(entry => entry.constraint);
}

/** Roster classes plus any class the grid holds that the roster lacks, in class order. */
export function classesToAudit(schedule: ScheduleGrid, school: SchoolModel): ClassRef[] {
  const extra = schedule.getClasses().filter(classRef => !school.hasClass(classRef));
  return [...school.classes, ...extra].sort(compareClassRefs);
}
