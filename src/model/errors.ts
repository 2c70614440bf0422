/**
 * Error types
 *
 * Rule failures are reported as data (CheckResult, ConstraintViolation).
 * These are reserved for refused mutations and programmer/configuration errors.
 */

import type { ClassRef, TimeSlot } from '../types/index.js';

export class TimetableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidAssignmentError extends TimetableError {
  readonly timeSlot: TimeSlot;
  readonly classRef: ClassRef;

  constructor(message: string, timeSlot: TimeSlot, classRef: ClassRef) {
    super(message);
    this.timeSlot = timeSlot;
    this.classRef = classRef;
  }
}

export class InvalidTimeSlotError extends TimetableError {}

export class SchoolConfigurationError extends TimetableError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.issues = issues;
  }
}
