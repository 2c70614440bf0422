/**
 * Core domain types for timetable constraint validation
 */

// Time representation
export type Day = 'Mon' | 'Tue' | 'Wed' | 'Thu' | 'Fri';

export interface TimeSlot {
  readonly day: Day;
  readonly period: number; // 1-6
}

// Core entities
export interface ClassRef {
  readonly grade: number;
  readonly classNumber: number;
}

export type Subject = string;

export interface Teacher {
  readonly name: string;
}

export interface Assignment {
  readonly classRef: ClassRef;
  readonly subject: Subject;
  readonly teacher: Teacher | null;
}

export interface PlacedAssignment {
  timeSlot: TimeSlot;
  assignment: Assignment;
}

// Reference data
export interface TeacherAssignment {
  teacher: Teacher;
  subject: Subject;
  classRef: ClassRef;
}

export interface AbsenceEntry {
  teacher: string;
  day: Day;
  periods: number[] | 'all';
  reason?: string;
}

export interface ExchangePair {
  exchangeClass: ClassRef;
  parentClass: ClassRef;
  allowedParentSubjects: Subject[];
}

export interface JointCohort {
  name: string;
  classes: ClassRef[];
}

export interface SchoolData {
  classes: ClassRef[];
  subjects: Subject[];
  teacherAssignments: TeacherAssignment[];
  absences: AbsenceEntry[];
  exchangePairs: ExchangePair[];
  jointCohorts: JointCohort[];
  protectedSubjects: Subject[];
  independentSubjects: Subject[];
  sharedResourceSubjects: Subject[];
  testPeriods: TimeSlot[];
  placeholderTeachers: string[];
}

// Constraint metadata
export type ConstraintType = 'hard' | 'soft';

export type ConstraintPriority = 'critical' | 'high' | 'medium' | 'low' | 'suggestion';

export type Severity = 'error' | 'warning';

export interface ConstraintSettings {
  enabled?: boolean;
  type?: ConstraintType;
  priority?: ConstraintPriority;
}

// Validation results
export interface ConstraintViolation {
  constraintName: string;
  description: string;
  timeSlot: TimeSlot;
  assignment: Assignment;
  severity: Severity;
}

export interface ConstraintResult {
  constraintName: string;
  violations: ConstraintViolation[];
  message: string;
}

export interface CheckResult {
  ok: boolean;
  reason: string | null;
  constraintName: string | null;
  warnings: string[];
}

export interface ScheduleValidation {
  valid: boolean;
  results: ConstraintResult[];
  hardViolations: ConstraintViolation[];
  softViolations: ConstraintViolation[];
  score: number;
  summary: string;
}

// Progress and event reporting
export interface ProgressCallback {
  (progress: ProgressReport): void;
}

export interface ProgressReport {
  phase: 'auditing' | 'complete';
  percentComplete: number;
  currentOperation: string;
  stats?: {
    constraintsChecked?: number;
    violationsFound?: number;
  };
}

export type ValidatorEvent =
  | { kind: 'blocked'; constraintName: string; timeSlot: TimeSlot; assignment: Assignment; reason: string }
  | { kind: 'warning'; constraintName: string; timeSlot: TimeSlot; assignment: Assignment; reason: string }
  | { kind: 'learned-rule'; ruleName: string; timeSlot: TimeSlot; assignment: Assignment; reason: string };

export interface ValidatorEventCallback {
  (event: ValidatorEvent): void;
}
