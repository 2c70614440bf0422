/**
 * Standard constraint set
 */

import type { ConstraintSettings } from '../types/index.js';
import type { AbsenceRepository } from '../model/absence-repository.js';
import type { SchoolModel } from '../model/school-model.js';
import type { Constraint } from './base.js';
import { DailyDuplicationConstraint, gridDailySubjectIndex, type DailySubjectIndex } from './daily-duplication.js';
import { ExchangeClassSyncConstraint } from './exchange-class-sync.js';
import { FixedSubjectProtectionConstraint } from './fixed-subject-protection.js';
import { RoomExclusivityConstraint } from './room-exclusivity.js';
import { TeacherAbsenceConstraint } from './teacher-absence.js';
import { TeacherDoubleBookingConstraint } from './teacher-double-booking.js';
import { TeacherQualificationConstraint } from './teacher-qualification.js';

export { Constraint, PRIORITY_WEIGHTS, sortByPriority, classesToAudit, type ConstraintMetadata } from './base.js';
export { DailyDuplicationConstraint, gridDailySubjectIndex, type DailySubjectIndex } from './daily-duplication.js';
export { ExchangeClassSyncConstraint } from './exchange-class-sync.js';
export { FixedSubjectProtectionConstraint } from './fixed-subject-protection.js';
export { RoomExclusivityConstraint } from './room-exclusivity.js';
export { TeacherAbsenceConstraint } from './teacher-absence.js';
export { TeacherDoubleBookingConstraint } from './teacher-double-booking.js';
export { TeacherQualificationConstraint } from './teacher-qualification.js';
export { countLogicalLessons, formsSharedLesson, isTestProctoring } from './shared-lessons.js';

export const CONSTRAINT_NAMES = [
  'FixedSubjectProtection',
  'DailyDuplication',
  'TeacherAbsence',
  'TeacherDoubleBooking',
  'ExchangeClassSync',
  'RoomExclusivity',
  'TeacherQualification',
] as const;

export type ConstraintName = (typeof CONSTRAINT_NAMES)[number];

export interface DefaultConstraintOptions {
  settings?: Partial<Record<ConstraintName, ConstraintSettings>>;
  /** Defaults to the school's own absence repository. */
  absences?: AbsenceRepository;
  dailySubjects?: DailySubjectIndex;
}

export function createDefaultConstraints(school: SchoolModel, options: DefaultConstraintOptions = {}): Constraint[] {
  const settings = options.settings ?? {};

  return [
    new FixedSubjectProtectionConstraint(settings.FixedSubjectProtection),
    new DailyDuplicationConstraint(settings.DailyDuplication, options.dailySubjects ?? gridDailySubjectIndex),
    new TeacherAbsenceConstraint(options.absences ?? school.absences, settings.TeacherAbsence),
    new TeacherDoubleBookingConstraint(settings.TeacherDoubleBooking),
    new ExchangeClassSyncConstraint(settings.ExchangeClassSync),
    new RoomExclusivityConstraint(settings.RoomExclusivity),
    new TeacherQualificationConstraint(settings.TeacherQualification),
  ];
}
