/**
 * Shared test fixtures: a small school with one joint cohort, one exchange
 * pair, an absent teacher and a test period.
 */

import type { Assignment, Day, TimeSlot } from '../types/index.js';
import { parseClassRef } from '../model/class-ref.js';
import { SchoolModel, type SchoolModelInput } from '../model/school-model.js';
import { createTimeSlot } from '../model/time-slot.js';

export const cls = parseClassRef;

export function slot(day: Day, period: number): TimeSlot {
  return createTimeSlot(day, period);
}

export function lesson(classLabel: string, subject: string, teacher?: string): Assignment {
  return { classRef: cls(classLabel), subject, teacher: teacher ? { name: teacher } : null };
}

const CLASSES = ['1-1', '1-2', '1-5', '2-1', '2-2', '2-5', '3-1', '3-2', '3-3', '3-5', '3-6'];

const TEACHING: Array<[teacher: string, subject: string, classes: string[]]> = [
  ['Inoue', 'Math', ['2-1', '2-2']],
  ['Kato', 'Science', ['3-1', '3-2']],
  ['Tsukamoto', 'Music', ['1-5', '2-5', '3-5']],
  ['Yamada', 'Math', ['3-3', '3-6']],
  ['Kimura', 'English', ['3-3', '3-6']],
  ['Shimizu', 'Art', ['3-3']],
  ['Suzuki', 'PE', ['1-1', '1-2', '2-1']],
  ['Hayashi', 'Independent Activity', ['3-6']],
];

export function buildSchool(overrides: Partial<SchoolModelInput> = {}): SchoolModel {
  return new SchoolModel({
    classes: CLASSES.map(cls),
    subjects: ['Math', 'Science', 'Music', 'English', 'Art', 'PE', 'Independent Activity'],
    teacherAssignments: TEACHING.flatMap(([teacher, subject, classes]) =>
      classes.map(label => ({ teacher: { name: teacher }, subject, classRef: cls(label) }))
    ),
    absences: [{ teacher: 'Inoue', day: 'Tue', periods: 'all' }],
    exchangePairs: [{ exchangeClass: cls('3-6'), parentClass: cls('3-3'), allowedParentSubjects: ['Math', 'English'] }],
    jointCohorts: [{ name: 'Grade 5 Music', classes: [cls('1-5'), cls('2-5'), cls('3-5')] }],
    testPeriods: [slot('Fri', 1)],
    placeholderTeachers: ['TBA'],
    ...overrides,
  });
}
