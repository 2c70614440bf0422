/**
 * Daily Duplication
 *
 * A class may not have the same non-protected subject in more than one
 * period of a day.
 */

import type { Assignment, ClassRef, ConstraintResult, ConstraintSettings, ConstraintViolation, Day, Subject, TimeSlot } from '../types/index.js';
import { formatClassRef } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { DAYS, DAY_NAMES, createTimeSlot } from '../model/time-slot.js';
import { Constraint, classesToAudit } from './base.js';

/** Where a subject sits in one class's day. Lets a cache stand in for a grid scan. */
export interface DailySubjectIndex {
  periodsOf(schedule: ScheduleGrid, classRef: ClassRef, day: Day, subject: Subject): readonly number[];
}

export const gridDailySubjectIndex: DailySubjectIndex = {
  periodsOf(schedule, classRef, day, subject) {
    const periods: number[] = [];
    schedule.getDayRow(classRef, day).forEach((assignment, index) => {
      if (assignment?.subject === subject) periods.push(index + 1);
    });
    return periods;
  },
};

export class DailyDuplicationConstraint extends Constraint {
  private readonly index: DailySubjectIndex;

  constructor(settings: ConstraintSettings = {}, index: DailySubjectIndex = gridDailySubjectIndex) {
    super(
      {
        name: 'DailyDuplication',
        description: 'A class may not have the same subject more than once a day',
        type: 'hard',
        priority: 'critical',
      },
      settings
    );
    this.index = index;
  }

  /** The target period itself is ignored, so re-confirming a placement is not a conflict. */
  check(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): boolean {
    if (school.isProtectedSubject(assignment.subject)) return true;
    return this.otherPeriods(schedule, timeSlot, assignment).length === 0;
  }

  rejectionReason(schedule: ScheduleGrid, _school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): string {
    const periods = this.otherPeriods(schedule, timeSlot, assignment);
    return (
      `${formatClassRef(assignment.classRef)} already has ${assignment.subject} on ${DAY_NAMES[timeSlot.day]} ` +
      `(period${periods.length === 1 ? '' : 's'} ${periods.join(', ')})`
    );
  }

  validate(schedule: ScheduleGrid, school: SchoolModel): ConstraintResult {
    const violations: ConstraintViolation[] = [];

    for (const classRef of classesToAudit(schedule, school)) {
      for (const day of DAYS) {
        const occurrences = new Map<Subject, { periods: number[]; first: Assignment }>();

        schedule.getDayRow(classRef, day).forEach((assignment, index) => {
          if (!assignment || school.isProtectedSubject(assignment.subject)) return;
          const entry = occurrences.get(assignment.subject);
          if (entry) {
            entry.periods.push(index + 1);
          } else {
            occurrences.set(assignment.subject, { periods: [index + 1], first: assignment });
          }
        });

        for (const [subject, { periods, first }] of occurrences) {
          if (periods.length <= 1) continue;
          violations.push(
            this.violation(
              `${formatClassRef(classRef)} has ${subject} ${periods.length} times on ${DAY_NAMES[day]} ` +
                `(periods ${periods.join(', ')})`,
              createTimeSlot(day, periods[0]),
              first
            )
          );
        }
      }
    }

    return this.result(violations, 'daily subject duplication');
  }

  private otherPeriods(schedule: ScheduleGrid, timeSlot: TimeSlot, assignment: Assignment): number[] {
    return this.index
      .periodsOf(schedule, assignment.classRef, timeSlot.day, assignment.subject)
      .filter(period => period !== timeSlot.period);
  }
}
