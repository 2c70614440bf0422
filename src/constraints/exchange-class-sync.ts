/**
 * Exchange Class Sync
 *
 * An exchange class mirrors its parent class slot for slot, except while it
 * does one of its independent subjects; then the parent must be in one of
 * the subjects allowed alongside it. A protected subject in the exchange
 * class is exempt; a protected subject in the parent is not, so the
 * exchange class has to hold the same one.
 *
 * `check` judges both directions: an exchange-class placement against the
 * parent's lesson, and a parent placement against the lessons its exchange
 * classes already hold. It defers when the other side is still empty.
 * `validate` audits the settled grid and also reports an exchange-class
 * lesson with no parent lesson.
 */

import type { Assignment, ConstraintResult, ConstraintSettings, ConstraintViolation, TimeSlot } from '../types/index.js';
import { formatClassRef } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { allTimeSlots, formatTimeSlot } from '../model/time-slot.js';
import { Constraint } from './base.js';

export class ExchangeClassSyncConstraint extends Constraint {
  constructor(settings: ConstraintSettings = {}) {
    super(
      {
        name: 'ExchangeClassSync',
        description: 'Exchange classes follow their parent class except during independent activities',
        type: 'hard',
        priority: 'critical',
      },
      settings
    );
  }

  check(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): boolean {
    return this.findMismatch(schedule, school, timeSlot, assignment) === undefined;
  }

  rejectionReason(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): string {
    const mismatch = this.findMismatch(schedule, school, timeSlot, assignment);
    if (!mismatch) return super.rejectionReason(schedule, school, timeSlot, assignment);
    return this.describeMismatch(school, timeSlot, mismatch.exchange, mismatch.parent);
  }

  validate(schedule: ScheduleGrid, school: SchoolModel): ConstraintResult {
    const violations: ConstraintViolation[] = [];
    const pairs = school.getExchangePairs();

    for (const timeSlot of allTimeSlots()) {
      for (const { exchangeClass, parentClass } of pairs) {
        const exchange = schedule.getAssignment(timeSlot, exchangeClass);
        if (!exchange || school.isProtectedSubject(exchange.subject)) continue;

        const parent = schedule.getAssignment(timeSlot, parentClass);
        if (!parent) {
          if (!school.isIndependentSubject(exchange.subject)) {
            violations.push(
              this.violation(
                `${formatClassRef(exchangeClass)} has ${exchange.subject} on ${formatTimeSlot(timeSlot)} ` +
                  `but parent class ${formatClassRef(parentClass)} has no lesson`,
                timeSlot,
                exchange
              )
            );
          }
          continue;
        }

        if (!this.inSync(school, exchange, parent)) {
          violations.push(this.violation(this.describeMismatch(school, timeSlot, exchange, parent), timeSlot, exchange));
        }
      }
    }

    return this.result(violations, 'exchange class synchronization');
  }

  /** The first exchange/parent pair the placement would leave out of sync. */
  private findMismatch(
    schedule: ScheduleGrid,
    school: SchoolModel,
    timeSlot: TimeSlot,
    assignment: Assignment
  ): { exchange: Assignment; parent: Assignment } | undefined {
    const parentClass = school.getParentClass(assignment.classRef);
    if (parentClass) {
      const parent = schedule.getAssignment(timeSlot, parentClass);
      if (parent && !this.inSync(school, assignment, parent)) return { exchange: assignment, parent };
    }

    for (const exchangeClass of school.getExchangeClasses(assignment.classRef)) {
      const exchange = schedule.getAssignment(timeSlot, exchangeClass);
      if (exchange && !this.inSync(school, exchange, assignment)) return { exchange, parent: assignment };
    }
    return undefined;
  }

  private inSync(school: SchoolModel, exchange: Assignment, parent: Assignment): boolean {
    if (school.isProtectedSubject(exchange.subject)) return true;
    if (school.isIndependentSubject(exchange.subject)) {
      return school.getAllowedParentSubjects(exchange.classRef).includes(parent.subject);
    }
    return exchange.subject === parent.subject;
  }

  private describeMismatch(school: SchoolModel, timeSlot: TimeSlot, exchange: Assignment, parent: Assignment): string {
    const exchangeLabel = formatClassRef(exchange.classRef);
    const parentLabel = formatClassRef(parent.classRef);

    if (school.isIndependentSubject(exchange.subject)) {
      const allowed = school.getAllowedParentSubjects(exchange.classRef);
      return (
        `${exchangeLabel} has ${exchange.subject} on ${formatTimeSlot(timeSlot)}, which needs ${parentLabel} ` +
        `to have ${allowed.length > 0 ? allowed.join('/') : 'no lesson'}, but ${parentLabel} has ${parent.subject}`
      );
    }
    return (
      `${exchangeLabel} has ${exchange.subject} on ${formatTimeSlot(timeSlot)} ` +
      `but parent class ${parentLabel} has ${parent.subject}`
    );
  }
}
