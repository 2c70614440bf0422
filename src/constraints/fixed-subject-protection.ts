/**
 * Fixed Subject Protection
 *
 * Cells imported as fixed (protected subjects, explicit locks, test-period
 * slots) are never overwritten. The grid itself refuses such writes; this
 * constraint gives the validator a reason before the write is attempted and
 * audits the locks the import should have left behind. Test periods belong
 * to the imported tests, so nothing new is placed in them.
 */

import type { Assignment, ConstraintResult, ConstraintSettings, ConstraintViolation, TimeSlot } from '../types/index.js';
import { formatClassRef } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { formatTimeSlot } from '../model/time-slot.js';
import { Constraint } from './base.js';

export class FixedSubjectProtectionConstraint extends Constraint {
  constructor(settings: ConstraintSettings = {}) {
    super(
      {
        name: 'FixedSubjectProtection',
        description: 'Fixed subjects and locked cells cannot be overwritten',
        type: 'hard',
        priority: 'critical',
      },
      settings
    );
  }

  check(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): boolean {
    return !schedule.isLocked(timeSlot, assignment.classRef) && !school.isTestPeriod(timeSlot);
  }

  rejectionReason(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): string {
    const label = `${formatClassRef(assignment.classRef)} on ${formatTimeSlot(timeSlot)}`;
    if (schedule.isLocked(timeSlot, assignment.classRef)) {
      const existing = schedule.getAssignment(timeSlot, assignment.classRef);
      return existing ? `${label} is fixed to ${existing.subject}` : `${label} is locked`;
    }
    if (school.isTestPeriod(timeSlot)) return `${label} is a test period`;
    return super.rejectionReason(schedule, school, timeSlot, assignment);
  }

  validate(schedule: ScheduleGrid, school: SchoolModel): ConstraintResult {
    const violations: ConstraintViolation[] = [];

    for (const { timeSlot, classRef } of schedule.lockedCells()) {
      if (schedule.getAssignment(timeSlot, classRef)) continue;
      violations.push(
        this.violation(
          `${formatClassRef(classRef)} on ${formatTimeSlot(timeSlot)} is locked but empty`,
          timeSlot,
          { classRef, subject: '', teacher: null }
        )
      );
    }

    for (const timeSlot of school.getTestPeriods()) {
      for (const assignment of schedule.getAssignmentsAt(timeSlot)) {
        if (schedule.isLocked(timeSlot, assignment.classRef)) continue;
        violations.push(
          this.violation(
            `${formatClassRef(assignment.classRef)} on ${formatTimeSlot(timeSlot)} is a test period ` +
              `but ${assignment.subject} is not locked`,
            timeSlot,
            assignment
          )
        );
      }
    }

    return this.result(violations, 'fixed subjects and locks');
  }
}
