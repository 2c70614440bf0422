/**
 * Teacher Qualification (soft)
 *
 * Warns when an assignment names a teacher the eligibility table does not
 * give for that subject and class. Assignments without an explicit teacher,
 * and subject/class pairs the table does not cover, are not judged.
 */

import type { Assignment, ConstraintResult, ConstraintSettings, ConstraintViolation, TimeSlot } from '../types/index.js';
import { formatClassRef } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { formatTimeSlot } from '../model/time-slot.js';
import { Constraint } from './base.js';

export class TeacherQualificationConstraint extends Constraint {
  constructor(settings: ConstraintSettings = {}) {
    super(
      {
        name: 'TeacherQualification',
        description: 'Teachers should teach the subjects and classes they are assigned to',
        type: 'soft',
        priority: 'medium',
      },
      settings
    );
  }

  check(_schedule: ScheduleGrid, school: SchoolModel, _timeSlot: TimeSlot, assignment: Assignment): boolean {
    const { teacher } = assignment;
    if (!teacher || school.isPlaceholderTeacher(teacher)) return true;
    const expected = school.getAssignedTeacher(assignment.subject, assignment.classRef);
    return !expected || expected.name === teacher.name;
  }

  rejectionReason(_schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): string {
    const expected = school.getAssignedTeacher(assignment.subject, assignment.classRef);
    return (
      `${assignment.teacher?.name ?? 'Teacher'} is not assigned to ${assignment.subject} for ` +
      `${formatClassRef(assignment.classRef)} (expected ${expected?.name ?? 'nobody'}) on ${formatTimeSlot(timeSlot)}`
    );
  }

  validate(schedule: ScheduleGrid, school: SchoolModel): ConstraintResult {
    const violations: ConstraintViolation[] = [];

    for (const { timeSlot, assignment } of schedule.getAllAssignments()) {
      if (this.check(schedule, school, timeSlot, assignment)) continue;
      violations.push(this.violation(this.rejectionReason(schedule, school, timeSlot, assignment), timeSlot, assignment));
    }

    return this.result(violations, 'teacher qualifications');
  }
}
