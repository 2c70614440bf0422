/**
 * Teacher Double Booking
 *
 * One teacher cannot give two different lessons in the same slot. Joint
 * cohorts and exchange/parent pairings count as a single lesson, placeholder
 * teachers never conflict, and a test period lets one teacher proctor
 * several classes of a grade sitting the same subject.
 */

import type { Assignment, ConstraintResult, ConstraintSettings, ConstraintViolation, TimeSlot } from '../types/index.js';
import { formatClassRef, sameClass } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { allTimeSlots, formatTimeSlot } from '../model/time-slot.js';
import { Constraint } from './base.js';
import { countLogicalLessons, isTestProctoring } from './shared-lessons.js';

export class TeacherDoubleBookingConstraint extends Constraint {
  constructor(settings: ConstraintSettings = {}) {
    super(
      {
        name: 'TeacherDoubleBooking',
        description: 'A teacher cannot teach two different lessons at the same time',
        type: 'hard',
        priority: 'critical',
      },
      settings
    );
  }

  check(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): boolean {
    const others = this.sameTeacherElsewhere(schedule, school, timeSlot, assignment);
    if (others.length === 0) return true;
    return this.isAllowed(timeSlot, [...others, assignment], school);
  }

  rejectionReason(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): string {
    const teacher = school.resolveTeacher(assignment);
    const others = this.sameTeacherElsewhere(schedule, school, timeSlot, assignment);
    return (
      `${teacher?.name ?? 'Teacher'} already teaches ${describe(others)} on ${formatTimeSlot(timeSlot)}`
    );
  }

  validate(schedule: ScheduleGrid, school: SchoolModel): ConstraintResult {
    const violations: ConstraintViolation[] = [];

    for (const timeSlot of allTimeSlots()) {
      const byTeacher = new Map<string, Assignment[]>();
      for (const assignment of schedule.getAssignmentsAt(timeSlot)) {
        const teacher = school.resolveTeacher(assignment);
        if (!teacher || school.isPlaceholderTeacher(teacher)) continue;
        const list = byTeacher.get(teacher.name) || [];
        list.push(assignment);
        byTeacher.set(teacher.name, list);
      }

      for (const [teacherName, assignments] of byTeacher) {
        if (assignments.length <= 1 || this.isAllowed(timeSlot, assignments, school)) continue;
        // Once per teacher per slot
        violations.push(
          this.violation(
            `${teacherName} teaches ${assignments.length} classes at once on ${formatTimeSlot(timeSlot)}: ` +
              describe(assignments),
            timeSlot,
            assignments[0]
          )
        );
      }
    }

    return this.result(violations, 'teacher double booking');
  }

  private sameTeacherElsewhere(
    schedule: ScheduleGrid,
    school: SchoolModel,
    timeSlot: TimeSlot,
    assignment: Assignment
  ): Assignment[] {
    const teacher = school.resolveTeacher(assignment);
    if (!teacher || school.isPlaceholderTeacher(teacher)) return [];

    return schedule
      .getAssignmentsAt(timeSlot)
      .filter(
        existing =>
          !sameClass(existing.classRef, assignment.classRef) &&
          school.resolveTeacher(existing)?.name === teacher.name
      );
  }

  private isAllowed(timeSlot: TimeSlot, assignments: readonly Assignment[], school: SchoolModel): boolean {
    return isTestProctoring(timeSlot, assignments, school) || countLogicalLessons(assignments, school) <= 1;
  }
}

function describe(assignments: readonly Assignment[]): string {
  return assignments.map(a => `${formatClassRef(a.classRef)} (${a.subject})`).join(', ');
}
