/**
 * Teacher Absence
 *
 * A teacher marked absent for a slot may not teach in it. The teacher is the
 * assignment's own, or the one the school's eligibility table gives for the
 * subject and class. When neither is known the rule has nothing to judge and
 * passes.
 */

import type { Assignment, ConstraintResult, ConstraintSettings, ConstraintViolation, TimeSlot } from '../types/index.js';
import type { AbsenceRepository } from '../model/absence-repository.js';
import { formatClassRef } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { allTimeSlots, formatTimeSlot } from '../model/time-slot.js';
import { Constraint } from './base.js';

export class TeacherAbsenceConstraint extends Constraint {
  private readonly absences: AbsenceRepository;

  constructor(absences: AbsenceRepository, settings: ConstraintSettings = {}) {
    super(
      {
        name: 'TeacherAbsence',
        description: 'Absent teachers cannot be scheduled',
        type: 'hard',
        priority: 'critical',
      },
      settings
    );
    this.absences = absences;
  }

  check(_schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): boolean {
    const teacher = school.resolveTeacher(assignment);
    if (!teacher) return true;
    return !this.absences.isAbsent(teacher.name, timeSlot);
  }

  rejectionReason(_schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): string {
    const teacher = school.resolveTeacher(assignment);
    return `${teacher?.name ?? 'Teacher'} absent on ${formatTimeSlot(timeSlot)}`;
  }

  validate(schedule: ScheduleGrid, school: SchoolModel): ConstraintResult {
    const violations: ConstraintViolation[] = [];

    for (const timeSlot of allTimeSlots()) {
      const absent = this.absences.getAbsentTeachers(timeSlot);
      if (absent.size === 0) continue;

      for (const assignment of schedule.getAssignmentsAt(timeSlot)) {
        const teacher = school.resolveTeacher(assignment);
        if (!teacher || !absent.has(teacher.name)) continue;

        violations.push(
          this.violation(
            `${teacher.name} absent on ${formatTimeSlot(timeSlot)} but teaches ` +
              `${assignment.subject} to ${formatClassRef(assignment.classRef)}`,
            timeSlot,
            assignment
          )
        );
      }
    }

    return this.result(violations, 'teacher absences');
  }
}
