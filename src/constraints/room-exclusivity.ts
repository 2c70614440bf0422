/**
 * Room Exclusivity
 *
 * Shared-resource subjects (PE: one gymnasium) may run in several classes
 * at once only as one sanctioned shared lesson: a joint cohort, or an
 * exchange class with its parent.
 */

import type { Assignment, ConstraintResult, ConstraintSettings, ConstraintViolation, TimeSlot } from '../types/index.js';
import { formatClassRef, sameClass } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { allTimeSlots, formatTimeSlot } from '../model/time-slot.js';
import { Constraint } from './base.js';
import { formsSharedLesson } from './shared-lessons.js';

export class RoomExclusivityConstraint extends Constraint {
  constructor(settings: ConstraintSettings = {}) {
    super(
      {
        name: 'RoomExclusivity',
        description: 'Shared facilities host one lesson at a time, joint sessions excepted',
        type: 'hard',
        priority: 'critical',
      },
      settings
    );
  }

  check(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): boolean {
    if (!school.isSharedResourceSubject(assignment.subject)) return true;
    const occupants = this.otherOccupants(schedule, school, timeSlot, assignment);
    if (occupants.length === 0) return true;
    return formsSharedLesson([...occupants.map(a => a.classRef), assignment.classRef], school);
  }

  rejectionReason(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): string {
    const occupants = this.otherOccupants(schedule, school, timeSlot, assignment);
    return (
      `Shared facility for ${assignment.subject} is taken on ${formatTimeSlot(timeSlot)} by ` +
      `${occupants.map(a => `${formatClassRef(a.classRef)} (${a.subject})`).join(', ')}; ` +
      `${formatClassRef(assignment.classRef)} is not part of that joint session`
    );
  }

  validate(schedule: ScheduleGrid, school: SchoolModel): ConstraintResult {
    const violations: ConstraintViolation[] = [];

    for (const timeSlot of allTimeSlots()) {
      const occupants = schedule.getAssignmentsAt(timeSlot).filter(a => school.isSharedResourceSubject(a.subject));
      if (occupants.length <= 1) continue;

      const classes = occupants.map(a => a.classRef);
      if (formsSharedLesson(classes, school)) continue;

      const labels = classes.map(formatClassRef).join(', ');
      for (const assignment of occupants) {
        violations.push(
          this.violation(
            `${occupants.length} classes use the shared facility at once on ${formatTimeSlot(timeSlot)} ` +
              `(not a joint session): ${labels}`,
            timeSlot,
            assignment
          )
        );
      }
    }

    return this.result(violations, 'shared facility usage');
  }

  private otherOccupants(
    schedule: ScheduleGrid,
    school: SchoolModel,
    timeSlot: TimeSlot,
    assignment: Assignment
  ): Assignment[] {
    return schedule
      .getAssignmentsAt(timeSlot)
      .filter(a => school.isSharedResourceSubject(a.subject) && !sameClass(a.classRef, assignment.classRef));
  }
}
