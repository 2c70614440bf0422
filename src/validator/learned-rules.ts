/**
 * Learned rules
 *
 * Ad-hoc business rules picked up from the question/answer log. They are
 * consulted before the standard constraint set, each with its own
 * short-circuit, and stay out of the Constraint hierarchy because they
 * change often.
 */

import type { Assignment, ConstraintViolation, TimeSlot } from '../types/index.js';
import { formatClassRef, sameClass } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { formatTimeSlot, sameSlot } from '../model/time-slot.js';

export interface LearnedRule {
  name: string;
  /** True when placing `assignment` at `timeSlot` must be rejected. */
  condition(schedule: ScheduleGrid, school: SchoolModel, timeSlot: TimeSlot, assignment: Assignment): boolean;
  rejectMessage: string;
  /** Standing violations of the rule, for full-schedule audits. */
  audit?(schedule: ScheduleGrid, school: SchoolModel): ConstraintViolation[];
}

export interface TeacherSlotLimit {
  teacher: string;
  timeSlot: TimeSlot;
  maxClasses: number;
  description?: string;
}

/** "Teacher X may teach at most N classes in slot Y." */
export function teacherSlotLimitRule(limit: TeacherSlotLimit): LearnedRule {
  const name = `TeacherSlotLimit(${limit.teacher}@${limit.timeSlot.day}-${limit.timeSlot.period})`;
  const plural = limit.maxClasses === 1 ? 'class' : 'classes';
  const rejectMessage =
    limit.description ??
    `${limit.teacher} may teach at most ${limit.maxClasses} ${plural} on ${formatTimeSlot(limit.timeSlot)}`;

  const classesTaught = (schedule: ScheduleGrid, school: SchoolModel): Assignment[] =>
    schedule
      .getAssignmentsAt(limit.timeSlot)
      .filter(a => school.resolveTeacher(a)?.name === limit.teacher);

  return {
    name,
    rejectMessage,
    condition(schedule, school, timeSlot, assignment) {
      if (!sameSlot(timeSlot, limit.timeSlot)) return false;
      if (school.resolveTeacher(assignment)?.name !== limit.teacher) return false;
      const others = classesTaught(schedule, school).filter(a => !sameClass(a.classRef, assignment.classRef));
      return others.length >= limit.maxClasses;
    },
    audit(schedule, school) {
      const taught = classesTaught(schedule, school);
      if (taught.length <= limit.maxClasses) return [];
      return [
        {
          constraintName: name,
          description:
            `${limit.teacher} teaches ${taught.length} classes on ${formatTimeSlot(limit.timeSlot)} ` +
            `(${taught.map(a => formatClassRef(a.classRef)).join(', ')}); the limit is ${limit.maxClasses}`,
          timeSlot: limit.timeSlot,
          assignment: taught[0],
          severity: 'error',
        },
      ];
    },
  };
}
