/**
 * Sanctioned shared lessons
 *
 * Two patterns let several classes legitimately share one teacher or one
 * room in the same slot: a joint cohort running one combined lesson (every
 * class on the same subject, when a teacher is shared), and an
 * exchange class sitting with its parent class (mirroring the parent's
 * lesson, or doing its independent activity alongside it).
 */

import type { Assignment, ClassRef, TimeSlot } from '../types/index.js';
import { sameClass } from '../model/class-ref.js';
import type { SchoolModel } from '../model/school-model.js';

/** Joint-cohort subset, or exactly one exchange/parent pair. */
export function formsSharedLesson(classes: readonly ClassRef[], school: SchoolModel): boolean {
  if (classes.length <= 1) return true;
  if (school.inSameCohort(classes)) return true;
  return classes.length === 2 && school.isExchangePair(classes[0], classes[1]);
}

function sharesTeacherLegitimately(a: Assignment, b: Assignment, school: SchoolModel): boolean {
  if (school.inSameCohort([a.classRef, b.classRef])) return a.subject === b.subject;
  if (!school.isExchangePair(a.classRef, b.classRef)) return false;

  const parentOfA = school.getParentClass(a.classRef);
  const [exchange, parent] = parentOfA && sameClass(parentOfA, b.classRef) ? [a, b] : [b, a];
  return school.isIndependentSubject(exchange.subject) || exchange.subject === parent.subject;
}

/**
 * Number of distinct lessons one teacher is giving when the given
 * assignments all resolve to them. Classes linked by a sanctioned pattern
 * count as one lesson.
 */
export function countLogicalLessons(assignments: readonly Assignment[], school: SchoolModel): number {
  const parent = assignments.map((_, index) => index);
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  for (let i = 0; i < assignments.length; i++) {
    for (let j = i + 1; j < assignments.length; j++) {
      if (sharesTeacherLegitimately(assignments[i], assignments[j], school)) {
        parent[find(i)] = find(j);
      }
    }
  }

  return new Set(assignments.map((_, index) => find(index))).size;
}

/** During a test period one teacher may proctor several classes of a grade sitting the same paper. */
export function isTestProctoring(timeSlot: TimeSlot, assignments: readonly Assignment[], school: SchoolModel): boolean {
  if (!school.isTestPeriod(timeSlot) || assignments.length === 0) return false;
  const { grade } = assignments[0].classRef;
  const { subject } = assignments[0];
  return assignments.every(a => a.classRef.grade === grade && a.subject === subject);
}
