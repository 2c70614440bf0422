/**
 * School Model
 *
 * Static reference data shared by every constraint during a run: the class
 * and subject rosters, who teaches what to whom, the absence calendar,
 * exchange-class pairings, joint cohorts, protected subjects and the
 * test-period calendar. Read-only once constructed.
 */

import type {
  AbsenceEntry,
  Assignment,
  ClassRef,
  ExchangePair,
  JointCohort,
  SchoolData,
  Subject,
  Teacher,
  TeacherAssignment,
  TimeSlot,
} from '../types/index.js';
import { InMemoryAbsenceRepository, type AbsenceRepository } from './absence-repository.js';
import { classKey, compareClassRefs, formatClassRef, sameClass } from './class-ref.js';
import { SchoolConfigurationError } from './errors.js';
import { ScheduleGrid } from './schedule-grid.js';
import { assertValidTimeSlot, compareTimeSlots, slotKey } from './time-slot.js';

export const DEFAULT_PROTECTED_SUBJECTS: readonly Subject[] = ['Assembly', 'Homeroom', 'Moral Education', 'Test'];
export const DEFAULT_INDEPENDENT_SUBJECTS: readonly Subject[] = ['Independent Activity'];
export const DEFAULT_SHARED_RESOURCE_SUBJECTS: readonly Subject[] = ['PE'];

export type SchoolModelInput = Partial<SchoolData> & Pick<SchoolData, 'classes'>;

export interface SchoolModelOptions {
  /** Replaces the repository built from `absences`. */
  absenceRepository?: AbsenceRepository;
}

export class SchoolModel {
  readonly classes: readonly ClassRef[];
  readonly subjects: readonly Subject[];
  readonly absences: AbsenceRepository;

  private readonly classIndex = new Map<string, ClassRef>();
  // `${subject}|${classKey}` -> teacher
  private readonly assignedTeachers = new Map<string, Teacher>();
  private readonly teacherNames = new Set<string>();
  private readonly absenceEntries: readonly AbsenceEntry[];
  private readonly exchangePairs = new Map<string, ExchangePair>();
  private readonly cohorts: readonly JointCohort[];
  private readonly cohortByClass = new Map<string, JointCohort>();
  private readonly protectedSubjects: ReadonlySet<Subject>;
  private readonly independentSubjects: ReadonlySet<Subject>;
  private readonly sharedResourceSubjects: ReadonlySet<Subject>;
  private readonly testPeriods = new Map<string, TimeSlot>();
  private readonly placeholderTeachers: ReadonlySet<string>;

  constructor(data: SchoolModelInput, options: SchoolModelOptions = {}) {
    const issues: string[] = [];

    this.classes = [...data.classes].sort(compareClassRefs);
    for (const classRef of this.classes) {
      const key = classKey(classRef);
      if (this.classIndex.has(key)) {
        issues.push(`Class ${key} is listed twice`);
      }
      this.classIndex.set(key, classRef);
    }

    this.subjects = [...(data.subjects ?? [])];
    this.protectedSubjects = new Set(data.protectedSubjects ?? DEFAULT_PROTECTED_SUBJECTS);
    this.independentSubjects = new Set(data.independentSubjects ?? DEFAULT_INDEPENDENT_SUBJECTS);
    this.sharedResourceSubjects = new Set(data.sharedResourceSubjects ?? DEFAULT_SHARED_RESOURCE_SUBJECTS);
    this.placeholderTeachers = new Set(data.placeholderTeachers ?? []);

    for (const row of data.teacherAssignments ?? []) {
      this.indexTeacherAssignment(row, issues);
    }

    this.absenceEntries = [...(data.absences ?? [])];
    this.absences = options.absenceRepository ?? new InMemoryAbsenceRepository(this.absenceEntries);

    for (const pair of data.exchangePairs ?? []) {
      this.indexExchangePair(pair, issues);
    }

    this.cohorts = (data.jointCohorts ?? []).map(cohort => ({ ...cohort, classes: [...cohort.classes] }));
    for (const cohort of this.cohorts) {
      for (const classRef of cohort.classes) {
        const key = classKey(classRef);
        if (!this.classIndex.has(key)) {
          issues.push(`Joint cohort "${cohort.name}" names unknown class ${key}`);
        }
        const other = this.cohortByClass.get(key);
        if (other) {
          issues.push(`Class ${key} belongs to both "${other.name}" and "${cohort.name}"`);
        }
        this.cohortByClass.set(key, cohort);
      }
    }

    for (const timeSlot of data.testPeriods ?? []) {
      assertValidTimeSlot(timeSlot);
      this.testPeriods.set(slotKey(timeSlot), timeSlot);
    }

    if (issues.length > 0) {
      throw new SchoolConfigurationError('Invalid school data', issues);
    }
  }

  createGrid(): ScheduleGrid {
    return new ScheduleGrid({ protectedSubjects: this.protectedSubjects });
  }

  // ===========================================================================
  // Classes and subjects
  // ===========================================================================

  hasClass(classRef: ClassRef): boolean {
    return this.classIndex.has(classKey(classRef));
  }

  isProtectedSubject(subject: Subject): boolean {
    return this.protectedSubjects.has(subject);
  }

  getProtectedSubjects(): ReadonlySet<Subject> {
    return this.protectedSubjects;
  }

  isIndependentSubject(subject: Subject): boolean {
    return this.independentSubjects.has(subject);
  }

  isSharedResourceSubject(subject: Subject): boolean {
    return this.sharedResourceSubjects.has(subject);
  }

  // ===========================================================================
  // Teachers
  // ===========================================================================

  getAssignedTeacher(subject: Subject, classRef: ClassRef): Teacher | undefined {
    return this.assignedTeachers.get(eligibilityKey(subject, classRef));
  }

  isEligible(teacher: Teacher, subject: Subject, classRef: ClassRef): boolean {
    return this.getAssignedTeacher(subject, classRef)?.name === teacher.name;
  }

  getTeacherNames(): string[] {
    return Array.from(this.teacherNames).sort();
  }

  isPlaceholderTeacher(teacher: Teacher): boolean {
    return this.placeholderTeachers.has(teacher.name);
  }

  /**
   * The assignment's own teacher, else the teacher the eligibility table
   * gives for (subject, class), else null.
   */
  resolveTeacher(assignment: Assignment): Teacher | null {
    return assignment.teacher ?? this.getAssignedTeacher(assignment.subject, assignment.classRef) ?? null;
  }

  getAbsenceEntries(): readonly AbsenceEntry[] {
    return this.absenceEntries;
  }

  // ===========================================================================
  // Exchange classes
  // ===========================================================================

  isExchangeClass(classRef: ClassRef): boolean {
    return this.exchangePairs.has(classKey(classRef));
  }

  getParentClass(classRef: ClassRef): ClassRef | undefined {
    return this.exchangePairs.get(classKey(classRef))?.parentClass;
  }

  getExchangeClasses(parentClass: ClassRef): ClassRef[] {
    return this.getExchangePairs()
      .filter(pair => sameClass(pair.parentClass, parentClass))
      .map(pair => pair.exchangeClass);
  }

  getAllowedParentSubjects(exchangeClass: ClassRef): readonly Subject[] {
    return this.exchangePairs.get(classKey(exchangeClass))?.allowedParentSubjects ?? [];
  }

  getExchangePairs(): ExchangePair[] {
    return Array.from(this.exchangePairs.values()).sort(
      (a, b) => compareClassRefs(a.exchangeClass, b.exchangeClass)
    );
  }

  isExchangePair(a: ClassRef, b: ClassRef): boolean {
    const parentOfA = this.getParentClass(a);
    const parentOfB = this.getParentClass(b);
    return (parentOfA !== undefined && sameClass(parentOfA, b)) || (parentOfB !== undefined && sameClass(parentOfB, a));
  }

  // ===========================================================================
  // Joint cohorts
  // ===========================================================================

  getJointCohorts(): readonly JointCohort[] {
    return this.cohorts;
  }

  getCohort(classRef: ClassRef): JointCohort | undefined {
    return this.cohortByClass.get(classKey(classRef));
  }

  /** True when every class belongs to one and the same joint cohort. */
  inSameCohort(classes: readonly ClassRef[]): boolean {
    if (classes.length === 0) return false;
    const first = this.getCohort(classes[0]);
    return first !== undefined && classes.every(c => this.getCohort(c) === first);
  }

  // ===========================================================================
  // Test periods
  // ===========================================================================

  isTestPeriod(timeSlot: TimeSlot): boolean {
    return this.testPeriods.has(slotKey(timeSlot));
  }

  getTestPeriods(): TimeSlot[] {
    return Array.from(this.testPeriods.values()).sort(compareTimeSlots);
  }

  private indexTeacherAssignment(row: TeacherAssignment, issues: string[]): void {
    const key = eligibilityKey(row.subject, row.classRef);
    if (!this.classIndex.has(classKey(row.classRef))) {
      issues.push(`Teacher ${row.teacher.name} is assigned to unknown class ${formatClassRef(row.classRef)}`);
    }
    const existing = this.assignedTeachers.get(key);
    if (existing && existing.name !== row.teacher.name) {
      issues.push(
        `${row.subject} for ${formatClassRef(row.classRef)} is assigned to both ${existing.name} and ${row.teacher.name}`
      );
    }
    this.assignedTeachers.set(key, row.teacher);
    this.teacherNames.add(row.teacher.name);
  }

  private indexExchangePair(pair: ExchangePair, issues: string[]): void {
    const exchange = formatClassRef(pair.exchangeClass);
    const parent = formatClassRef(pair.parentClass);
    if (!this.classIndex.has(exchange)) {
      issues.push(`Exchange class ${exchange} is not in the class list`);
    }
    if (!this.classIndex.has(parent)) {
      issues.push(`Parent class ${parent} of ${exchange} is not in the class list`);
    }
    if (sameClass(pair.exchangeClass, pair.parentClass)) {
      issues.push(`Exchange class ${exchange} is paired with itself`);
    }
    if (this.exchangePairs.has(exchange)) {
      issues.push(`Exchange class ${exchange} is paired more than once`);
    }
    this.exchangePairs.set(exchange, { ...pair, allowedParentSubjects: [...pair.allowedParentSubjects] });
  }
}

function eligibilityKey(subject: Subject, classRef: ClassRef): string {
  return `${subject}|${classKey(classRef)}`;
}
