/**
 * Cached validator
 *
 * Same answers as ConstraintValidator, with three caches of different
 * lifetimes:
 *
 *   TeacherAvailabilityCache - absence lookups; static for the whole run
 *   DailySubjectCache        - per (grid, class, day) summaries; dropped for
 *                              the row a mutation touches
 *   CheckResultCache         - whole check results per grid; dropped on any
 *                              mutation or lock change of that grid, or of
 *                              the constraint set
 *
 * A cache hit returns the stored result without re-running any rule, so
 * `onEvent` fires only for checks that miss.
 */

import type { Assignment, CheckResult, TimeSlot } from '../types/index.js';
import { CheckResultCache } from '../cache/check-result-cache.js';
import { DailySubjectCache } from '../cache/daily-subject-cache.js';
import { TeacherAvailabilityCache } from '../cache/teacher-availability-cache.js';
import { createDefaultConstraints, type Constraint, type DefaultConstraintOptions } from '../constraints/index.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { assertValidTimeSlot } from '../model/time-slot.js';
import { ConstraintValidator, type ValidatorOptions } from './index.js';

export interface CacheStats {
  totalChecks: number;
  cacheHits: number;
  cacheMisses: number;
  hitRate: number;
  learnedRuleRejections: number;
}

export interface ValidatorCaches {
  availability?: TeacherAvailabilityCache;
  dailySubjects?: DailySubjectCache;
}

export class CachedConstraintValidator extends ConstraintValidator {
  private readonly results = new CheckResultCache();
  private readonly caches: ValidatorCaches;
  private totalChecks = 0;
  private cacheHits = 0;
  private learnedRuleRejections = 0;

  constructor(constraints: readonly Constraint[], options: ValidatorOptions = {}, caches: ValidatorCaches = {}) {
    super(constraints, options);
    this.caches = caches;
  }

  checkBeforeAssignment(
    schedule: ScheduleGrid,
    school: SchoolModel,
    timeSlot: TimeSlot,
    assignment: Assignment
  ): CheckResult {
    assertValidTimeSlot(timeSlot);
    this.totalChecks++;

    const key = CheckResultCache.key(timeSlot, assignment);
    const cached = this.results.get(schedule, key);
    if (cached) {
      this.cacheHits++;
      return cached;
    }

    const result = super.checkBeforeAssignment(schedule, school, timeSlot, assignment);
    if (!result.ok && this.learnedRules.some(rule => rule.name === result.constraintName)) {
      this.learnedRuleRejections++;
    }
    this.results.set(schedule, key, result);
    return result;
  }

  stats(): CacheStats {
    const cacheMisses = this.totalChecks - this.cacheHits;
    return {
      totalChecks: this.totalChecks,
      cacheHits: this.cacheHits,
      cacheMisses,
      hitRate: this.totalChecks === 0 ? 0 : this.cacheHits / this.totalChecks,
      learnedRuleRejections: this.learnedRuleRejections,
    };
  }

  /** Drops every cached value; counters are kept. */
  clearCaches(): void {
    this.results.clear();
    this.caches.availability?.clear();
    this.caches.dailySubjects?.clear();
  }

  protected constraintsChanged(): void {
    this.results.clear();
  }
}

export function createCachedValidator(
  school: SchoolModel,
  options: ValidatorOptions & Pick<DefaultConstraintOptions, 'settings'> = {}
): CachedConstraintValidator {
  const availability = new TeacherAvailabilityCache(school.absences);
  const dailySubjects = new DailySubjectCache();
  const constraints = createDefaultConstraints(school, {
    settings: options.settings,
    absences: availability,
    dailySubjects,
  });
  return new CachedConstraintValidator(constraints, options, { availability, dailySubjects });
}
