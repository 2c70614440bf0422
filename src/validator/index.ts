/**
 * Schedule Validator
 *
 * Runs the active constraints in priority order. Two entry points:
 *
 *   checkBeforeAssignment - the gate a placement engine calls before every
 *                           placement; learned rules first, then constraints,
 *                           stopping at the first hard failure
 *   validateSchedule      - full audit of every constraint, for reporting
 *
 * Rule failures come back as data; nothing here throws for them.
 */

import type {
  Assignment,
  CheckResult,
  ConstraintResult,
  ConstraintViolation,
  ProgressCallback,
  ProgressReport,
  ScheduleValidation,
  TimeSlot,
  ValidatorEventCallback,
} from '../types/index.js';
import { createDefaultConstraints, sortByPriority, type Constraint, type DefaultConstraintOptions } from '../constraints/index.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { assertValidTimeSlot } from '../model/time-slot.js';
import type { LearnedRule } from './learned-rules.js';

export { teacherSlotLimitRule, type LearnedRule, type TeacherSlotLimit } from './learned-rules.js';

export interface ValidatorOptions {
  learnedRules?: readonly LearnedRule[];
  onEvent?: ValidatorEventCallback;
}

export interface AuditOptions {
  onProgress?: ProgressCallback;
}

export class ConstraintValidator {
  private ordered: Constraint[];
  private readonly learned: LearnedRule[];
  private readonly enabledOverrides = new Map<string, boolean>();
  private readonly onEvent?: ValidatorEventCallback;

  constructor(constraints: readonly Constraint[], options: ValidatorOptions = {}) {
    this.ordered = sortByPriority(constraints);
    this.learned = [...(options.learnedRules ?? [])];
    this.onEvent = options.onEvent;
  }

  get constraints(): readonly Constraint[] {
    return this.ordered;
  }

  get learnedRules(): readonly LearnedRule[] {
    return this.learned;
  }

  getConstraint(name: string): Constraint | undefined {
    return this.ordered.find(c => c.name === name);
  }

  addConstraint(constraint: Constraint): void {
    this.ordered = sortByPriority([...this.ordered, constraint]);
    this.enabledOverrides.delete(constraint.name);
    this.constraintsChanged();
  }

  removeConstraint(name: string): boolean {
    const before = this.ordered.length;
    this.ordered = this.ordered.filter(c => c.name !== name);
    const removed = this.ordered.length !== before;
    if (removed) {
      this.enabledOverrides.delete(name);
      this.constraintsChanged();
    }
    return removed;
  }

  setEnabled(name: string, enabled: boolean): boolean {
    if (!this.getConstraint(name)) return false;
    this.enabledOverrides.set(name, enabled);
    this.constraintsChanged();
    return true;
  }

  isEnabled(name: string): boolean {
    const constraint = this.getConstraint(name);
    return constraint !== undefined && this.isActive(constraint);
  }

  private isActive(constraint: Constraint): boolean {
    return this.enabledOverrides.get(constraint.name) ?? constraint.enabled;
  }

  addLearnedRule(rule: LearnedRule): void {
    this.learned.push(rule);
    this.constraintsChanged();
  }

  // ===========================================================================
  // Point check
  // ===========================================================================

  checkBeforeAssignment(
    schedule: ScheduleGrid,
    school: SchoolModel,
    timeSlot: TimeSlot,
    assignment: Assignment
  ): CheckResult {
    assertValidTimeSlot(timeSlot);
    const warnings: string[] = [];

    for (const rule of this.learned) {
      if (!rule.condition(schedule, school, timeSlot, assignment)) continue;
      this.onEvent?.({ kind: 'learned-rule', ruleName: rule.name, timeSlot, assignment, reason: rule.rejectMessage });
      return { ok: false, reason: rule.rejectMessage, constraintName: rule.name, warnings };
    }

    for (const constraint of this.ordered) {
      if (!this.isActive(constraint)) continue;
      if (constraint.check(schedule, school, timeSlot, assignment)) continue;

      const reason = constraint.rejectionReason(schedule, school, timeSlot, assignment);
      if (constraint.isHard) {
        this.onEvent?.({ kind: 'blocked', constraintName: constraint.name, timeSlot, assignment, reason });
        return { ok: false, reason, constraintName: constraint.name, warnings };
      }
      this.onEvent?.({ kind: 'warning', constraintName: constraint.name, timeSlot, assignment, reason });
      warnings.push(reason);
    }

    return { ok: true, reason: null, constraintName: null, warnings };
  }

  // ===========================================================================
  // Full audit
  // ===========================================================================

  validateSchedule(schedule: ScheduleGrid, school: SchoolModel, options: AuditOptions = {}): ScheduleValidation {
    const { onProgress } = options;
    const active = this.ordered.filter(c => this.isActive(c));
    const audited = this.learned.filter(rule => rule.audit !== undefined);
    const total = active.length + audited.length;
    const results: ConstraintResult[] = [];
    let violationsFound = 0;

    const report = (phase: ProgressReport['phase'], operation: string) => {
      onProgress?.({
        phase,
        percentComplete: total === 0 ? 100 : Math.round((results.length / total) * 100),
        currentOperation: operation,
        stats: { constraintsChecked: results.length, violationsFound },
      });
    };

    for (const rule of audited) {
      report('auditing', `Checking learned rule ${rule.name}`);
      const violations = rule.audit?.(schedule, school) ?? [];
      violationsFound += violations.length;
      results.push({
        constraintName: rule.name,
        violations,
        message: violations.length === 0 ? `${rule.name}: OK` : `${rule.name}: ${violations.length} violation(s)`,
      });
    }

    for (const constraint of active) {
      report('auditing', `Checking ${constraint.name}`);
      const result = constraint.validate(schedule, school);
      violationsFound += result.violations.length;
      results.push(result);
    }

    report('complete', 'Audit complete');

    const all = results.flatMap(r => r.violations);
    const hardViolations = all.filter(v => v.severity === 'error');
    const softViolations = all.filter(v => v.severity === 'warning');

    return {
      valid: hardViolations.length === 0,
      results,
      hardViolations,
      softViolations,
      score: calculateScore(hardViolations, softViolations),
      summary: generateSummary(results, hardViolations, softViolations),
    };
  }

  hasHardViolations(schedule: ScheduleGrid, school: SchoolModel): boolean {
    return this.ordered.some(c => this.isActive(c) && c.isHard && c.validate(schedule, school).violations.length > 0);
  }

  /** Called whenever the constraint set or a constraint's enabled flag changes. */
  protected constraintsChanged(): void {}
}

export function createValidator(
  school: SchoolModel,
  options: ValidatorOptions & Pick<DefaultConstraintOptions, 'settings'> = {}
): ConstraintValidator {
  return new ConstraintValidator(createDefaultConstraints(school, { settings: options.settings }), options);
}

export function calculateScore(hard: readonly ConstraintViolation[], soft: readonly ConstraintViolation[]): number {
  return Math.max(0, 100 - hard.length * 20 - soft.length * 2);
}

function generateSummary(
  results: readonly ConstraintResult[],
  hardViolations: readonly ConstraintViolation[],
  softViolations: readonly ConstraintViolation[]
): string {
  const lines: string[] = [];

  lines.push('='.repeat(60));
  lines.push('SCHEDULE VALIDATION SUMMARY');
  lines.push('='.repeat(60));
  lines.push('');

  if (hardViolations.length === 0) {
    lines.push('STATUS: VALID (all hard constraints satisfied)');
  } else {
    lines.push(`STATUS: INVALID (${hardViolations.length} hard constraint violations)`);
  }
  lines.push('');

  lines.push('CONSTRAINTS:');
  for (const result of results) {
    lines.push(`  ${result.message}`);
  }
  lines.push('');

  if (hardViolations.length > 0) {
    lines.push('HARD CONSTRAINT VIOLATIONS:');
    for (const v of hardViolations.slice(0, 10)) {
      lines.push(`  - ${v.description}`);
    }
    if (hardViolations.length > 10) {
      lines.push(`  ... and ${hardViolations.length - 10} more`);
    }
    lines.push('');
  }

  if (softViolations.length > 0) {
    lines.push('SOFT CONSTRAINT VIOLATIONS (warnings):');
    for (const v of softViolations) {
      lines.push(`  - ${v.description}`);
    }
    lines.push('');
  }

  lines.push('='.repeat(60));

  return lines.join('\n');
}
