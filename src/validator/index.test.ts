import { describe, it, expect, vi } from 'vitest';
import { ConstraintValidator, calculateScore, createValidator, teacherSlotLimitRule } from './index.js';
import { CONSTRAINT_NAMES, TeacherQualificationConstraint, createDefaultConstraints } from '../constraints/index.js';
import { InvalidTimeSlotError } from '../model/errors.js';
import type { ProgressReport, ValidatorEvent } from '../types/index.js';
import { buildSchool, lesson, slot } from '../testing/fixtures.js';

describe('ConstraintValidator', () => {
  const school = buildSchool();

  describe('ordering', () => {
    it('should keep registration order among equal priorities', () => {
      expect(createValidator(school).constraints.map(c => c.name)).toEqual([...CONSTRAINT_NAMES]);
    });

    it('should run higher priorities first', () => {
      const validator = createValidator(school, { settings: { RoomExclusivity: { priority: 'low' } } });

      expect(validator.constraints.map(c => c.name)).toEqual([
        'FixedSubjectProtection',
        'DailyDuplication',
        'TeacherAbsence',
        'TeacherDoubleBooking',
        'ExchangeClassSync',
        'TeacherQualification',
        'RoomExclusivity',
      ]);
    });
  });

  describe('checkBeforeAssignment', () => {
    it('should stop at the first failing hard constraint', () => {
      const grid = school.createGrid();
      grid.assign(slot('Tue', 3), lesson('2-2', 'Math'));

      expect(createValidator(school).checkBeforeAssignment(grid, school, slot('Tue', 2), lesson('2-2', 'Math'))).toEqual({
        ok: false,
        reason: '2-2 already has Math on Tuesday (period 3)',
        constraintName: 'DailyDuplication',
        warnings: [],
      });
    });

    it('should skip disabled constraints', () => {
      const grid = school.createGrid();
      grid.assign(slot('Tue', 3), lesson('2-2', 'Math'));
      const validator = createValidator(school);

      expect(validator.setEnabled('DailyDuplication', false)).toBe(true);
      expect(validator.checkBeforeAssignment(grid, school, slot('Tue', 2), lesson('2-2', 'Math')).constraintName).toBe(
        'TeacherAbsence'
      );
      expect(validator.setEnabled('NoSuchRule', false)).toBe(false);
    });

    it('should keep enabled state on the validator, not the shared constraint', () => {
      const constraints = createDefaultConstraints(school);
      const first = new ConstraintValidator(constraints);
      const second = new ConstraintValidator(constraints);

      first.setEnabled('DailyDuplication', false);

      expect(first.isEnabled('DailyDuplication')).toBe(false);
      expect(second.isEnabled('DailyDuplication')).toBe(true);
      expect(first.getConstraint('DailyDuplication')?.enabled).toBe(true);
      expect(first.isEnabled('NoSuchRule')).toBe(false);

      first.setEnabled('DailyDuplication', true);
      expect(first.isEnabled('DailyDuplication')).toBe(true);
    });

    it('should honour a constraint disabled in the school settings', () => {
      const validator = createValidator(school, { settings: { DailyDuplication: { enabled: false } } });

      expect(validator.isEnabled('DailyDuplication')).toBe(false);
      expect(validator.setEnabled('DailyDuplication', true)).toBe(true);
      expect(validator.isEnabled('DailyDuplication')).toBe(true);
    });

    it('should turn a hard constraint configured as soft into a warning', () => {
      const validator = createValidator(school, { settings: { TeacherAbsence: { type: 'soft' } } });

      expect(validator.checkBeforeAssignment(school.createGrid(), school, slot('Tue', 1), lesson('2-2', 'Math'))).toEqual({
        ok: true,
        reason: null,
        constraintName: null,
        warnings: ['Inoue absent on Tuesday period 1'],
      });
    });

    it('should report decisions through onEvent', () => {
      const events: ValidatorEvent[] = [];
      const validator = createValidator(school, { onEvent: event => events.push(event) });
      const grid = school.createGrid();

      validator.checkBeforeAssignment(grid, school, slot('Mon', 1), lesson('2-2', 'Math', 'Sato'));
      validator.checkBeforeAssignment(grid, school, slot('Tue', 1), lesson('2-2', 'Math'));

      expect(events.map(e => e.kind)).toEqual(['warning', 'blocked']);
      expect(events[1]).toEqual({
        kind: 'blocked',
        constraintName: 'TeacherAbsence',
        timeSlot: slot('Tue', 1),
        assignment: lesson('2-2', 'Math'),
        reason: 'Inoue absent on Tuesday period 1',
      });
    });

    it('should throw on a malformed time slot', () => {
      expect(() =>
        createValidator(school).checkBeforeAssignment(school.createGrid(), school, { day: 'Mon', period: 0 }, lesson('2-2', 'Math'))
      ).toThrow(InvalidTimeSlotError);
    });

    it('should accept a placement that breaks nothing', () => {
      const result = createValidator(school).checkBeforeAssignment(school.createGrid(), school, slot('Wed', 2), lesson('2-2', 'Math'));
      expect(result).toEqual({ ok: true, reason: null, constraintName: null, warnings: [] });
    });
  });

  describe('learned rules', () => {
    const limit = teacherSlotLimitRule({ teacher: 'Kato', timeSlot: slot('Mon', 2), maxClasses: 1 });

    it('should be consulted before the constraint set', () => {
      const onEvent = vi.fn();
      const validator = createValidator(school, { learnedRules: [limit], onEvent });
      const grid = school.createGrid();
      grid.assign(slot('Mon', 2), lesson('3-1', 'Science'));

      const result = validator.checkBeforeAssignment(grid, school, slot('Mon', 2), lesson('3-2', 'Science'));

      expect(result).toEqual({
        ok: false,
        reason: 'Kato may teach at most 1 class on Monday period 2',
        constraintName: 'TeacherSlotLimit(Kato@Mon-2)',
        warnings: [],
      });
      expect(onEvent).toHaveBeenCalledTimes(1);
      expect(onEvent.mock.calls[0][0]).toMatchObject({ kind: 'learned-rule', ruleName: 'TeacherSlotLimit(Kato@Mon-2)' });
    });

    it('should only apply to its own teacher and slot', () => {
      const grid = school.createGrid();
      grid.assign(slot('Mon', 2), lesson('3-1', 'Science'));

      expect(limit.condition(grid, school, slot('Mon', 3), lesson('3-2', 'Science'))).toBe(false);
      expect(limit.condition(grid, school, slot('Mon', 2), lesson('2-2', 'Math'))).toBe(false);
      expect(limit.condition(grid, school, slot('Mon', 2), lesson('3-1', 'Science'))).toBe(false);
    });

    it('should use a custom description as its message', () => {
      const rule = teacherSlotLimitRule({
        teacher: 'Kato',
        timeSlot: slot('Mon', 2),
        maxClasses: 0,
        description: 'Kato has a meeting on Monday period 2',
      });
      expect(rule.condition(school.createGrid(), school, slot('Mon', 2), lesson('3-1', 'Science'))).toBe(true);
      expect(rule.rejectMessage).toBe('Kato has a meeting on Monday period 2');
    });

    it('should be audited ahead of the constraints', () => {
      const validator = createValidator(school, { learnedRules: [limit] });
      const grid = school.createGrid();
      grid.assign(slot('Mon', 2), lesson('3-1', 'Science'));
      grid.assign(slot('Mon', 2), lesson('3-2', 'Science'));

      const validation = validator.validateSchedule(grid, school);

      expect(validation.results[0].constraintName).toBe('TeacherSlotLimit(Kato@Mon-2)');
      expect(validation.results[0].violations[0].description).toBe(
        'Kato teaches 2 classes on Monday period 2 (3-1, 3-2); the limit is 1'
      );
      expect(validation.hardViolations).toHaveLength(2);
    });

    it('should be addable after construction', () => {
      const validator = createValidator(school);
      validator.addLearnedRule(limit);
      expect(validator.learnedRules.map(r => r.name)).toEqual(['TeacherSlotLimit(Kato@Mon-2)']);
    });
  });

  describe('validateSchedule', () => {
    function gridWithProblems() {
      const grid = school.createGrid();
      grid.assign(slot('Mon', 1), lesson('3-1', 'Science'));
      grid.assign(slot('Mon', 3), lesson('3-1', 'Science'));
      grid.assign(slot('Tue', 5), lesson('2-2', 'Math'));
      grid.assign(slot('Mon', 1), lesson('2-2', 'Math', 'Sato'));
      return grid;
    }

    it('should return one result per enabled constraint', () => {
      const validation = createValidator(school).validateSchedule(gridWithProblems(), school);

      expect(validation.results.map(r => r.constraintName)).toEqual([...CONSTRAINT_NAMES]);
      expect(validation.valid).toBe(false);
      expect(validation.hardViolations.map(v => v.constraintName)).toEqual(['DailyDuplication', 'TeacherAbsence']);
      expect(validation.softViolations.map(v => v.constraintName)).toEqual(['TeacherQualification']);
      expect(validation.score).toBe(58);
    });

    it('should be deterministic across repeated audits', () => {
      const validator = createValidator(school);
      const grid = gridWithProblems();

      expect(validator.validateSchedule(grid, school)).toEqual(validator.validateSchedule(grid, school));
    });

    it('should report progress ending at 100%', () => {
      const reports: ProgressReport[] = [];
      createValidator(school).validateSchedule(gridWithProblems(), school, { onProgress: p => reports.push(p) });

      expect(reports).toHaveLength(8);
      expect(reports[0]).toEqual({
        phase: 'auditing',
        percentComplete: 0,
        currentOperation: 'Checking FixedSubjectProtection',
        stats: { constraintsChecked: 0, violationsFound: 0 },
      });
      expect(reports[7]).toEqual({
        phase: 'complete',
        percentComplete: 100,
        currentOperation: 'Audit complete',
        stats: { constraintsChecked: 7, violationsFound: 3 },
      });
    });

    it('should summarise the audit', () => {
      const validator = createValidator(school);

      const clean = validator.validateSchedule(school.createGrid(), school);
      expect(clean.summary.split('\n')).toContain('STATUS: VALID (all hard constraints satisfied)');

      const broken = validator.validateSchedule(gridWithProblems(), school);
      const lines = broken.summary.split('\n');
      expect(lines).toContain('STATUS: INVALID (2 hard constraint violations)');
      expect(lines).toContain('  - 3-1 has Science 2 times on Monday (periods 1, 3)');
      expect(lines).toContain('  TeacherAbsence: 1 violation (teacher absences)');
    });

    it('should skip disabled constraints', () => {
      const validator = createValidator(school, { settings: { DailyDuplication: { enabled: false } } });
      const validation = validator.validateSchedule(gridWithProblems(), school);

      expect(validation.results.map(r => r.constraintName)).not.toContain('DailyDuplication');
      expect(validation.hardViolations).toHaveLength(1);
    });

    it('should tell whether hard violations stand', () => {
      const validator = createValidator(school);
      expect(validator.hasHardViolations(gridWithProblems(), school)).toBe(true);
      expect(validator.hasHardViolations(school.createGrid(), school)).toBe(false);
    });
  });

  describe('constraint set', () => {
    it('should add and remove constraints by name', () => {
      const validator = new ConstraintValidator(
        createDefaultConstraints(school).filter(c => c.name !== 'TeacherQualification')
      );
      expect(validator.getConstraint('TeacherQualification')).toBeUndefined();

      validator.addConstraint(new TeacherQualificationConstraint({ priority: 'critical' }));
      expect(validator.constraints.map(c => c.name).at(-1)).toBe('TeacherQualification');

      expect(validator.removeConstraint('TeacherQualification')).toBe(true);
      expect(validator.removeConstraint('TeacherQualification')).toBe(false);
    });
  });
});

describe('calculateScore', () => {
  it('should take 20 per error and 2 per warning, floored at zero', () => {
    const violation = {
      constraintName: 'X',
      description: 'x',
      timeSlot: slot('Mon', 1),
      assignment: lesson('1-1', 'Math'),
      severity: 'error' as const,
    };
    expect(calculateScore([], [])).toBe(100);
    expect(calculateScore([violation], [violation, violation])).toBe(76);
    expect(calculateScore(Array.from({ length: 6 }, () => violation), [])).toBe(0);
  });
});
