import { describe, it, expect, vi } from 'vitest';
import { createCachedValidator } from './cached-validator.js';
import { createValidator, teacherSlotLimitRule } from './index.js';
import { buildSchool, cls, lesson, slot } from '../testing/fixtures.js';

describe('CachedConstraintValidator', () => {
  const school = buildSchool();

  it('should give the same answers as the plain validator', () => {
    const plain = createValidator(school);
    const cached = createCachedValidator(school);
    const grid = school.createGrid();
    const candidates = [
      [slot('Mon', 1), lesson('3-1', 'Science')],
      [slot('Mon', 1), lesson('3-2', 'Science')],
      [slot('Mon', 3), lesson('3-1', 'Science')],
      [slot('Mon', 3), lesson('3-1', 'Math', 'Sato')],
      [slot('Tue', 2), lesson('2-2', 'Math')],
      [slot('Tue', 2), lesson('3-3', 'Art')],
      [slot('Tue', 2), lesson('3-6', 'Independent Activity')],
      [slot('Tue', 2), lesson('3-6', 'Art')],
      [slot('Mon', 3), lesson('3-1', 'Science')],
    ] as const;

    for (const [timeSlot, assignment] of candidates) {
      const expected = plain.checkBeforeAssignment(grid, school, timeSlot, assignment);
      expect(cached.checkBeforeAssignment(grid, school, timeSlot, assignment)).toEqual(expected);
      if (expected.ok) grid.assign(timeSlot, assignment);
    }

    expect(cached.validateSchedule(grid, school)).toEqual(plain.validateSchedule(grid, school));
  });

  it('should serve repeated checks from the cache', () => {
    const validator = createCachedValidator(school);
    const grid = school.createGrid();

    validator.checkBeforeAssignment(grid, school, slot('Wed', 2), lesson('3-1', 'Science'));
    validator.checkBeforeAssignment(grid, school, slot('Wed', 2), lesson('3-1', 'Science'));

    expect(validator.stats()).toEqual({
      totalChecks: 2,
      cacheHits: 1,
      cacheMisses: 1,
      hitRate: 0.5,
      learnedRuleRejections: 0,
    });
  });

  it('should not serve a stale answer after the grid changes', () => {
    const validator = createCachedValidator(school);
    const grid = school.createGrid();

    expect(validator.checkBeforeAssignment(grid, school, slot('Mon', 3), lesson('3-1', 'Science')).ok).toBe(true);
    grid.assign(slot('Mon', 1), lesson('3-1', 'Science'));

    const result = validator.checkBeforeAssignment(grid, school, slot('Mon', 3), lesson('3-1', 'Science'));
    expect(result.ok).toBe(false);
    expect(result.reason).toBe('3-1 already has Science on Monday (period 1)');
    expect(validator.stats().cacheHits).toBe(0);
  });

  it('should not serve a stale answer after a cell is locked or unlocked', () => {
    const plain = createValidator(school);
    const validator = createCachedValidator(school);
    const grid = school.createGrid();
    const candidate = lesson('3-1', 'Science');

    expect(validator.checkBeforeAssignment(grid, school, slot('Wed', 4), candidate).ok).toBe(true);
    grid.lock(slot('Wed', 4), cls('3-1'));

    const locked = validator.checkBeforeAssignment(grid, school, slot('Wed', 4), candidate);
    expect(locked).toEqual(plain.checkBeforeAssignment(grid, school, slot('Wed', 4), candidate));
    expect(locked).toMatchObject({
      ok: false,
      reason: '3-1 on Wednesday period 4 is locked',
      constraintName: 'FixedSubjectProtection',
    });

    grid.unlock(slot('Wed', 4), cls('3-1'));
    expect(validator.checkBeforeAssignment(grid, school, slot('Wed', 4), candidate).ok).toBe(true);
    expect(validator.stats().cacheHits).toBe(0);
  });

  it('should emit validator events on cache misses only', () => {
    const onEvent = vi.fn();
    const validator = createCachedValidator(school, { onEvent });
    const grid = school.createGrid();
    grid.lock(slot('Wed', 4), cls('3-1'));

    validator.checkBeforeAssignment(grid, school, slot('Wed', 4), lesson('3-1', 'Science'));
    validator.checkBeforeAssignment(grid, school, slot('Wed', 4), lesson('3-1', 'Science'));

    expect(validator.stats().cacheHits).toBe(1);
    expect(onEvent).toHaveBeenCalledTimes(1);
    expect(onEvent).toHaveBeenCalledWith({
      kind: 'blocked',
      constraintName: 'FixedSubjectProtection',
      timeSlot: slot('Wed', 4),
      assignment: lesson('3-1', 'Science'),
      reason: '3-1 on Wednesday period 4 is locked',
    });
  });

  it('should see changes in other classes of the same slot', () => {
    const validator = createCachedValidator(school);
    const grid = school.createGrid();

    expect(validator.checkBeforeAssignment(grid, school, slot('Mon', 2), lesson('3-2', 'Science')).ok).toBe(true);
    grid.assign(slot('Mon', 2), lesson('3-1', 'Science'));

    expect(validator.checkBeforeAssignment(grid, school, slot('Mon', 2), lesson('3-2', 'Science')).constraintName).toBe(
      'TeacherDoubleBooking'
    );
  });

  it('should keep grids apart', () => {
    const validator = createCachedValidator(school);
    const first = school.createGrid();
    const second = school.createGrid();
    second.assign(slot('Mon', 1), lesson('3-1', 'Science'));

    expect(validator.checkBeforeAssignment(first, school, slot('Mon', 3), lesson('3-1', 'Science')).ok).toBe(true);
    expect(validator.checkBeforeAssignment(second, school, slot('Mon', 3), lesson('3-1', 'Science')).ok).toBe(false);
  });

  it('should hand out copies of cached warnings', () => {
    const validator = createCachedValidator(school);
    const grid = school.createGrid();

    const first = validator.checkBeforeAssignment(grid, school, slot('Mon', 1), lesson('2-2', 'Math', 'Sato'));
    first.warnings.push('changed by caller');
    const second = validator.checkBeforeAssignment(grid, school, slot('Mon', 1), lesson('2-2', 'Math', 'Sato'));

    expect(second.warnings).toEqual(['Sato is not assigned to Math for 2-2 (expected Inoue) on Monday period 1']);
  });

  it('should drop cached results when the constraint set changes', () => {
    const validator = createCachedValidator(school);
    const grid = school.createGrid();
    grid.assign(slot('Mon', 1), lesson('3-1', 'Science'));

    expect(validator.checkBeforeAssignment(grid, school, slot('Mon', 3), lesson('3-1', 'Science')).ok).toBe(false);
    validator.setEnabled('DailyDuplication', false);
    expect(validator.checkBeforeAssignment(grid, school, slot('Mon', 3), lesson('3-1', 'Science')).ok).toBe(true);
  });

  it('should count learned-rule rejections', () => {
    const validator = createCachedValidator(school, {
      learnedRules: [teacherSlotLimitRule({ teacher: 'Kato', timeSlot: slot('Mon', 2), maxClasses: 0 })],
    });
    const grid = school.createGrid();

    validator.checkBeforeAssignment(grid, school, slot('Mon', 2), lesson('3-1', 'Science'));
    validator.checkBeforeAssignment(grid, school, slot('Mon', 2), lesson('3-2', 'Science'));

    expect(validator.stats().learnedRuleRejections).toBe(2);
  });

  it('should recompute after clearCaches', () => {
    const validator = createCachedValidator(school);
    const grid = school.createGrid();

    validator.checkBeforeAssignment(grid, school, slot('Wed', 2), lesson('3-1', 'Science'));
    validator.clearCaches();
    validator.checkBeforeAssignment(grid, school, slot('Wed', 2), lesson('3-1', 'Science'));

    expect(validator.stats()).toMatchObject({ totalChecks: 2, cacheHits: 0, cacheMisses: 2, hitRate: 0 });
  });
});
