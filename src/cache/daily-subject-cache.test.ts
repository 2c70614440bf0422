import { describe, it, expect } from 'vitest';
import { DailySubjectCache } from './daily-subject-cache.js';
import { buildSchool, cls, lesson, slot } from '../testing/fixtures.js';

describe('DailySubjectCache', () => {
  const school = buildSchool();

  function setup() {
    const grid = school.createGrid();
    grid.assign(slot('Mon', 1), lesson('3-1', 'Science'));
    grid.assign(slot('Mon', 3), lesson('3-1', 'Science'));
    grid.assign(slot('Tue', 2), lesson('3-1', 'Math'));
    grid.assign(slot('Mon', 2), lesson('3-2', 'Art'));
    return { grid, cache: new DailySubjectCache() };
  }

  it('should summarise a day row once', () => {
    const { grid, cache } = setup();

    expect(cache.periodsOf(grid, cls('3-1'), 'Mon', 'Science')).toEqual([1, 3]);
    expect(cache.periodsOf(grid, cls('3-1'), 'Mon', 'Math')).toEqual([]);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1 });
  });

  it('should drop only the row a mutation touches', () => {
    const { grid, cache } = setup();
    cache.periodsOf(grid, cls('3-1'), 'Mon', 'Science');
    cache.periodsOf(grid, cls('3-1'), 'Tue', 'Math');
    cache.periodsOf(grid, cls('3-2'), 'Mon', 'Art');

    grid.assign(slot('Mon', 5), lesson('3-1', 'Science'));

    expect(cache.has(grid, cls('3-1'), 'Mon')).toBe(false);
    expect(cache.has(grid, cls('3-1'), 'Tue')).toBe(true);
    expect(cache.has(grid, cls('3-2'), 'Mon')).toBe(true);
    expect(cache.periodsOf(grid, cls('3-1'), 'Mon', 'Science')).toEqual([1, 3, 5]);
  });

  it('should keep the row when a cell is only locked', () => {
    const { grid, cache } = setup();
    cache.periodsOf(grid, cls('3-1'), 'Mon', 'Science');

    grid.lock(slot('Mon', 4), cls('3-1'));
    grid.unlock(slot('Mon', 4), cls('3-1'));

    expect(cache.has(grid, cls('3-1'), 'Mon')).toBe(true);
  });

  it('should drop the row on removal', () => {
    const { grid, cache } = setup();
    cache.periodsOf(grid, cls('3-1'), 'Mon', 'Science');

    grid.remove(slot('Mon', 3), cls('3-1'));

    expect(cache.periodsOf(grid, cls('3-1'), 'Mon', 'Science')).toEqual([1]);
  });

  it('should keep one summary set per grid', () => {
    const { grid, cache } = setup();
    const copy = grid.clone();
    copy.assign(slot('Mon', 4), lesson('3-1', 'Science'));

    expect(cache.periodsOf(grid, cls('3-1'), 'Mon', 'Science')).toEqual([1, 3]);
    expect(cache.periodsOf(copy, cls('3-1'), 'Mon', 'Science')).toEqual([1, 3, 4]);
  });

  it('should forget everything on clear', () => {
    const { grid, cache } = setup();
    cache.periodsOf(grid, cls('3-1'), 'Mon', 'Science');

    cache.clear();

    expect(cache.has(grid, cls('3-1'), 'Mon')).toBe(false);
  });
});
