import { describe, it, expect } from 'vitest';
import {
  allTimeSlots,
  compareTimeSlots,
  createTimeSlot,
  formatTimeSlot,
  parseDay,
  slotKey,
  slotsOfDay,
} from './time-slot.js';
import { compareClassRefs, formatClassRef, parseClassRef } from './class-ref.js';
import { InvalidTimeSlotError, SchoolConfigurationError } from './errors.js';

describe('time slots', () => {
  it('should parse short and full day names in any case', () => {
    expect(parseDay('Tue')).toBe('Tue');
    expect(parseDay('tuesday')).toBe('Tue');
    expect(parseDay(' FRIDAY ')).toBe('Fri');
  });

  it('should reject unknown days', () => {
    expect(() => parseDay('Sun')).toThrow(InvalidTimeSlotError);
  });

  it('should reject periods outside 1-6', () => {
    expect(() => createTimeSlot('Mon', 0)).toThrow(InvalidTimeSlotError);
    expect(() => createTimeSlot('Mon', 7)).toThrow('Invalid period in time slot: 7 (expected 1-6)');
    expect(() => createTimeSlot('Mon', 2.5)).toThrow(InvalidTimeSlotError);
  });

  it('should format and key slots', () => {
    const timeSlot = createTimeSlot('Tue', 5);
    expect(formatTimeSlot(timeSlot)).toBe('Tuesday period 5');
    expect(slotKey(timeSlot)).toBe('Tue-5');
  });

  it('should enumerate the week in day then period order', () => {
    const week = allTimeSlots();
    expect(week).toHaveLength(30);
    expect(week[0]).toEqual({ day: 'Mon', period: 1 });
    expect(week[6]).toEqual({ day: 'Tue', period: 1 });
    expect(week[29]).toEqual({ day: 'Fri', period: 6 });
    expect(slotsOfDay('Wed').map(s => s.period)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('should order slots by day before period', () => {
    expect(compareTimeSlots(createTimeSlot('Mon', 6), createTimeSlot('Tue', 1))).toBeLessThan(0);
    expect(compareTimeSlots(createTimeSlot('Wed', 3), createTimeSlot('Wed', 2))).toBeGreaterThan(0);
  });
});

describe('class references', () => {
  it('should parse grade-class labels', () => {
    expect(parseClassRef('3-1')).toEqual({ grade: 3, classNumber: 1 });
    expect(parseClassRef(' 2 - 12 ')).toEqual({ grade: 2, classNumber: 12 });
    expect(formatClassRef(parseClassRef('3-6'))).toBe('3-6');
  });

  it('should reject malformed labels', () => {
    expect(() => parseClassRef('3a')).toThrow(SchoolConfigurationError);
  });

  it('should sort by grade then class number', () => {
    const sorted = ['3-1', '1-5', '1-2', '2-10', '2-9'].map(parseClassRef).sort(compareClassRefs).map(formatClassRef);
    expect(sorted).toEqual(['1-2', '1-5', '2-9', '2-10', '3-1']);
  });
});
