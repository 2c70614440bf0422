/**
 * Timetable constraint validator
 */

export * from './types/index.js';

export { TimetableError, InvalidAssignmentError, InvalidTimeSlotError, SchoolConfigurationError } from './model/errors.js';
export {
  DAYS,
  DAY_NAMES,
  PERIODS,
  PERIODS_PER_DAY,
  allTimeSlots,
  compareTimeSlots,
  createTimeSlot,
  formatTimeSlot,
  parseDay,
  sameSlot,
  slotKey,
  slotsOfDay,
} from './model/time-slot.js';
export { classKey, compareClassRefs, createClassRef, formatClassRef, parseClassRef, sameClass } from './model/class-ref.js';
export { ScheduleGrid, type GridChange, type GridChangeListener, type ScheduleGridOptions } from './model/schedule-grid.js';
export { InMemoryAbsenceRepository, type AbsenceRepository } from './model/absence-repository.js';
export {
  SchoolModel,
  DEFAULT_INDEPENDENT_SUBJECTS,
  DEFAULT_PROTECTED_SUBJECTS,
  DEFAULT_SHARED_RESOURCE_SUBJECTS,
  type SchoolModelInput,
  type SchoolModelOptions,
} from './model/school-model.js';

export * from './constraints/index.js';

export {
  ConstraintValidator,
  calculateScore,
  createValidator,
  teacherSlotLimitRule,
  type AuditOptions,
  type LearnedRule,
  type TeacherSlotLimit,
  type ValidatorOptions,
} from './validator/index.js';
export {
  CachedConstraintValidator,
  createCachedValidator,
  type CacheStats,
  type ValidatorCaches,
} from './validator/cached-validator.js';
export { CheckResultCache } from './cache/check-result-cache.js';
export { DailySubjectCache } from './cache/daily-subject-cache.js';
export { TeacherAvailabilityCache, type CacheCounters } from './cache/teacher-availability-cache.js';

export {
  loadSchedule,
  loadSchoolConfig,
  parseSchedule,
  parseSchoolConfig,
  scheduleFileSchema,
  schoolFileSchema,
  type ScheduleFile,
  type SchoolConfig,
  type SchoolFile,
} from './parser/data-loader.js';
export { formatClassTimetable, generateReport, type ReportOptions } from './reporter/index.js';
