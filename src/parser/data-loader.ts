/**
 * Data loader for school and schedule files
 *
 * Both files are JSON. Shapes are checked with zod; every problem found is
 * collected into one SchoolConfigurationError so a bad file is reported in
 * full rather than one issue at a time.
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { z } from 'zod';
import type { Assignment, ClassRef, ConstraintSettings, Day, Teacher, TimeSlot } from '../types/index.js';
import { CONSTRAINT_NAMES, type ConstraintName } from '../constraints/index.js';
import { classKey, formatClassRef, lookupClassRef } from '../model/class-ref.js';
import { SchoolConfigurationError } from '../model/errors.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import { SchoolModel, type SchoolModelOptions } from '../model/school-model.js';
import { PERIODS_PER_DAY, createTimeSlot, formatTimeSlot, lookupDay, slotKey } from '../model/time-slot.js';
import { teacherSlotLimitRule, type LearnedRule } from '../validator/learned-rules.js';

// =============================================================================
// Field schemas
// =============================================================================

const classLabel = z.string().transform((label, ctx): ClassRef => {
  const classRef = lookupClassRef(label);
  if (!classRef) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid class "${label}" (expected "<grade>-<class>")` });
    return z.NEVER;
  }
  return classRef;
});

const dayName = z.string().transform((value, ctx): Day => {
  const day = lookupDay(value);
  if (!day) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown day "${value}"` });
    return z.NEVER;
  }
  return day;
});

const period = z.number().int().min(1).max(PERIODS_PER_DAY);

const subjectName = z.string().trim().min(1, 'Subject is required');

const teacherName = z.string().trim().min(1, 'Teacher name is required');

const constraintSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  type: z.enum(['hard', 'soft']).optional(),
  priority: z.enum(['critical', 'high', 'medium', 'low', 'suggestion']).optional(),
});

const learnedRuleSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('teacher-slot-limit'),
    teacher: teacherName,
    day: dayName,
    period,
    maxClasses: z.number().int().min(0),
    description: z.string().optional(),
  }),
]);

// =============================================================================
// File schemas
// =============================================================================

export const schoolFileSchema = z.object({
  classes: z.array(classLabel).min(1, 'At least one class is required'),
  subjects: z.array(subjectName).default([]),
  teacherAssignments: z
    .array(z.object({ teacher: teacherName, subject: subjectName, class: classLabel }))
    .default([]),
  absences: z
    .array(
      z.object({
        teacher: teacherName,
        day: dayName,
        periods: z.union([z.literal('all'), z.array(period).min(1)]).default('all'),
        reason: z.string().optional(),
      })
    )
    .default([]),
  exchangePairs: z
    .array(
      z.object({
        exchangeClass: classLabel,
        parentClass: classLabel,
        allowedParentSubjects: z.array(subjectName).default([]),
      })
    )
    .default([]),
  jointCohorts: z
    .array(z.object({ name: z.string().min(1), classes: z.array(classLabel).min(2) }))
    .default([]),
  protectedSubjects: z.array(subjectName).optional(),
  independentSubjects: z.array(subjectName).optional(),
  sharedResourceSubjects: z.array(subjectName).optional(),
  testPeriods: z.array(z.object({ day: dayName, period })).default([]),
  placeholderTeachers: z.array(teacherName).default([]),
  constraints: z.record(z.enum(CONSTRAINT_NAMES), constraintSettingsSchema).default({}),
  learnedRules: z.array(learnedRuleSchema).default([]),
});

export const scheduleFileSchema = z.object({
  assignments: z.array(
    z.object({
      day: dayName,
      period,
      class: classLabel,
      subject: subjectName,
      teacher: z.string().trim().nullable().optional(),
      locked: z.boolean().optional(),
    })
  ),
});

export type SchoolFile = z.input<typeof schoolFileSchema>;
export type ScheduleFile = z.input<typeof scheduleFileSchema>;

export interface SchoolConfig {
  school: SchoolModel;
  settings: Partial<Record<ConstraintName, ConstraintSettings>>;
  learnedRules: LearnedRule[];
}

// =============================================================================
// Parsing
// =============================================================================

export function parseSchoolConfig(raw: unknown, options: SchoolModelOptions = {}): SchoolConfig {
  const parsed = schoolFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchoolConfigurationError('Invalid school file', formatIssues(parsed.error));
  }
  const data = parsed.data;

  const school = new SchoolModel(
    {
      classes: data.classes,
      subjects: data.subjects,
      teacherAssignments: data.teacherAssignments.map(row => ({
        teacher: { name: row.teacher },
        subject: row.subject,
        classRef: row.class,
      })),
      absences: data.absences,
      exchangePairs: data.exchangePairs,
      jointCohorts: data.jointCohorts,
      protectedSubjects: data.protectedSubjects,
      independentSubjects: data.independentSubjects,
      sharedResourceSubjects: data.sharedResourceSubjects,
      testPeriods: data.testPeriods.map(slot => createTimeSlot(slot.day, slot.period)),
      placeholderTeachers: data.placeholderTeachers,
    },
    options
  );

  const learnedRules = data.learnedRules.map(rule =>
    teacherSlotLimitRule({
      teacher: rule.teacher,
      timeSlot: createTimeSlot(rule.day, rule.period),
      maxClasses: rule.maxClasses,
      description: rule.description,
    })
  );

  return { school, settings: data.constraints, learnedRules };
}

/**
 * Places every entry on a fresh grid for `school`. Entries marked `locked`
 * and entries in test periods are locked once all are placed.
 */
export function parseSchedule(raw: unknown, school: SchoolModel): ScheduleGrid {
  const parsed = scheduleFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchoolConfigurationError('Invalid schedule file', formatIssues(parsed.error));
  }

  const issues: string[] = [];
  const seen = new Set<string>();
  const grid = school.createGrid();
  const toLock: Array<{ timeSlot: TimeSlot; classRef: ClassRef }> = [];

  parsed.data.assignments.forEach((entry, index) => {
    const timeSlot = createTimeSlot(entry.day, entry.period);
    const cell = `${slotKey(timeSlot)}|${classKey(entry.class)}`;
    if (seen.has(cell)) {
      issues.push(
        `assignments.${index}: ${formatClassRef(entry.class)} already has a lesson on ${formatTimeSlot(timeSlot)}`
      );
      return;
    }
    seen.add(cell);

    const assignment: Assignment = {
      classRef: entry.class,
      subject: entry.subject,
      teacher: normalizeTeacher(entry.teacher),
    };
    grid.assign(timeSlot, assignment);
    if (entry.locked || school.isTestPeriod(timeSlot)) {
      toLock.push({ timeSlot, classRef: entry.class });
    }
  });

  if (issues.length > 0) {
    throw new SchoolConfigurationError('Invalid schedule file', issues);
  }

  for (const { timeSlot, classRef } of toLock) {
    grid.lock(timeSlot, classRef);
  }
  return grid;
}

// =============================================================================
// Files
// =============================================================================

export async function loadSchoolConfig(path: string, options: SchoolModelOptions = {}): Promise<SchoolConfig> {
  return parseSchoolConfig(await readJson(path, 'school'), options);
}

export async function loadSchedule(path: string, school: SchoolModel): Promise<ScheduleGrid> {
  return parseSchedule(await readJson(path, 'schedule'), school);
}

async function readJson(path: string, label: string): Promise<unknown> {
  if (!existsSync(path)) {
    throw new SchoolConfigurationError(`File not found: ${path} (${label})`);
  }
  const text = await readFile(path, 'utf-8');
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchoolConfigurationError(`Invalid JSON in ${path} (${label})`, [reason]);
  }
}

function normalizeTeacher(name: string | null | undefined): Teacher | null {
  return name ? { name } : null;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}
