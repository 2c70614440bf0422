/**
 * Report Generator
 *
 * Renders a schedule audit as text, markdown or JSON. Every constraint
 * result message and every violation description is printed as given.
 */

import chalk from 'chalk';
import type { ClassRef, ConstraintViolation, Day, ScheduleValidation } from '../types/index.js';
import { classesToAudit } from '../constraints/base.js';
import { formatClassRef } from '../model/class-ref.js';
import type { ScheduleGrid } from '../model/schedule-grid.js';
import type { SchoolModel } from '../model/school-model.js';
import { DAYS, DAY_NAMES, PERIODS, createTimeSlot } from '../model/time-slot.js';

export interface ReportOptions {
  format: 'text' | 'json' | 'markdown';
  includeClassTimetables?: boolean;
  /** Limit class timetables to these classes; defaults to every audited class. */
  classes?: readonly ClassRef[];
  colorOutput?: boolean;
}

interface Painter {
  bold(text: string): string;
  green(text: string): string;
  red(text: string): string;
  yellow(text: string): string;
}

const plain: Painter = {
  bold: s => s,
  green: s => s,
  red: s => s,
  yellow: s => s,
};

const COLUMN_WIDTH = 12;

export function generateReport(
  grid: ScheduleGrid,
  school: SchoolModel,
  validation: ScheduleValidation,
  options: ReportOptions
): string {
  switch (options.format) {
    case 'json':
      return generateJsonReport(grid, school, validation);
    case 'markdown':
      return generateMarkdownReport(grid, school, validation, options);
    case 'text':
    default:
      return generateTextReport(grid, school, validation, options);
  }
}

function generateJsonReport(grid: ScheduleGrid, school: SchoolModel, validation: ScheduleValidation): string {
  const report = {
    validation: {
      valid: validation.valid,
      score: validation.score,
      hardViolations: validation.hardViolations.length,
      softViolations: validation.softViolations.length,
    },
    statistics: {
      classes: classesToAudit(grid, school).length,
      assignments: grid.size,
      lockedCells: grid.lockedCells().length,
    },
    results: validation.results.map(result => ({
      constraint: result.constraintName,
      message: result.message,
      violations: result.violations.map(violationToJson),
    })),
  };

  return JSON.stringify(report, null, 2);
}

function violationToJson(v: ConstraintViolation) {
  return {
    severity: v.severity,
    description: v.description,
    day: v.timeSlot.day,
    period: v.timeSlot.period,
    class: formatClassRef(v.assignment.classRef),
    subject: v.assignment.subject,
    teacher: v.assignment.teacher?.name ?? null,
  };
}

function generateMarkdownReport(
  grid: ScheduleGrid,
  school: SchoolModel,
  validation: ScheduleValidation,
  options: ReportOptions
): string {
  const lines: string[] = [];

  lines.push('# Timetable Validation Report');
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Status | ${validation.valid ? 'Valid' : 'Invalid'} |`);
  lines.push(`| Score | ${validation.score}/100 |`);
  lines.push(`| Assignments | ${grid.size} |`);
  lines.push(`| Hard Violations | ${validation.hardViolations.length} |`);
  lines.push(`| Soft Violations | ${validation.softViolations.length} |`);
  lines.push('');

  lines.push('## Constraints');
  lines.push('');
  for (const result of validation.results) {
    lines.push(`- ${result.message}`);
  }
  lines.push('');

  if (validation.hardViolations.length > 0) {
    lines.push('## Hard Constraint Violations');
    lines.push('');
    for (const v of validation.hardViolations) {
      lines.push(`- **${v.constraintName}**: ${v.description}`);
    }
    lines.push('');
  }

  if (validation.softViolations.length > 0) {
    lines.push('## Soft Constraint Violations (Warnings)');
    lines.push('');
    for (const v of validation.softViolations) {
      lines.push(`- **${v.constraintName}**: ${v.description}`);
    }
    lines.push('');
  }

  if (options.includeClassTimetables) {
    lines.push('## Class Timetables');
    lines.push('');
    for (const classRef of options.classes ?? classesToAudit(grid, school)) {
      lines.push(`### ${formatClassRef(classRef)}`);
      lines.push('');
      lines.push(formatClassTimetableMarkdown(grid, classRef));
      lines.push('');
    }
  }

  return lines.join('\n');
}

function generateTextReport(
  grid: ScheduleGrid,
  school: SchoolModel,
  validation: ScheduleValidation,
  options: ReportOptions
): string {
  const lines: string[] = [];
  const c: Painter = options.colorOutput ? chalk : plain;

  lines.push(c.bold('═'.repeat(70)));
  lines.push(c.bold('                  TIMETABLE VALIDATION REPORT'));
  lines.push(c.bold('═'.repeat(70)));
  lines.push('');

  const statusColor = validation.valid ? c.green : c.red;
  lines.push(c.bold('STATUS: ') + statusColor(validation.valid ? 'VALID' : 'INVALID'));
  lines.push(c.bold('SCORE:  ') + `${validation.score}/100`);
  lines.push('');

  lines.push(c.bold('─'.repeat(70)));
  lines.push(c.bold('STATISTICS'));
  lines.push(c.bold('─'.repeat(70)));
  lines.push(`  Classes:          ${classesToAudit(grid, school).length}`);
  lines.push(`  Assignments:      ${grid.size}`);
  lines.push(`  Locked Cells:     ${grid.lockedCells().length}`);
  lines.push('');

  lines.push(c.bold('─'.repeat(70)));
  lines.push(c.bold('CONSTRAINT SUMMARY'));
  lines.push(c.bold('─'.repeat(70)));
  for (const result of validation.results) {
    const paint = result.violations.length === 0 ? c.green : result.violations[0].severity === 'error' ? c.red : c.yellow;
    lines.push(`  ${paint(result.message)}`);
  }
  lines.push('');
  lines.push(`  Hard Violations:  ${c.red(String(validation.hardViolations.length))}`);
  lines.push(`  Soft Violations:  ${c.yellow(String(validation.softViolations.length))}`);
  lines.push('');

  if (validation.hardViolations.length > 0) {
    lines.push(c.red('  HARD CONSTRAINT VIOLATIONS:'));
    for (const v of validation.hardViolations) {
      lines.push(c.red(`    • ${v.description}`));
    }
    lines.push('');
  }

  if (validation.softViolations.length > 0) {
    lines.push(c.yellow('  SOFT CONSTRAINT WARNINGS:'));
    for (const v of validation.softViolations) {
      lines.push(c.yellow(`    • ${v.description}`));
    }
    lines.push('');
  }

  if (options.includeClassTimetables) {
    lines.push(c.bold('─'.repeat(70)));
    lines.push(c.bold('CLASS TIMETABLES'));
    lines.push(c.bold('─'.repeat(70)));
    for (const classRef of options.classes ?? classesToAudit(grid, school)) {
      lines.push('');
      lines.push(formatClassTimetable(grid, classRef));
    }
    lines.push('');
  }

  lines.push(c.bold('═'.repeat(70)));

  return lines.join('\n');
}

/**
 * Week grid for one class. Locked cells are marked with `*`.
 */
export function formatClassTimetable(grid: ScheduleGrid, classRef: ClassRef): string {
  const lines: string[] = [];

  lines.push(`  Class ${formatClassRef(classRef)}`);

  let header = '  Period │';
  for (const day of DAYS) {
    header += ` ${DAY_NAMES[day].padEnd(COLUMN_WIDTH)}│`;
  }
  lines.push(header);
  lines.push(
    '  ' + '─'.repeat(8) + '┼' + ('─'.repeat(COLUMN_WIDTH + 1) + '┼').repeat(DAYS.length - 1) +
      '─'.repeat(COLUMN_WIDTH + 1) + '│'
  );

  for (const period of PERIODS) {
    let row = `  ${String(period).padStart(6)} │`;
    for (const day of DAYS) {
      row += ` ${cellLabel(grid, classRef, day, period).substring(0, COLUMN_WIDTH - 1).padEnd(COLUMN_WIDTH)}│`;
    }
    lines.push(row);
  }

  return lines.join('\n');
}

function formatClassTimetableMarkdown(grid: ScheduleGrid, classRef: ClassRef): string {
  const lines: string[] = [];
  lines.push(`| Period | ${DAYS.map(d => DAY_NAMES[d]).join(' | ')} |`);
  lines.push(`|--------|${DAYS.map(() => '------').join('|')}|`);
  for (const period of PERIODS) {
    const cells = DAYS.map(day => cellLabel(grid, classRef, day, period) || ' ');
    lines.push(`| ${period} | ${cells.join(' | ')} |`);
  }
  return lines.join('\n');
}

function cellLabel(grid: ScheduleGrid, classRef: ClassRef, day: Day, period: number): string {
  const timeSlot = createTimeSlot(day, period);
  const subject = grid.getAssignment(timeSlot, classRef)?.subject ?? '';
  return grid.isExplicitlyLocked(timeSlot, classRef) ? `${subject}*` : subject;
}
