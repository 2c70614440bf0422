#!/usr/bin/env tsx
/**
 * Placement Check CLI
 *
 * Ask whether one lesson may be placed into an existing timetable.
 *
 * Usage:
 *   npm run check -- --school ./data/demo/school.json --schedule ./data/demo/schedule.json \
 *     --day Tue --period 5 --class 2-2 --subject Math
 */

import { Command } from 'commander';
import { resolve } from 'path';
import chalk from 'chalk';

import { loadSchedule, loadSchoolConfig } from '../parser/data-loader.js';
import { parseClassRef } from '../model/class-ref.js';
import { createTimeSlot, parseDay } from '../model/time-slot.js';
import { createValidator } from '../validator/index.js';
import type { Assignment, ValidatorEvent } from '../types/index.js';

interface CheckOptions {
  school: string;
  schedule?: string;
  day: string;
  period: string;
  class: string;
  subject: string;
  teacher?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('check')
  .description('Check whether a lesson can be placed without breaking a hard constraint')
  .requiredOption('--school <file>', 'Path to school JSON file')
  .option('-s, --schedule <file>', 'Path to schedule JSON file (default: empty timetable)')
  .requiredOption('--day <day>', 'Day, e.g. Mon or Monday')
  .requiredOption('--period <n>', 'Period (1-6)')
  .requiredOption('--class <class>', 'Class, e.g. 3-1')
  .requiredOption('--subject <subject>', 'Subject to place')
  .option('--teacher <name>', 'Teacher (default: the teacher assigned to the subject and class)')
  .option('--verbose', 'Log every constraint decision')
  .parse(process.argv);

const opts = program.opts<CheckOptions>();

function logEvent(event: ValidatorEvent): void {
  switch (event.kind) {
    case 'learned-rule':
      console.log(chalk.magenta(`  [${event.ruleName}] ${event.reason}`));
      break;
    case 'blocked':
      console.log(chalk.red(`  [${event.constraintName}] ${event.reason}`));
      break;
    case 'warning':
      console.log(chalk.yellow(`  [${event.constraintName}] ${event.reason}`));
      break;
  }
}

async function main() {
  const { school, settings, learnedRules } = await loadSchoolConfig(resolve(opts.school));
  const grid = opts.schedule ? await loadSchedule(resolve(opts.schedule), school) : school.createGrid();

  const validator = createValidator(school, {
    settings,
    learnedRules,
    onEvent: opts.verbose ? logEvent : undefined,
  });

  const timeSlot = createTimeSlot(parseDay(opts.day), parseInt(opts.period, 10));
  const assignment: Assignment = {
    classRef: parseClassRef(opts.class),
    subject: opts.subject,
    teacher: opts.teacher ? { name: opts.teacher } : null,
  };

  const result = validator.checkBeforeAssignment(grid, school, timeSlot, assignment);

  if (result.ok) {
    console.log(chalk.green('OK'));
  } else {
    console.log(chalk.red(`REJECTED: ${result.reason ?? 'unknown reason'}`));
  }
  for (const warning of result.warnings) {
    console.log(chalk.yellow(`WARNING: ${warning}`));
  }

  process.exit(result.ok ? 0 : 1);
}

main().catch((err: unknown) => {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
  process.exit(1);
});
