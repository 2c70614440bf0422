#!/usr/bin/env tsx
/**
 * Report Generation CLI
 *
 * Generate a validation report for an existing timetable.
 *
 * Usage:
 *   npm run report -- --school ./data/demo/school.json --schedule ./data/demo/schedule.json --format markdown
 */

import { Command } from 'commander';
import { dirname, resolve } from 'path';
import { mkdir, writeFile } from 'fs/promises';
import chalk from 'chalk';

import { loadSchedule, loadSchoolConfig } from '../parser/data-loader.js';
import { parseClassRef } from '../model/class-ref.js';
import { createValidator } from '../validator/index.js';
import { formatClassTimetable, generateReport, type ReportOptions } from '../reporter/index.js';

interface ReportCliOptions {
  school: string;
  schedule: string;
  format: string;
  output?: string;
  class?: string;
  timetables?: boolean;
  color?: boolean;
}

const FORMATS: ReadonlyArray<ReportOptions['format']> = ['text', 'json', 'markdown'];

const program = new Command();

program
  .name('report')
  .description('Generate a validation report for an existing timetable')
  .requiredOption('--school <file>', 'Path to school JSON file')
  .requiredOption('-s, --schedule <file>', 'Path to schedule JSON file')
  .option('-f, --format <type>', 'Output format: json, markdown, text', 'text')
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .option('--class <class>', 'Print the timetable of one class only')
  .option('--timetables', 'Include every class timetable in the report')
  .option('--color', 'Enable color output (text format only)')
  .parse(process.argv);

const opts = program.opts<ReportCliOptions>();

async function main() {
  const format = FORMATS.find(f => f === opts.format);
  if (!format) {
    throw new Error(`Unknown format "${opts.format}" (expected ${FORMATS.join(', ')})`);
  }

  const { school, settings, learnedRules } = await loadSchoolConfig(resolve(opts.school));
  const grid = await loadSchedule(resolve(opts.schedule), school);

  let output: string;
  if (opts.class) {
    output = formatClassTimetable(grid, parseClassRef(opts.class));
  } else {
    const validation = createValidator(school, { settings, learnedRules }).validateSchedule(grid, school);
    output = generateReport(grid, school, validation, {
      format,
      includeClassTimetables: opts.timetables,
      colorOutput: opts.color && !opts.output,
    });
  }

  if (opts.output) {
    const outputPath = resolve(opts.output);
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, output);
    console.log(chalk.green(`Report written to ${outputPath}`));
  } else {
    console.log(output);
  }
}

main().catch((err: unknown) => {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
  process.exit(1);
});
