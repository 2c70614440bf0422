#!/usr/bin/env tsx
/**
 * Schedule Validation CLI
 *
 * Audit a complete timetable against every constraint.
 *
 * Usage:
 *   npm run validate -- --school ./data/demo/school.json --schedule ./data/demo/schedule.json
 */

import { Command } from 'commander';
import { resolve } from 'path';
import chalk from 'chalk';
import cliProgress from 'cli-progress';

import { loadSchedule, loadSchoolConfig } from '../parser/data-loader.js';
import { createValidator } from '../validator/index.js';
import { createCachedValidator } from '../validator/cached-validator.js';

interface ValidateOptions {
  school: string;
  schedule: string;
  verbose?: boolean;
  json?: boolean;
  quiet?: boolean;
  cached?: boolean;
}

const program = new Command();

program
  .name('validate')
  .description('Validate a class timetable against the school constraints')
  .requiredOption('--school <file>', 'Path to school JSON file')
  .requiredOption('-s, --schedule <file>', 'Path to schedule JSON file')
  .option('--verbose', 'Show every violation')
  .option('--json', 'Output results as JSON')
  .option('--quiet', 'Suppress progress output')
  .option('--cached', 'Use the cached validator')
  .parse(process.argv);

const opts = program.opts<ValidateOptions>();

async function main() {
  const { school, settings, learnedRules } = await loadSchoolConfig(resolve(opts.school));
  const grid = await loadSchedule(resolve(opts.schedule), school);

  const validator = opts.cached
    ? createCachedValidator(school, { settings, learnedRules })
    : createValidator(school, { settings, learnedRules });

  let progressBar: cliProgress.SingleBar | null = null;
  if (!opts.quiet && !opts.json) {
    progressBar = new cliProgress.SingleBar({
      format: '  Auditing |' + chalk.cyan('{bar}') + '| {percentage}% | {operation}',
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
    });
    progressBar.start(100, 0, { operation: 'Starting...' });
  }

  const validation = validator.validateSchedule(grid, school, {
    onProgress: progress => {
      progressBar?.update(progress.percentComplete, { operation: progress.currentOperation });
    },
  });

  progressBar?.stop();

  if (opts.json) {
    console.log(JSON.stringify({
      valid: validation.valid,
      score: validation.score,
      results: validation.results.map(r => ({ constraint: r.constraintName, message: r.message })),
      hardViolations: validation.hardViolations,
      softViolations: validation.softViolations,
    }, null, 2));
  } else {
    console.log(chalk.bold('\nTimetable Validation Results'));
    console.log('═'.repeat(50));

    if (validation.valid) {
      console.log(chalk.green.bold('Status: VALID'));
    } else {
      console.log(chalk.red.bold('Status: INVALID'));
    }

    console.log(`Score: ${validation.score}/100`);
    console.log(`Hard Violations: ${validation.hardViolations.length}`);
    console.log(`Soft Violations: ${validation.softViolations.length}`);
    console.log('');
    for (const result of validation.results) {
      const paint = result.violations.length === 0 ? chalk.green : chalk.yellow;
      console.log(paint(`  ${result.message}`));
    }

    if (opts.verbose && validation.hardViolations.length > 0) {
      console.log(chalk.red('\nHard Constraint Violations:'));
      for (const v of validation.hardViolations) {
        console.log(chalk.red(`  • [${v.constraintName}] ${v.description}`));
      }
    }

    if (opts.verbose && validation.softViolations.length > 0) {
      console.log(chalk.yellow('\nSoft Constraint Warnings:'));
      for (const v of validation.softViolations) {
        console.log(chalk.yellow(`  • [${v.constraintName}] ${v.description}`));
      }
    }

    console.log('');
  }

  process.exit(validation.valid ? 0 : 1);
}

main().catch((err: unknown) => {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
  process.exit(1);
});
