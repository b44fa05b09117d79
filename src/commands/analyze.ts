// Path: src/commands/analyze.ts
// Analyze command - offline report over a rotation event log

import type { Command } from 'commander';
import chalk from 'chalk';
import {
  readRotationLog,
  summarizeRotationLog,
  formatRotationLogSummary,
  DEFAULT_LAST_RECORDS,
  type RotationLogSummary,
} from '../lib/analysis.js';
import { describeError } from '../utils/error.js';
import { parseCount } from './options.js';
import type { AnalyzeCommandOptions } from './types.js';

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Summarize a rotation event log')
    .requiredOption('--rotation-log <path>', 'JSONL file written by serve or client')
    .option('--last <n>', `Number of trailing records to print (default: ${DEFAULT_LAST_RECORDS})`, parseCount)
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Examples:
  cid-rotor analyze --rotation-log ./logs/rotation.jsonl
  cid-rotor analyze --rotation-log ./logs/rotation.jsonl --last 3 --json
`)
    .action(async (options: AnalyzeCommandOptions) => {
      let summary: RotationLogSummary;
      try {
        const contents = await readRotationLog(options.rotationLog);
        summary = summarizeRotationLog(contents, options.last ?? DEFAULT_LAST_RECORDS);
      } catch (err) {
        console.error(chalk.red('Failed to read rotation log:'), describeError(err));
        process.exit(1);
      }

      if (options.json === true) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      console.log(chalk.bold('Rotation log'), chalk.gray(options.rotationLog));
      console.log(formatRotationLogSummary(summary));
    });
}
