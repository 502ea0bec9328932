#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { analyze } from './commands/analyze';
import { check } from './commands/check';
import { report } from './commands/report';

const program = new Command();

program
  .name('codeshape')
  .description('Structural metrics and complexity for C-family, Go and Python sources')
  .version('0.1.0');

program
  .command('analyze')
  .description('Count declarations and includes per file')
  .argument('<glob>', 'File glob pattern (e.g., "src/**/*.cpp")')
  .option('--json', 'Print reports as JSON')
  .option('-c, --config <path>', 'Config file (defaults to .codeshaperc.json)')
  .action(analyze);

program
  .command('check')
  .description('Check cyclomatic complexity against a threshold')
  .argument('<glob>', 'File glob pattern')
  .option('-t, --threshold <number>', 'Complexity threshold (defaults to threshold.warning)')
  .option('-f, --fail-on-error', 'Exit with error code if threshold exceeded')
  .option('-c, --config <path>', 'Config file (defaults to .codeshaperc.json)')
  .action(check);

program
  .command('report')
  .description('Generate a metrics report')
  .argument('<glob>', 'File glob pattern')
  .option('-o, --output <path>', 'Output file path', 'codeshape-report.html')
  .option('-f, --format <format>', 'Output format (html, json)', 'html')
  .option('-c, --config <path>', 'Config file (defaults to .codeshaperc.json)')
  .action(report);

program.parseAsync().catch((e: unknown) => {
  console.error(chalk.red(e instanceof Error ? e.message : String(e)));
  process.exitCode = 1;
});
