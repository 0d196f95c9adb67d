#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { generateCommand } from '../src/cli/commands/generate.js';
import { resolveCommand } from '../src/cli/commands/resolve.js';
import { DiffDocError } from '../src/model/errors.js';

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

async function run(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (error instanceof DiffDocError) {
      console.error(chalk.red(`Error: ${error.message}`));
    } else {
      console.error(chalk.red('Unexpected error:'), error);
    }
    process.exit(1);
  }
}

const program = new Command();

program
  .name('diffdoc')
  .description('Document a branch\'s commits as paginated side-by-side diff images')
  .version('0.1.0');

program
  .command('generate')
  .description('Render the range\'s commits and write commit-history.md with its images')
  .option('-b, --branch <name>', 'Branch to document (default: the checked-out branch)')
  .option('--base <ref>', 'Branch the target is compared against (default: main)')
  .option('--all-commits', 'Include every commit reachable from the branch')
  .option('--commits <file>', 'File with commit hashes, one per line')
  .option('-o, --output <dir>', 'Output directory', './output')
  .option('--max-files <n>', 'Maximum files rendered per commit', positiveInt)
  .option('--image-width <px>', 'Image width in pixels', positiveInt)
  .option('--exclude-patterns <globs>', 'Comma-separated globs to leave out (e.g. "*.lock,dist/**")')
  .addOption(new Option('--image-format <format>', 'Image format').choices(['png', 'svg'] as const))
  .option('-j, --concurrency <n>', 'Commits processed at once', positiveInt)
  .option('--timeout <ms>', 'Abort the run after this many milliseconds', positiveInt)
  .addOption(new Option('-f, --format <format>', 'Report format').choices(['terminal', 'json'] as const).default('terminal'))
  .option('-v, --verbose', 'Enable debug logging')
  .action(async (opts) => {
    await run(() => generateCommand({
      branch: opts.branch,
      base: opts.base,
      allCommits: opts.allCommits,
      commits: opts.commits,
      output: opts.output,
      maxFiles: opts.maxFiles,
      imageWidth: opts.imageWidth,
      excludePatterns: opts.excludePatterns,
      imageFormat: opts.imageFormat,
      concurrency: opts.concurrency,
      timeout: opts.timeout,
      format: opts.format,
      verbose: opts.verbose,
    }));
  });

program
  .command('resolve')
  .description('List the commits a generate run would cover')
  .option('-b, --branch <name>', 'Branch to inspect (default: the checked-out branch)')
  .option('--base <ref>', 'Branch the target is compared against (default: main)')
  .option('--all-commits', 'Include every commit reachable from the branch')
  .option('--commits <file>', 'File with commit hashes, one per line')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['terminal', 'json'] as const).default('terminal'))
  .option('-v, --verbose', 'Enable debug logging')
  .action(async (opts) => {
    await run(() => resolveCommand({
      branch: opts.branch,
      base: opts.base,
      allCommits: opts.allCommits,
      commits: opts.commits,
      format: opts.format,
      verbose: opts.verbose,
    }));
  });

await program.parseAsync();
