import { basename, resolve } from 'node:path';
import chalk from 'chalk';
import { type ConfigOverrides, toPipelineOptions } from '../../config/config.js';
import { runPipeline } from '../../pipeline/run.js';
import { writeDocument } from '../assembler/markdown.js';
import { formatRunJson } from '../formatters/json.js';
import { formatRunSummary } from '../formatters/terminal.js';
import { type RangeOptions, buildScope, openSession } from './common.js';

export interface GenerateOptions extends RangeOptions {
  output?: string;
  maxFiles?: number;
  imageWidth?: number;
  /** Comma-separated globs */
  excludePatterns?: string;
  imageFormat?: 'png' | 'svg';
  concurrency?: number;
  timeout?: number;
  format?: 'terminal' | 'json';
}

export async function generateCommand(opts: GenerateOptions = {}): Promise<void> {
  const overrides: ConfigOverrides = {
    maxFilesPerCommit: opts.maxFiles,
    imageWidth: opts.imageWidth,
    excludePatterns: opts.excludePatterns
      ?.split(',')
      .map(pattern => pattern.trim())
      .filter(Boolean),
    format: opts.imageFormat,
    concurrency: opts.concurrency,
    timeoutMs: opts.timeout,
  };
  const session = await openSession(opts, overrides);
  const { git, logger, config } = session;
  const scope = await buildScope(opts, session);

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn(`Interrupted; waiting up to ${config.cancelGraceMs}ms for commits in progress`);
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const run = await runPipeline(git, scope, toPipelineOptions(config), {
    signal: controller.signal,
    logger,
    onCommitDone: (result, done, total) => {
      logger.info(`[${done}/${total}] ${result.commit.shortHash} ${chalk.dim(`${result.pages.length} page(s)`)}`);
    },
  }).finally(() => process.removeListener('SIGINT', onSigint));

  if (run.range.commits.length === 0 && scope.type === 'branch' && scope.mode === 'branch-unique') {
    console.log(chalk.yellow(`No commits unique to '${scope.target}'; everything is already in '${scope.base}'.`));
    console.log(chalk.dim('To document the branch\'s whole history, use --all-commits:'));
    console.log(chalk.dim(`  diffdoc generate --branch ${scope.target} --all-commits`));
    return;
  }

  const outputDir = resolve(opts.cwd ?? process.cwd(), opts.output ?? './output');
  const written = await writeDocument(
    outputDir,
    {
      repoName: basename(session.repoRoot),
      branch: scope.type === 'branch' ? scope.target : undefined,
      generatedAt: new Date(),
    },
    run,
  );

  if (opts.format === 'json') {
    console.log(formatRunJson(run, written));
  } else {
    console.log(formatRunSummary(run, written));
  }

  if (run.cancelled) process.exitCode = 130;
}
