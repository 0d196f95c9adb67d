import type { CommitRef, RangeScope, ResolvedRange } from '../model/commit.js';
import { CancelledError, CommitProcessingError } from '../model/errors.js';
import type { ImageFormat } from '../model/page.js';
import type { RepositoryDataSource } from '../git/types.js';
import { DiffNormalizer, type NormalizeOptions } from '../diff/normalizer.js';
import type { LayoutOptions } from '../render/layout.js';
import { type RendererRegistry, createDefaultRegistry } from '../render/registry.js';
import { CommitRangeResolver } from '../resolver/resolver.js';
import type { Logger } from '../utils/logger.js';
import { RunContext, type RunIssue } from './context.js';
import { linkSignals, mapWithConcurrency, settleWithGrace } from './pool.js';
import { CommitProcessor, type CommitResult } from './process-commit.js';

export interface PipelineOptions {
  normalize: NormalizeOptions;
  layout: LayoutOptions;
  format: ImageFormat;
  /** Commits in flight at once */
  concurrency: number;
  /** Files rendered at once within one commit */
  fileConcurrency: number;
  /** How long in-flight commits may keep running after cancellation */
  cancelGraceMs: number;
  timeoutMs?: number;
}

export interface PipelineHooks {
  signal?: AbortSignal;
  logger?: Logger;
  registry?: RendererRegistry;
  onCommitDone?: (result: CommitResult, done: number, total: number) => void;
}

export interface PipelineRun {
  range: ResolvedRange;
  /** Completed commits, in range order */
  commits: CommitResult[];
  issues: RunIssue[];
  cancelled: boolean;
}

/**
 * Resolve `scope` and turn every commit in it into pages. A failing
 * commit is recorded and skipped; only an unresolvable scope rejects.
 */
export async function runPipeline(
  source: RepositoryDataSource,
  scope: RangeScope,
  options: PipelineOptions,
  hooks: PipelineHooks = {},
): Promise<PipelineRun> {
  const linked = linkSignals(hooks.signal, options.timeoutMs);
  try {
    const ctx = new RunContext({ signal: linked.signal, logger: hooks.logger });
    const range = await new CommitRangeResolver(source).resolve(scope, ctx);
    hooks.logger?.debug(`Resolved ${range.commits.length} commit(s) via ${range.strategy}`);

    const commits = await processCommits(range.commits, source, options, hooks, ctx);
    return { range, commits, issues: ctx.getIssues(), cancelled: ctx.cancelled };
  } finally {
    linked.dispose();
  }
}

export async function processCommits(
  commits: CommitRef[],
  source: RepositoryDataSource,
  options: PipelineOptions,
  hooks: PipelineHooks,
  ctx: RunContext,
): Promise<CommitResult[]> {
  const renderer = (hooks.registry ?? createDefaultRegistry()).get(options.format);
  const processor = new CommitProcessor(
    new DiffNormalizer(source, options.normalize),
    renderer,
    options.layout,
    options.fileConcurrency,
  );

  const dispatched = new Set<number>();
  let done = 0;

  const results = await mapWithConcurrency(
    commits,
    options.concurrency,
    async (commit, index) => {
      dispatched.add(index);
      const outcome = await settleWithGrace(processor.process(commit, ctx), ctx.signal, options.cancelGraceMs);

      if (outcome.status === 'cancelled') {
        ctx.fail(new CancelledError(commit.hash), { commit: commit.hash });
        return undefined;
      }
      if (outcome.status === 'failed') {
        ctx.fail(new CommitProcessingError(commit.hash, { cause: outcome.error }), { commit: commit.hash });
        return undefined;
      }

      done++;
      hooks.onCommitDone?.(outcome.value, done, commits.length);
      return outcome.value;
    },
    () => ctx.cancelled,
  );

  const notStarted = commits.length - dispatched.size;
  if (ctx.cancelled && notStarted > 0) {
    ctx.fail(new CancelledError(undefined, notStarted));
  }

  return results.filter((result): result is CommitResult => result !== undefined);
}
