import { DiffDocError, type ErrorCode, describeError } from '../model/errors.js';
import type { PageImage, RenderedPage } from '../model/page.js';
import type { Logger } from '../utils/logger.js';

export type IssueSeverity = 'warning' | 'error';

export interface RunIssue {
  severity: IssueSeverity;
  code: ErrorCode | 'UNEXPECTED';
  message: string;
  commit?: string;
  path?: string;
}

/**
 * Per-run state threaded through resolver, normalizer and renderer.
 * Holds the collected issues and the per-commit page counters; nothing
 * else in the pipeline keeps state between calls.
 */
export class RunContext {
  readonly signal?: AbortSignal;
  private readonly logger?: Logger;
  private readonly issues: RunIssue[] = [];
  private readonly sequenceCounters = new Map<string, number>();

  constructor(opts: { signal?: AbortSignal; logger?: Logger } = {}) {
    this.signal = opts.signal;
    this.logger = opts.logger;
  }

  get cancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  warn(error: unknown, where: { commit?: string; path?: string } = {}): void {
    this.record('warning', error, where);
  }

  fail(error: unknown, where: { commit?: string; path?: string } = {}): void {
    this.record('error', error, where);
  }

  getIssues(): RunIssue[] {
    return [...this.issues];
  }

  /**
   * Numbering barrier for one commit. Takes every file's pages, in
   * normalizer file order, and stamps them 1..n. Must only be called once
   * all of the commit's files have finished rendering.
   */
  numberPages(commitHash: string, pagesByFile: PageImage[][]): RenderedPage[] {
    let next = this.sequenceCounters.get(commitHash) ?? 0;
    const numbered: RenderedPage[] = [];
    for (const pages of pagesByFile) {
      for (const page of pages) {
        next++;
        numbered.push({ ...page, sequenceNumber: next });
      }
    }
    this.sequenceCounters.set(commitHash, next);
    return numbered;
  }

  private record(severity: IssueSeverity, error: unknown, where: { commit?: string; path?: string }): void {
    const issue: RunIssue = {
      severity,
      code: error instanceof DiffDocError ? error.code : 'UNEXPECTED',
      message: describeError(error),
      ...where,
    };
    this.issues.push(issue);

    const location = [where.commit?.slice(0, 8), where.path].filter(Boolean).join(' ');
    const line = location ? `${location}: ${issue.message}` : issue.message;
    if (severity === 'warning') {
      this.logger?.warn(line);
    } else {
      this.logger?.error(line);
    }
  }
}
