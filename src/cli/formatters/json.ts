import type { CommitRef, ResolvedRange } from '../../model/commit.js';
import { firstLine } from '../../model/commit.js';
import type { PipelineRun } from '../../pipeline/run.js';
import type { WrittenDocument } from '../assembler/markdown.js';

function commitJson(commit: CommitRef) {
  return {
    hash: commit.hash,
    shortHash: commit.shortHash,
    parents: commit.parents,
    author: commit.author,
    email: commit.email,
    timestamp: commit.timestamp,
    subject: firstLine(commit.message),
  };
}

function rangeJson(range: ResolvedRange) {
  return {
    scope: range.scope,
    strategy: range.strategy,
    mergeBase: range.mergeBase?.hash,
    recoveredTip: range.recoveredTip?.hash,
    commits: range.commits.map(commitJson),
  };
}

export function formatRangeJson(range: ResolvedRange): string {
  return JSON.stringify(rangeJson(range), null, 2);
}

export function formatRunJson(run: PipelineRun, written?: WrittenDocument): string {
  return JSON.stringify({
    range: rangeJson(run.range),
    cancelled: run.cancelled,
    document: written,
    commits: run.commits.map(result => ({
      hash: result.commit.hash,
      summary: {
        totalAdded: result.summary.totalAdded,
        totalRemoved: result.summary.totalRemoved,
        filesChanged: result.summary.filesChanged,
        truncated: result.summary.truncated,
        summarizedFiles: [...result.summary.summarizedFiles],
        binaryFiles: result.summary.binaryFiles,
        skippedFiles: result.summary.skippedFiles,
      },
      files: result.files,
      pages: result.pages.map(page => ({
        filePath: page.filePath,
        pageIndex: page.pageIndex,
        sequenceNumber: page.sequenceNumber,
        format: page.format,
        width: page.width,
        height: page.height,
        rowCount: page.rowCount,
      })),
    })),
    issues: run.issues,
  }, null, 2);
}
