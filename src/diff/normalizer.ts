import type { CommitRef } from '../model/commit.js';
import type { ChangedFile, ChangeSummary, FileDiff } from '../model/diff.js';
import { changedLineCount } from '../model/diff.js';
import { DiffParseError, RepositoryError, describeError } from '../model/errors.js';
import type { RepositoryDataSource } from '../git/types.js';
import type { RunContext } from '../pipeline/context.js';
import { DEFAULT_EXCLUDE_PATTERNS, TEXT_EXTENSIONS, isExcluded, isTextFile } from './filters.js';
import { type ParsedPatch, parsePatch } from './patch-parser.js';
import { truncateHunks } from './truncate.js';

export interface NormalizeOptions {
  maxFilesPerCommit: number;
  excludePatterns: string[];
  perFileLineCeiling: number;
  perCommitLineCeiling: number;
  textExtensions?: string[];
}

export interface NormalizedCommit {
  files: FileDiff[];
  summary: ChangeSummary;
}

export class DiffNormalizer {
  private excludes: string[];
  private extensions: string[];

  constructor(private source: RepositoryDataSource, private options: NormalizeOptions) {
    this.excludes = [...options.excludePatterns, ...DEFAULT_EXCLUDE_PATTERNS];
    this.extensions = (options.textExtensions ?? TEXT_EXTENSIONS).map(ext => ext.toLowerCase());
  }

  async normalize(commit: CommitRef, ctx: RunContext): Promise<NormalizedCommit> {
    const changed = await this.source.listChangedFiles(commit);
    const summary: ChangeSummary = {
      totalAdded: 0,
      totalRemoved: 0,
      filesChanged: changed.length,
      truncated: false,
      summarizedFiles: new Set(),
      binaryFiles: [],
      skippedFiles: [],
    };

    const candidates: ChangedFile[] = [];
    for (const file of changed) {
      if (isExcluded(file.path, this.excludes)) {
        summary.skippedFiles.push({ path: file.path, reason: 'excluded' });
      } else if (await this.source.isBinary(commit, file.path)) {
        summary.binaryFiles.push(file.path);
        summary.skippedFiles.push({ path: file.path, reason: 'binary' });
      } else if (!isTextFile(file.path, this.extensions)) {
        summary.skippedFiles.push({ path: file.path, reason: 'not-text' });
      } else {
        candidates.push(file);
        summary.totalAdded += Math.max(0, file.added);
        summary.totalRemoved += Math.max(0, file.removed);
      }
    }

    const kept = this.selectLargest(candidates, summary);

    const parsed = await Promise.all(kept.map(file => this.readFile(commit, file, ctx, summary)));
    const files = this.applyCommitCeiling(parsed.filter((f): f is FileDiff => f !== null), summary);

    return { files, summary };
  }

  /** Keep the `maxFilesPerCommit` biggest files, in repository order. */
  private selectLargest(candidates: ChangedFile[], summary: ChangeSummary): ChangedFile[] {
    if (candidates.length <= this.options.maxFilesPerCommit) return candidates;

    const ranked = candidates
      .map((file, index) => ({ file, index }))
      .sort((a, b) => changedLineCount(b.file) - changedLineCount(a.file) || a.index - b.index);
    const keep = new Set(ranked.slice(0, this.options.maxFilesPerCommit).map(r => r.index));

    candidates.forEach((file, index) => {
      if (!keep.has(index)) summary.summarizedFiles.add(file.path);
    });
    summary.truncated = true;

    return candidates.filter((_file, index) => keep.has(index));
  }

  private async readFile(
    commit: CommitRef,
    file: ChangedFile,
    ctx: RunContext,
    summary: ChangeSummary,
  ): Promise<FileDiff | null> {
    const where = { commit: commit.hash, path: file.path };

    let patch: string;
    try {
      patch = await this.source.getFileDiff(commit, file.path, file.oldPath);
    } catch (error) {
      ctx.warn(new RepositoryError(`Could not read the diff of ${file.path}: ${describeError(error)}`, { cause: error }), where);
      summary.skippedFiles.push({ path: file.path, reason: 'read-error' });
      return null;
    }

    let parsed: ParsedPatch;
    try {
      parsed = parsePatch(patch, file.path);
    } catch (error) {
      ctx.warn(error instanceof DiffParseError ? error : new DiffParseError(file.path, describeError(error)), where);
      summary.skippedFiles.push({ path: file.path, reason: 'parse-error' });
      return null;
    }

    if (parsed.isBinary) {
      summary.binaryFiles.push(file.path);
      summary.skippedFiles.push({ path: file.path, reason: 'binary' });
      return null;
    }

    const diff: FileDiff = {
      path: file.path,
      oldPath: file.oldPath,
      changeKind: file.changeKind,
      isBinary: false,
      hunks: parsed.hunks,
      added: parsed.added,
      removed: parsed.removed,
      truncated: false,
    };

    const ceiling = this.options.perFileLineCeiling;
    if (changedLineCount(diff) > ceiling) {
      const { hunks } = truncateHunks(diff.hunks, Math.ceil(ceiling / 2), Math.floor(ceiling / 2));
      diff.hunks = hunks;
      diff.truncated = true;
      summary.truncated = true;
    }

    return diff;
  }

  /**
   * Walk files in order; once the rendered changed lines would pass the
   * commit ceiling, the remaining files are only summarized. The first
   * file is always rendered.
   */
  private applyCommitCeiling(files: FileDiff[], summary: ChangeSummary): FileDiff[] {
    const rendered: FileDiff[] = [];
    let budgetUsed = 0;

    for (const [index, file] of files.entries()) {
      const cost = Math.min(changedLineCount(file), this.options.perFileLineCeiling);
      if (rendered.length > 0 && budgetUsed + cost > this.options.perCommitLineCeiling) {
        for (const rest of files.slice(index)) summary.summarizedFiles.add(rest.path);
        summary.truncated = true;
        break;
      }
      rendered.push(file);
      budgetUsed += cost;
    }

    return rendered;
  }
}
