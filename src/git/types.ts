import type { CommitRef, ReflogEntry } from '../model/commit.js';
import type { ChangedFile } from '../model/diff.js';

/**
 * Read-only view of a repository. Implementations must be safe to share
 * between concurrent workers.
 */
export interface RepositoryDataSource {
  /** Resolve a branch, tag, or (abbreviated) hash. Throws RefNotFoundError. */
  getRef(name: string): Promise<CommitRef>;
  /** Every commit reachable from `ref`, including it. Order is unspecified. */
  listAncestors(ref: string): Promise<CommitRef[]>;
  mergeBase(a: string, b: string): Promise<CommitRef | null>;
  /** Newest entry first. Empty when the ref has no (or an expired) reflog. */
  getReflog(ref: string): Promise<ReflogEntry[]>;
  /** Files changed relative to the first parent (the empty tree for root commits). */
  listChangedFiles(commit: CommitRef): Promise<ChangedFile[]>;
  /** Unified patch for one file, relative to the first parent. */
  getFileDiff(commit: CommitRef, path: string, oldPath?: string): Promise<string>;
  isBinary(commit: CommitRef, path: string): Promise<boolean>;
}
