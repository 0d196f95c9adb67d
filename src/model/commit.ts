export interface CommitRef {
  /** Full 40-character object id */
  hash: string;
  shortHash: string;
  /** Parent hashes, first parent first */
  parents: string[];
  author: string;
  email: string;
  /** Commit time, unix seconds */
  timestamp: number;
  message: string;
}

export interface ReflogEntry {
  position: CommitRef;
  /** Reflog subject, e.g. "merge main: Fast-forward" or "commit: fix parser" */
  action: string;
  timestamp: number;
}

export type RangeMode = 'branch-unique' | 'all-commits';

export type RangeScope =
  | { type: 'explicit'; hashes: string[] }                               // Hash list supplied by the user
  | { type: 'branch'; target: string; base: string; mode: RangeMode };   // Branch history, optionally minus base

export type RangeStrategy = 'explicit' | 'all-commits' | 'two-ref-exclusion' | 'reflog-recovery';

export interface ResolvedRange {
  scope: RangeScope;
  strategy: RangeStrategy;
  /** Oldest first, unique by hash */
  commits: CommitRef[];
  mergeBase?: CommitRef;
  /** Branch tip reconstructed from the reflog */
  recoveredTip?: CommitRef;
}

export const SHORT_HASH_LENGTH = 8;

export function shortHash(hash: string): string {
  return hash.slice(0, SHORT_HASH_LENGTH);
}

export function firstLine(message: string): string {
  return message.split('\n')[0].trim();
}
