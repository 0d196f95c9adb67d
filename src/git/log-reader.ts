import type { CommitRef, ReflogEntry } from '../model/commit.js';
import { shortHash } from '../model/commit.js';

const FIELD = '%x00';
const RECORD_END = '%x1e';

/** hash, parents, author, email, commit time, raw body */
export const COMMIT_FORMAT = ['%H', '%P', '%an', '%ae', '%ct', '%B'].join(FIELD) + RECORD_END;

/** Same fields plus the reflog selector (with --date=unix) and subject */
export const REFLOG_FORMAT = ['%H', '%P', '%an', '%ae', '%ct', '%gd', '%gs', '%B'].join(FIELD) + RECORD_END;

function splitRecords(output: string): string[][] {
  return output
    .split('\x1e')
    .map(record => record.replace(/^\n/, ''))
    .filter(record => record.trim() !== '')
    .map(record => record.split('\0'));
}

function toCommit(fields: string[]): CommitRef {
  const [hash, parents, author, email, time, message] = fields;
  return {
    hash,
    shortHash: shortHash(hash),
    parents: parents ? parents.split(' ').filter(Boolean) : [],
    author,
    email,
    timestamp: parseInt(time, 10),
    message: (message ?? '').trimEnd(),
  };
}

/**
 * Parse `git log --format=COMMIT_FORMAT` output.
 */
export function parseCommitRecords(output: string): CommitRef[] {
  const commits: CommitRef[] = [];
  for (const fields of splitRecords(output)) {
    if (fields.length < 6) continue;
    commits.push(toCommit(fields));
  }
  return commits;
}

/**
 * Parse `git log -g --date=unix --format=REFLOG_FORMAT <ref>` output.
 * Selectors look like "feature@{1712345678}"; entries stay newest first.
 */
export function parseReflog(output: string): ReflogEntry[] {
  const entries: ReflogEntry[] = [];
  for (const fields of splitRecords(output)) {
    if (fields.length < 8) continue;
    const [hash, parents, author, email, time, selector, action, message] = fields;
    const position = toCommit([hash, parents, author, email, time, message]);
    const stamp = selector.match(/@\{(\d+)\}$/);
    entries.push({
      position,
      action,
      timestamp: stamp ? parseInt(stamp[1], 10) : position.timestamp,
    });
  }
  return entries;
}
