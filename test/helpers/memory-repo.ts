import { createHash } from 'node:crypto';
import type { CommitRef, ReflogEntry } from '../../src/model/commit.js';
import type { ChangeKind, ChangedFile } from '../../src/model/diff.js';
import { RefNotFoundError } from '../../src/model/errors.js';
import type { RepositoryDataSource } from '../../src/git/types.js';
import { CommitGraph } from '../../src/resolver/graph.js';

export function fakeHash(label: string): string {
  return createHash('sha1').update(label).digest('hex');
}

export interface FileFixture {
  path: string;
  oldPath?: string;
  changeKind?: ChangeKind;
  patch?: string;
  binary?: boolean;
  /** Defaults to the counts found in `patch` */
  added?: number;
  removed?: number;
}

/**
 * RepositoryDataSource over an in-memory commit graph. Commits are named
 * by label; hashes are the sha1 of the label.
 */
export class InMemoryRepository implements RepositoryDataSource {
  readonly graph = new CommitGraph();
  private refs = new Map<string, string>();
  private reflogs = new Map<string, ReflogEntry[]>();
  private files = new Map<string, FileFixture[]>();
  private clock = 1_700_000_000;

  /** Patch reads that are currently in flight, and the most seen at once */
  inFlight = 0;
  maxInFlight = 0;
  patchDelayMs = 0;
  /** Commits (by label) whose file listing fails */
  failing = new Set<string>();
  /** Paths whose patch read fails, in any commit */
  unreadable = new Set<string>();

  commit(label: string, parents: string[] = [], opts: { time?: number; message?: string } = {}): CommitRef {
    this.clock += 60;
    const hash = fakeHash(label);
    const commit: CommitRef = {
      hash,
      shortHash: hash.slice(0, 8),
      parents: parents.map(p => this.hashOf(p)),
      author: 'Test Author',
      email: 'author@example.com',
      timestamp: opts.time ?? this.clock,
      message: opts.message ?? label,
    };
    this.graph.add(commit);
    return commit;
  }

  /** Commits `labels` in order, each the only parent of the next. */
  chain(labels: string[], from?: string): CommitRef[] {
    let parent = from;
    return labels.map(label => {
      const commit = this.commit(label, parent ? [parent] : []);
      parent = label;
      return commit;
    });
  }

  hashOf(label: string): string {
    return fakeHash(label);
  }

  get(label: string): CommitRef {
    const commit = this.graph.get(this.hashOf(label));
    if (!commit) throw new Error(`no commit labelled ${label}`);
    return commit;
  }

  setRef(name: string, label: string): void {
    this.refs.set(name, this.hashOf(label));
  }

  /** `entries` newest first, as git prints them. */
  setReflog(ref: string, entries: Array<{ at: string; action: string }>): void {
    this.reflogs.set(
      ref,
      entries.map(entry => {
        const position = this.get(entry.at);
        return { position, action: entry.action, timestamp: position.timestamp };
      }),
    );
  }

  setFiles(label: string, files: FileFixture[]): void {
    this.files.set(this.hashOf(label), files);
  }

  async getRef(name: string): Promise<CommitRef> {
    const hash = this.refs.get(name) ?? name;
    const commit = this.graph.get(hash);
    if (!commit) throw new RefNotFoundError(name);
    return commit;
  }

  async listAncestors(ref: string): Promise<CommitRef[]> {
    const commit = await this.getRef(ref);
    return this.graph.ancestors(commit.hash);
  }

  async mergeBase(a: string, b: string): Promise<CommitRef | null> {
    const [left, right] = await Promise.all([this.getRef(a), this.getRef(b)]);
    return this.graph.mergeBase(left.hash, right.hash) ?? null;
  }

  async getReflog(ref: string): Promise<ReflogEntry[]> {
    return this.reflogs.get(ref) ?? [];
  }

  async listChangedFiles(commit: CommitRef): Promise<ChangedFile[]> {
    if ([...this.failing].some(label => this.hashOf(label) === commit.hash)) {
      throw new Error(`cannot list files of ${commit.shortHash}`);
    }
    return (this.files.get(commit.hash) ?? []).map(file => ({
      path: file.path,
      oldPath: file.oldPath,
      changeKind: file.changeKind ?? 'modified',
      added: file.binary ? -1 : (file.added ?? countLines(file.patch, '+')),
      removed: file.binary ? -1 : (file.removed ?? countLines(file.patch, '-')),
    }));
  }

  async getFileDiff(commit: CommitRef, path: string): Promise<string> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.patchDelayMs > 0) await new Promise(resolve => setTimeout(resolve, this.patchDelayMs));
      if (this.unreadable.has(path)) throw new Error(`git diff failed for ${path}`);
      const file = this.findFile(commit, path);
      if (file.binary) return `diff --git a/${path} b/${path}\nBinary files a/${path} and b/${path} differ\n`;
      return file.patch ?? '';
    } finally {
      this.inFlight--;
    }
  }

  async isBinary(commit: CommitRef, path: string): Promise<boolean> {
    return this.findFile(commit, path).binary ?? false;
  }

  private findFile(commit: CommitRef, path: string): FileFixture {
    const file = (this.files.get(commit.hash) ?? []).find(f => f.path === path);
    if (!file) throw new Error(`no file ${path} in ${commit.shortHash}`);
    return file;
  }
}

function countLines(patch: string | undefined, sign: '+' | '-'): number {
  if (!patch) return 0;
  return patch.split('\n').filter(line => line.startsWith(sign) && !line.startsWith(sign.repeat(3))).length;
}

/**
 * Patch for one hunk. `body` holds the hunk lines with their +/-/space
 * prefixes; the header counts are derived from it.
 */
export function makePatch(path: string, oldStart: number, newStart: number, body: string[]): string {
  const oldCount = body.filter(line => !line.startsWith('+')).length;
  const newCount = body.filter(line => !line.startsWith('-')).length;
  return [
    `diff --git a/${path} b/${path}`,
    `--- a/${path}`,
    `+++ b/${path}`,
    `@@ -${oldStart},${oldCount} +${newStart},${newCount} @@`,
    ...body,
    '',
  ].join('\n');
}

/** `n` lines of the form `<prefix><label> <i>`, i from 1. */
export function numbered(prefix: '+' | '-' | ' ', label: string, n: number): string[] {
  return Array.from({ length: n }, (_, i) => `${prefix}${label} ${i + 1}`);
}
