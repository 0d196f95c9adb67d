import type { CommitRef } from '../model/commit.js';

/**
 * In-memory commit DAG keyed by hash. All walks are iterative with a
 * visited set; parents missing from the graph (shallow history) end a walk.
 */
export class CommitGraph {
  private commits = new Map<string, CommitRef>();

  constructor(commits: Iterable<CommitRef> = []) {
    for (const commit of commits) {
      this.add(commit);
    }
  }

  add(commit: CommitRef): void {
    this.commits.set(commit.hash, commit);
  }

  has(hash: string): boolean {
    return this.commits.has(hash);
  }

  get(hash: string): CommitRef | undefined {
    return this.commits.get(hash);
  }

  /** Every commit reachable from `start`, including `start`, in BFS order. */
  ancestors(start: string): CommitRef[] {
    const result: CommitRef[] = [];
    const visited = new Set<string>();
    const queue: string[] = [start];

    for (let head = 0; head < queue.length; head++) {
      const hash = queue[head];
      if (visited.has(hash)) continue;
      visited.add(hash);

      const commit = this.commits.get(hash);
      if (!commit) continue;
      result.push(commit);

      for (const parent of commit.parents) {
        if (!visited.has(parent)) queue.push(parent);
      }
    }

    return result;
  }

  reachable(start: string): Set<string> {
    return new Set(this.ancestors(start).map(c => c.hash));
  }

  /** True when `ancestor` is reachable from `descendant` (a commit is its own ancestor). */
  isAncestor(ancestor: string, descendant: string): boolean {
    if (ancestor === descendant) return this.has(ancestor);
    return this.reachable(descendant).has(ancestor);
  }

  /**
   * Follow first parents from `start` until a commit in `stop` (or the
   * end of history) is reached. The stopping commit is excluded.
   */
  firstParentChain(start: string, stop: ReadonlySet<string> = new Set()): CommitRef[] {
    const chain: CommitRef[] = [];
    const visited = new Set<string>();
    let current: string | undefined = start;

    while (current !== undefined && !stop.has(current) && !visited.has(current)) {
      visited.add(current);
      const commit = this.commits.get(current);
      if (!commit) break;
      chain.push(commit);
      current = commit.parents[0];
    }

    return chain;
  }

  /**
   * Best common ancestor of `a` and `b`: a common ancestor that is not an
   * ancestor of any other common ancestor. With several (criss-cross
   * merges) the newest wins, ties by hash.
   */
  mergeBase(a: string, b: string): CommitRef | undefined {
    const fromA = this.reachable(a);
    const common = this.ancestors(b).filter(c => fromA.has(c.hash));
    if (common.length === 0) return undefined;

    const ordered = sortNewestFirst(common);
    const dominated = new Set<string>();

    for (const candidate of ordered) {
      if (dominated.has(candidate.hash)) continue;
      for (const ancestor of this.ancestors(candidate.hash)) {
        if (ancestor.hash !== candidate.hash) dominated.add(ancestor.hash);
      }
    }

    return ordered.find(c => !dominated.has(c.hash));
  }
}

export function compareChronologically(a: CommitRef, b: CommitRef): number {
  if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
  return a.hash < b.hash ? -1 : a.hash > b.hash ? 1 : 0;
}

/** Oldest first, ties by hash; duplicates by hash are dropped. */
export function sortChronologically(commits: Iterable<CommitRef>): CommitRef[] {
  const unique = new Map<string, CommitRef>();
  for (const commit of commits) {
    if (!unique.has(commit.hash)) unique.set(commit.hash, commit);
  }
  return [...unique.values()].sort(compareChronologically);
}

function sortNewestFirst(commits: CommitRef[]): CommitRef[] {
  return [...commits].sort((a, b) => compareChronologically(b, a));
}

/**
 * Parents before children; among commits whose parents are all emitted,
 * the oldest goes first (ties by hash). Parents outside the set are ignored.
 */
export function topologicalOrder(commits: Iterable<CommitRef>): CommitRef[] {
  const byHash = new Map<string, CommitRef>();
  for (const commit of commits) byHash.set(commit.hash, commit);

  const pending = new Map<string, number>();
  const children = new Map<string, string[]>();

  for (const commit of byHash.values()) {
    const parentsInSet = [...new Set(commit.parents)].filter(p => byHash.has(p));
    pending.set(commit.hash, parentsInSet.length);
    for (const parent of parentsInSet) {
      const list = children.get(parent) ?? [];
      list.push(commit.hash);
      children.set(parent, list);
    }
  }

  const ready: CommitRef[] = [];
  for (const commit of byHash.values()) {
    if (pending.get(commit.hash) === 0) insertSorted(ready, commit);
  }

  const ordered: CommitRef[] = [];
  while (ready.length > 0) {
    const next = ready.shift();
    if (!next) break;
    ordered.push(next);

    for (const childHash of children.get(next.hash) ?? []) {
      const remaining = (pending.get(childHash) ?? 0) - 1;
      pending.set(childHash, remaining);
      const child = byHash.get(childHash);
      if (remaining === 0 && child) insertSorted(ready, child);
    }
  }

  return ordered;
}

function insertSorted(list: CommitRef[], commit: CommitRef): void {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compareChronologically(list[mid], commit) <= 0) lo = mid + 1;
    else hi = mid;
  }
  list.splice(lo, 0, commit);
}
