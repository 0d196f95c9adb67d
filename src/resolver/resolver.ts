import type { CommitRef, RangeScope, ReflogEntry, ResolvedRange } from '../model/commit.js';
import { NoUniqueCommitsError, NotFoundError, RefNotFoundError } from '../model/errors.js';
import type { RepositoryDataSource } from '../git/types.js';
import type { RunContext } from '../pipeline/context.js';
import { CommitGraph, sortChronologically, topologicalOrder } from './graph.js';

/** Reflog subjects that move a branch onto history it did not author. */
const MERGE_ACTION = /^(merge|pull|reset)\b|fast-forward/i;
const CREATED_ACTION = /^branch: Created from /;

export class CommitRangeResolver {
  constructor(private source: RepositoryDataSource) {}

  async resolve(scope: RangeScope, ctx: RunContext): Promise<ResolvedRange> {
    if (scope.type === 'explicit') {
      return { scope, strategy: 'explicit', commits: await this.resolveExplicit(scope.hashes, ctx) };
    }

    const target = await this.source.getRef(scope.target);

    if (scope.mode === 'all-commits') {
      const ancestors = await this.source.listAncestors(target.hash);
      return { scope, strategy: 'all-commits', commits: topologicalOrder(ancestors) };
    }

    const base = await this.source.getRef(scope.base);
    const mergeBase = await this.source.mergeBase(target.hash, base.hash);
    const alreadyMerged = target.hash === base.hash || mergeBase?.hash === target.hash;

    if (!alreadyMerged) {
      const [targetAncestors, baseAncestors] = await Promise.all([
        this.source.listAncestors(target.hash),
        this.source.listAncestors(base.hash),
      ]);
      const inBase = new Set(baseAncestors.map(c => c.hash));
      return {
        scope,
        strategy: 'two-ref-exclusion',
        commits: sortChronologically(targetAncestors.filter(c => !inBase.has(c.hash))),
        mergeBase: mergeBase ?? undefined,
      };
    }

    return this.recoverFromReflog(scope, target, base, ctx);
  }

  private async resolveExplicit(hashes: string[], ctx: RunContext): Promise<CommitRef[]> {
    const found: CommitRef[] = [];
    const seen = new Set<string>();

    for (const raw of hashes) {
      const hash = raw.trim();
      if (!hash || seen.has(hash)) continue;
      seen.add(hash);

      try {
        found.push(await this.source.getRef(hash));
      } catch (error) {
        if (!(error instanceof RefNotFoundError)) throw error;
        ctx.warn(new NotFoundError(hash), { commit: hash });
      }
    }

    return sortChronologically(found);
  }

  /**
   * The target has no commits of its own relative to base any more, so
   * look for where it pointed before it was merged or fast-forwarded.
   */
  private async recoverFromReflog(
    scope: Extract<RangeScope, { type: 'branch' }>,
    target: CommitRef,
    base: CommitRef,
    ctx: RunContext,
  ): Promise<ResolvedRange> {
    const empty = (reason: string): ResolvedRange => {
      ctx.warn(new NoUniqueCommitsError(scope.target, scope.base, reason));
      return { scope, strategy: 'reflog-recovery', commits: [] };
    };

    const reflog = await this.source.getReflog(scope.target);
    const tip = findPreMergePosition(reflog);
    if (!tip) {
      return empty('branch is merged and has no reflog to recover its previous tip');
    }

    const [tipAncestors, baseAncestors] = await Promise.all([
      this.source.listAncestors(tip.hash),
      this.source.listAncestors(base.hash),
    ]);
    const graph = new CommitGraph([...tipAncestors, ...baseAncestors]);

    const mergeBase = graph.mergeBase(base.hash, tip.hash);
    let chain = graph.firstParentChain(tip.hash, mergeBase ? graph.reachable(mergeBase.hash) : new Set());

    if (chain.length === 0) {
      const created = findCreationPoint(reflog);
      if (created && graph.isAncestor(created.hash, tip.hash) && created.hash !== tip.hash) {
        chain = graph.firstParentChain(tip.hash, graph.reachable(created.hash));
      }
    }

    if (chain.length === 0) {
      return empty(`recovered tip ${tip.shortHash} is already part of ${scope.base}`);
    }

    return {
      scope,
      strategy: 'reflog-recovery',
      commits: sortChronologically(chain),
      mergeBase,
      recoveredTip: tip,
    };
  }
}

/**
 * Position recorded just before the newest merge-like entry; without one,
 * the newest recorded position. `reflog` is newest first.
 */
export function findPreMergePosition(reflog: ReflogEntry[]): CommitRef | undefined {
  const mergeIndex = reflog.findIndex(entry => MERGE_ACTION.test(entry.action));
  if (mergeIndex === -1) return reflog[0]?.position;
  return reflog[mergeIndex + 1]?.position;
}

export function findCreationPoint(reflog: ReflogEntry[]): CommitRef | undefined {
  for (let i = reflog.length - 1; i >= 0; i--) {
    if (CREATED_ACTION.test(reflog[i].action)) return reflog[i].position;
  }
  return undefined;
}
