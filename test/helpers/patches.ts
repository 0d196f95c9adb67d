import type { FileDiff } from '../../src/model/diff.js';
import { parsePatch } from '../../src/diff/patch-parser.js';

/** +5/-3 spread over two hunks, in the zero-context form git prints with -U0. */
export const A_PY_PATCH = [
  'diff --git a/a.py b/a.py',
  '--- a/a.py',
  '+++ b/a.py',
  '@@ -2,3 +1,0 @@ def load():',
  '-    legacy = True',
  '-    retries = 1',
  '-    timeout = None',
  '@@ -10,0 +8,5 @@ def save():',
  '+    retries = 3',
  '+    timeout = 30',
  '+    backoff = 2',
  '+    jitter = 0.1',
  '+    verbose = False',
  '',
].join('\n');

export function fileDiff(path: string, patch: string): FileDiff {
  const parsed = parsePatch(patch, path);
  return {
    path,
    changeKind: 'modified',
    isBinary: false,
    hunks: parsed.hunks,
    added: parsed.added,
    removed: parsed.removed,
    truncated: false,
  };
}
