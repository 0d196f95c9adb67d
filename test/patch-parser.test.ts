import { describe, it, expect } from 'vitest';
import { flattenSide, parsePatch } from '../src/diff/patch-parser.js';
import { DiffParseError } from '../src/model/errors.js';
import { makePatch } from './helpers/memory-repo.js';

describe('parsePatch', () => {
  it('numbers context, removed and added lines', () => {
    const patch = makePatch('a.py', 1, 1, [' import os', '-x = 1', '+x = 2', ' print(x)']);
    const { hunks, added, removed, isBinary } = parsePatch(patch, 'a.py');

    expect(isBinary).toBe(false);
    expect(added).toBe(1);
    expect(removed).toBe(1);
    expect(hunks).toHaveLength(1);
    expect(hunks[0]).toMatchObject({ oldStart: 1, oldCount: 3, newStart: 1, newCount: 3 });
    expect(hunks[0].lines).toEqual([
      { kind: 'context', oldLineNo: 1, newLineNo: 1, text: 'import os' },
      { kind: 'removed', oldLineNo: 2, text: 'x = 1' },
      { kind: 'added', newLineNo: 2, text: 'x = 2' },
      { kind: 'context', oldLineNo: 3, newLineNo: 3, text: 'print(x)' },
    ]);
  });

  it('keeps the section heading and reads several hunks', () => {
    const patch = [
      '--- a/app.ts',
      '+++ b/app.ts',
      '@@ -10,2 +10,2 @@ function main() {',
      ' const a = 1;',
      '-const b = 2;',
      '+const b = 3;',
      '@@ -40 +40,2 @@',
      ' return a;',
      '+// done',
      '',
    ].join('\n');

    const { hunks } = parsePatch(patch, 'app.ts');
    expect(hunks.map(h => h.header)).toEqual(['function main() {', '']);
    expect(hunks[1]).toMatchObject({ oldStart: 40, oldCount: 1, newStart: 40, newCount: 2 });
    expect(hunks[1].lines[1]).toEqual({ kind: 'added', newLineNo: 41, text: '// done' });
  });

  it('ignores "no newline" notes', () => {
    const patch = ['@@ -1 +1 @@', '-old', '\\ No newline at end of file', '+new', '\\ No newline at end of file', ''].join('\n');
    const { hunks } = parsePatch(patch, 'x.txt');
    expect(hunks[0].lines.map(l => l.text)).toEqual(['old', 'new']);
  });

  it('reads an empty context line whose leading space was stripped', () => {
    const patch = ['@@ -1,3 +1,3 @@', ' a', '', '-b', '+c', ''].join('\n');
    const { hunks } = parsePatch(patch, 'x.txt');
    expect(hunks[0].lines[1]).toEqual({ kind: 'context', oldLineNo: 2, newLineNo: 2, text: '' });
  });

  it('flags binary patches and returns no hunks', () => {
    const patch = 'diff --git a/logo.png b/logo.png\nBinary files a/logo.png and b/logo.png differ\n';
    expect(parsePatch(patch, 'logo.png')).toEqual({ hunks: [], isBinary: true, added: 0, removed: 0 });
  });

  it('returns nothing for an empty patch', () => {
    expect(parsePatch('', 'empty.txt').hunks).toEqual([]);
  });

  it('rejects a hunk cut short', () => {
    const patch = ['@@ -1,3 +1,3 @@', ' a', '-b'].join('\n');
    expect(() => parsePatch(patch, 'x.txt')).toThrow(DiffParseError);
  });

  it('rejects an unknown line marker with its position', () => {
    const patch = ['@@ -1,2 +1,2 @@', ' a', '?b', ''].join('\n');
    expect(() => parsePatch(patch, 'x.txt')).toThrow('Could not parse diff for x.txt (patch line 3): unexpected line "?b"');
  });

  it('rejects text where a hunk header belongs', () => {
    const patch = ['@@ -1 +1 @@', '-a', '+b', 'trailing garbage', ''].join('\n');
    expect(() => parsePatch(patch, 'x.txt')).toThrow(/expected a hunk header/);
  });
});

describe('flattenSide', () => {
  it('reproduces both versions from a full-context patch', () => {
    const before = ['one', 'two', 'three'];
    const after = ['one', '2', 'three', 'four'];
    const patch = makePatch('n.txt', 1, 1, [' one', '-two', '+2', ' three', '+four']);

    const { hunks } = parsePatch(patch, 'n.txt');
    expect(flattenSide(hunks, 'old')).toEqual(before);
    expect(flattenSide(hunks, 'new')).toEqual(after);
  });
});
