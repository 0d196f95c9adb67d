import { describe, it, expect } from 'vitest';
import { parseCommitRecords, parseReflog } from '../src/git/log-reader.js';
import { expandRename, mergeChangeListings, parseDiffNameStatus, parseNumstat } from '../src/git/diff-reader.js';

const H1 = '1'.repeat(40);
const H2 = '2'.repeat(40);
const H3 = '3'.repeat(40);

function record(...fields: string[]): string {
  return `${fields.join('\0')}\x1e`;
}

describe('parseCommitRecords', () => {
  it('reads parents, author and the full message', () => {
    const output = [
      record(H2, `${H1} ${H3}`, 'Ada', 'ada@example.com', '1700000100', 'Merge feature\n\nLong body\n'),
      record(H1, '', 'Bob', 'bob@example.com', '1700000000', 'init\n'),
    ].join('\n');

    const commits = parseCommitRecords(output);
    expect(commits).toEqual([
      {
        hash: H2,
        shortHash: '22222222',
        parents: [H1, H3],
        author: 'Ada',
        email: 'ada@example.com',
        timestamp: 1700000100,
        message: 'Merge feature\n\nLong body',
      },
      {
        hash: H1,
        shortHash: '11111111',
        parents: [],
        author: 'Bob',
        email: 'bob@example.com',
        timestamp: 1700000000,
        message: 'init',
      },
    ]);
  });

  it('ignores empty output', () => {
    expect(parseCommitRecords('')).toEqual([]);
    expect(parseCommitRecords('\n')).toEqual([]);
  });
});

describe('parseReflog', () => {
  it('keeps newest-first order and reads the selector time', () => {
    const output = [
      record(H2, H1, 'Ada', 'ada@example.com', '1700000100', 'feature@{1700000500}', 'merge main: Fast-forward', 'two'),
      record(H1, '', 'Ada', 'ada@example.com', '1700000000', 'feature@{1700000050}', 'branch: Created from main', 'one'),
    ].join('\n');

    const entries = parseReflog(output);
    expect(entries.map(e => [e.position.hash, e.action, e.timestamp])).toEqual([
      [H2, 'merge main: Fast-forward', 1700000500],
      [H1, 'branch: Created from main', 1700000050],
    ]);
    expect(entries[0].position.message).toBe('two');
  });

  it('falls back to the commit time without a dated selector', () => {
    const [undated] = parseReflog(record(H1, '', 'Ada', 'ada@example.com', '1700000000', 'feature', 'commit: one', 'one'));
    expect(undated.timestamp).toBe(1700000000);
  });
});

describe('diff listings', () => {
  it('maps status letters to change kinds', () => {
    const output = ['A\tnew.ts', 'D\told.ts', 'M\tsame.ts', 'T\tlink', 'R087\tsrc/a.ts\tlib/a.ts', 'C100\tbase.ts\tcopy.ts', ''].join('\n');
    expect(parseDiffNameStatus(output)).toEqual([
      { path: 'new.ts', changeKind: 'added' },
      { path: 'old.ts', changeKind: 'deleted' },
      { path: 'same.ts', changeKind: 'modified' },
      { path: 'link', changeKind: 'modified' },
      { path: 'lib/a.ts', oldPath: 'src/a.ts', changeKind: 'renamed' },
      { path: 'copy.ts', changeKind: 'added' },
    ]);
  });

  it('reads numstat counts, binary markers and renames', () => {
    const output = ['5\t3\ta.py', '-\t-\tlogo.png', '2\t0\tsrc/{old => new}/x.ts', ''].join('\n');
    expect(parseNumstat(output)).toEqual([
      { path: 'a.py', added: 5, removed: 3 },
      { path: 'logo.png', added: -1, removed: -1 },
      { path: 'src/new/x.ts', added: 2, removed: 0 },
    ]);
  });

  it('expands every rename notation to the destination', () => {
    expect(expandRename('a.txt => b.txt')).toBe('b.txt');
    expect(expandRename('src/{old => new}/file.ts')).toBe('src/new/file.ts');
    expect(expandRename('{ => lib}/file.ts')).toBe('lib/file.ts');
    expect(expandRename('src/{lib => }/file.ts')).toBe('src/file.ts');
  });

  it('joins the two listings by path', () => {
    const files = mergeChangeListings(
      parseDiffNameStatus('M\ta.py\nA\tlogo.png\n'),
      parseNumstat('5\t3\ta.py\n-\t-\tlogo.png\n'),
    );
    expect(files).toEqual([
      { path: 'a.py', changeKind: 'modified', added: 5, removed: 3 },
      { path: 'logo.png', changeKind: 'added', added: -1, removed: -1 },
    ]);
  });
});
