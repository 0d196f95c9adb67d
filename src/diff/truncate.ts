import type { DiffLine, Hunk } from '../model/diff.js';

/** Context lines kept beside each cut so the surviving changes stay readable. */
const CONTEXT_AT_CUT = 3;

export interface TruncateResult {
  hunks: Hunk[];
  /** Changed lines replaced by the marker */
  omitted: number;
}

export function omissionMarker(omitted: number): DiffLine {
  return { kind: 'context', text: `… ${omitted} lines omitted …`, omitted };
}

/**
 * Keep the first `keepHead` and last `keepTail` changed lines (with up to
 * CONTEXT_AT_CUT context lines past each cut) and replace everything in
 * between with a single omission marker.
 */
export function truncateHunks(hunks: Hunk[], keepHead: number, keepTail: number): TruncateResult {
  const flat: Array<{ hunk: number; line: DiffLine }> = [];
  hunks.forEach((hunk, index) => {
    for (const line of hunk.lines) flat.push({ hunk: index, line });
  });

  const changed: number[] = [];
  flat.forEach((entry, index) => {
    if (entry.line.kind !== 'context') changed.push(index);
  });

  const omitted = changed.length - keepHead - keepTail;
  if (omitted <= 0) return { hunks, omitted: 0 };

  let headEnd = keepHead > 0 ? changed[keepHead - 1] : -1;
  let tailStart = keepTail > 0 ? changed[changed.length - keepTail] : flat.length;

  headEnd = extendOverContext(flat, headEnd, +1);
  tailStart = extendOverContext(flat, tailStart, -1);

  const markerHunk = headEnd >= 0 ? flat[headEnd].hunk : flat[tailStart]?.hunk ?? 0;
  const result: Hunk[] = [];
  let markerPlaced = false;

  hunks.forEach((hunk, index) => {
    const kept: DiffLine[] = [];
    let cursor = flat.findIndex(entry => entry.hunk === index);
    let touched = false;

    for (const line of hunk.lines) {
      if (cursor <= headEnd) {
        kept.push(line);
        if (cursor === headEnd && index === markerHunk) {
          kept.push(omissionMarker(omitted));
          markerPlaced = true;
          touched = true;
        }
      } else if (cursor >= tailStart) {
        if (headEnd < 0 && cursor === tailStart && index === markerHunk) {
          kept.push(omissionMarker(omitted));
          markerPlaced = true;
          touched = true;
        }
        kept.push(line);
      } else {
        touched = true;
      }
      cursor++;
    }

    // Nothing kept on either side: the marker stands in for the whole first hunk.
    if (index === markerHunk && !markerPlaced) {
      kept.push(omissionMarker(omitted));
    }

    if (!touched) {
      result.push(hunk);
    } else if (kept.length > 0) {
      result.push(rebuildHunk(hunk, kept));
    }
  });

  return { hunks: result, omitted };
}

function extendOverContext(flat: Array<{ hunk: number; line: DiffLine }>, from: number, step: 1 | -1): number {
  if (from < 0 || from >= flat.length) return from;
  let position = from;
  for (let n = 0; n < CONTEXT_AT_CUT; n++) {
    const next = flat[position + step];
    if (!next || next.hunk !== flat[from].hunk || next.line.kind !== 'context') break;
    position += step;
  }
  return position;
}

function rebuildHunk(original: Hunk, lines: DiffLine[]): Hunk {
  const oldNumbers = lines.flatMap(l => (l.oldLineNo !== undefined ? [l.oldLineNo] : []));
  const newNumbers = lines.flatMap(l => (l.newLineNo !== undefined ? [l.newLineNo] : []));
  return {
    oldStart: oldNumbers[0] ?? original.oldStart,
    oldCount: oldNumbers.length,
    newStart: newNumbers[0] ?? original.newStart,
    newCount: newNumbers.length,
    header: original.header,
    lines,
  };
}
