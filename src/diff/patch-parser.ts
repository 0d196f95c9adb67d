import type { DiffLine, Hunk } from '../model/diff.js';
import { DiffParseError } from '../model/errors.js';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@ ?(.*)$/;

export interface ParsedPatch {
  hunks: Hunk[];
  isBinary: boolean;
  added: number;
  removed: number;
}

/**
 * Parse the unified patch of a single file (`git diff <a> <b> -- <path>`)
 * into hunks whose lines carry the old/new numbers the patch implies.
 * Line counts in each hunk header are enforced.
 */
export function parsePatch(patch: string, path: string): ParsedPatch {
  const lines = patch.split('\n');
  const hunks: Hunk[] = [];
  let isBinary = false;
  let added = 0;
  let removed = 0;
  let i = 0;

  // Extended header: diff --git, index, mode and rename lines, ---/+++
  while (i < lines.length && !lines[i].startsWith('@@')) {
    if (lines[i].startsWith('Binary files ') || lines[i] === 'GIT binary patch') {
      isBinary = true;
    }
    i++;
  }

  while (i < lines.length) {
    const line = lines[i];
    if (line === '' && i === lines.length - 1) break;
    if (line.startsWith('diff --git ')) break;

    const match = HUNK_HEADER.exec(line);
    if (!match) {
      throw new DiffParseError(path, `expected a hunk header, found "${preview(line)}"`, i + 1);
    }

    const hunk: Hunk = {
      oldStart: parseInt(match[1], 10),
      oldCount: match[2] === undefined ? 1 : parseInt(match[2], 10),
      newStart: parseInt(match[3], 10),
      newCount: match[4] === undefined ? 1 : parseInt(match[4], 10),
      header: match[5] ?? '',
      lines: [],
    };
    i++;

    let oldLine = hunk.oldStart;
    let newLine = hunk.newStart;
    let oldSeen = 0;
    let newSeen = 0;

    while (oldSeen < hunk.oldCount || newSeen < hunk.newCount) {
      if (i >= lines.length) {
        throw new DiffParseError(path, `hunk ${hunks.length + 1} ends before its declared length`, i);
      }

      const body = lines[i];
      const marker = body[0];
      let entry: DiffLine;

      if (marker === ' ' || body === '') {
        // Some tools strip the lone space of an empty context line
        entry = { kind: 'context', oldLineNo: oldLine++, newLineNo: newLine++, text: body.slice(1) };
        oldSeen++;
        newSeen++;
      } else if (marker === '-') {
        entry = { kind: 'removed', oldLineNo: oldLine++, text: body.slice(1) };
        oldSeen++;
        removed++;
      } else if (marker === '+') {
        entry = { kind: 'added', newLineNo: newLine++, text: body.slice(1) };
        newSeen++;
        added++;
      } else if (marker === '\\') {
        i++;
        continue;
      } else {
        throw new DiffParseError(path, `unexpected line "${preview(body)}"`, i + 1);
      }

      if (oldSeen > hunk.oldCount || newSeen > hunk.newCount) {
        throw new DiffParseError(path, `hunk ${hunks.length + 1} is longer than its header declares`, i + 1);
      }

      hunk.lines.push(entry);
      i++;
    }

    // "\ No newline at end of file" after the last line of a hunk
    while (i < lines.length && lines[i].startsWith('\\')) i++;

    hunks.push(hunk);
  }

  return { hunks, isBinary, added, removed };
}

/**
 * Lines of one side of the file as the hunks describe it. With a patch
 * that carries full context this is the whole old (or new) file.
 */
export function flattenSide(hunks: Hunk[], side: 'old' | 'new'): string[] {
  const skip = side === 'old' ? 'added' : 'removed';
  const result: string[] = [];
  for (const hunk of hunks) {
    for (const line of hunk.lines) {
      if (line.kind === skip || line.omitted !== undefined) continue;
      result.push(line.text);
    }
  }
  return result;
}

function preview(line: string): string {
  return line.length > 40 ? `${line.slice(0, 40)}…` : line;
}
