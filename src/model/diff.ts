export type ChangeKind = 'added' | 'modified' | 'deleted' | 'renamed';

export type DiffLineKind = 'context' | 'removed' | 'added';

export interface DiffLine {
  kind: DiffLineKind;
  oldLineNo?: number;
  newLineNo?: number;
  text: string;
  /** Set on the synthetic marker that replaces truncated lines */
  omitted?: number;
}

export interface Hunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  /** Section heading git prints after the second @@ */
  header: string;
  lines: DiffLine[];
}

export interface FileDiff {
  path: string;
  oldPath?: string;
  changeKind: ChangeKind;
  isBinary: boolean;
  hunks: Hunk[];
  added: number;
  removed: number;
  truncated: boolean;
}

/** A FileDiff as handed to the document assembler: everything but the hunks */
export type FileDiffMeta = Omit<FileDiff, 'hunks'>;

export interface ChangedFile {
  path: string;
  oldPath?: string;
  changeKind: ChangeKind;
  /** Both -1 for binary files */
  added: number;
  removed: number;
}

export type SkipReason = 'excluded' | 'not-text' | 'binary' | 'read-error' | 'parse-error' | 'encoding' | 'render-error';

export interface ChangeSummary {
  totalAdded: number;
  totalRemoved: number;
  filesChanged: number;
  truncated: boolean;
  summarizedFiles: Set<string>;
  binaryFiles: string[];
  skippedFiles: Array<{ path: string; reason: SkipReason }>;
}

export function changedLineCount(file: { added: number; removed: number }): number {
  return Math.max(0, file.added) + Math.max(0, file.removed);
}

export function toFileMeta(file: FileDiff): FileDiffMeta {
  const { hunks: _hunks, ...meta } = file;
  return meta;
}
