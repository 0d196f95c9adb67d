import type { ChangedFile, ChangeKind } from '../model/diff.js';

export interface NumstatEntry {
  path: string;
  /** -1 = binary */
  added: number;
  removed: number;
}

/**
 * Normalize rename paths to their destination.
 * Handles: "a.txt => b.txt", "src/{old => new}/file.ts", "{ => new}/file.ts"
 */
export function expandRename(filePath: string): string {
  const curly = filePath.replace(/\{(.*?) => (.*?)\}/g, (_match, _old: string, newPart: string) => newPart);
  if (curly !== filePath) {
    // Empty sides leave a doubled or leading slash behind
    return curly.replace(/\/\//g, '/').replace(/^\//, '');
  }
  if (filePath.includes(' => ')) {
    return filePath.split(' => ')[1];
  }
  return filePath;
}

export function parseDiffNameStatus(output: string): Array<{ path: string; oldPath?: string; changeKind: ChangeKind }> {
  const files: Array<{ path: string; oldPath?: string; changeKind: ChangeKind }> = [];
  for (const line of output.split('\n').filter(Boolean)) {
    const parts = line.split('\t');
    const statusCode = parts[0].trim();

    if (statusCode === 'A') {
      files.push({ path: parts[1], changeKind: 'added' });
    } else if (statusCode === 'D') {
      files.push({ path: parts[1], changeKind: 'deleted' });
    } else if (statusCode === 'M' || statusCode === 'T') {
      files.push({ path: parts[1], changeKind: 'modified' });
    } else if (statusCode.startsWith('R')) {
      files.push({ path: parts[2], oldPath: parts[1], changeKind: 'renamed' });
    } else if (statusCode.startsWith('C')) {
      files.push({ path: parts[2], changeKind: 'added' });
    }
  }
  return files;
}

/**
 * Parse `git diff --numstat` output: "added\tremoved\tpath", "-" for binary.
 */
export function parseNumstat(output: string): NumstatEntry[] {
  const entries: NumstatEntry[] = [];
  for (const line of output.split('\n')) {
    if (!line) continue;
    const parts = line.split('\t');
    if (parts.length < 3) continue;

    const rawPath = parts.slice(2).join('\t');
    const isBinary = parts[0] === '-';
    entries.push({
      path: rawPath.includes('=>') ? expandRename(rawPath) : rawPath,
      added: isBinary ? -1 : parseInt(parts[0], 10),
      removed: isBinary ? -1 : parseInt(parts[1], 10),
    });
  }
  return entries;
}

/** Join name-status and numstat listings of the same diff. */
export function mergeChangeListings(
  nameStatus: ReturnType<typeof parseDiffNameStatus>,
  numstat: NumstatEntry[],
): ChangedFile[] {
  const counts = new Map(numstat.map(entry => [entry.path, entry]));
  return nameStatus.map(file => {
    const stat = counts.get(file.path);
    return {
      ...file,
      added: stat?.added ?? 0,
      removed: stat?.removed ?? 0,
    };
  });
}
