import { posix } from 'node:path';

/** Repository paths always use forward slashes, whatever the host. */
export function toRepoPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

export function getBaseName(filePath: string): string {
  return posix.basename(toRepoPath(filePath));
}

export function getExtension(filePath: string): string {
  return posix.extname(toRepoPath(filePath)).toLowerCase();
}
