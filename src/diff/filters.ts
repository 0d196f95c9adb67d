import { minimatch } from 'minimatch';
import { getBaseName, getExtension, toRepoPath } from '../utils/path.js';

/** Always excluded, on top of whatever the user configures. */
export const DEFAULT_EXCLUDE_PATTERNS = [
  '*.lock',
  'package-lock.json',
  'yarn.lock',
  'Gemfile.lock',
  '**/node_modules/**',
  '**/__pycache__/**',
  '*.pyc',
  '.git/**',
  '.DS_Store',
  'Thumbs.db',
  '*.min.js',
  '*.min.css',
];

export const TEXT_EXTENSIONS = [
  '.py', '.js', '.ts', '.jsx', '.tsx', '.mjs', '.cjs', '.java', '.c', '.cpp', '.h', '.hpp',
  '.cs', '.go', '.rs', '.rb', '.php', '.swift', '.kt', '.scala', '.r',
  '.md', '.txt', '.json', '.xml', '.yaml', '.yml', '.toml', '.ini', '.cfg',
  '.html', '.css', '.scss', '.sass', '.less', '.vue', '.svelte',
  '.sh', '.bash', '.zsh', '.fish', '.ps1', '.bat', '.cmd',
  '.sql', '.graphql', '.proto', '.dockerfile', '.makefile',
];

const TEXT_FILENAMES = new Set(['makefile', 'dockerfile', 'jenkinsfile', 'rakefile', 'gemfile', 'procfile']);

/**
 * Glob match against the full path; patterns without a slash also match
 * the base name anywhere in the tree.
 */
export function matchesPattern(filePath: string, pattern: string): boolean {
  const normalizedPath = toRepoPath(filePath);
  const normalizedPattern = toRepoPath(pattern.trim());
  if (!normalizedPattern) return false;

  const hasPathSeparator = normalizedPattern.includes('/');
  return minimatch(normalizedPath, normalizedPattern, { dot: true, matchBase: !hasPathSeparator })
    || minimatch(getBaseName(normalizedPath), normalizedPattern, { dot: true });
}

export function isExcluded(filePath: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => matchesPattern(filePath, pattern));
}

export function isTextFile(filePath: string, extensions: readonly string[] = TEXT_EXTENSIONS): boolean {
  if (TEXT_FILENAMES.has(getBaseName(filePath).toLowerCase())) return true;
  const ext = getExtension(filePath);
  return ext !== '' && extensions.includes(ext);
}
