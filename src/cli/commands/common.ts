import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { GitBridge } from '../../git/bridge.js';
import type { RangeScope } from '../../model/commit.js';
import { ConfigurationError, RepositoryError } from '../../model/errors.js';
import { type ConfigOverrides, type DiffDocConfig, loadConfig } from '../../config/config.js';
import { Logger } from '../../utils/logger.js';

export interface RangeOptions {
  cwd?: string;
  /** Branch to document; the checked-out branch when absent */
  branch?: string;
  base?: string;
  allCommits?: boolean;
  /** File with one commit hash per line */
  commits?: string;
  verbose?: boolean;
}

export interface Session {
  git: GitBridge;
  repoRoot: string;
  config: DiffDocConfig;
  logger: Logger;
}

export async function openSession(opts: RangeOptions, overrides: ConfigOverrides = {}): Promise<Session> {
  const logger = new Logger('diffdoc', opts.verbose ? 'debug' : 'info');
  const cwd = opts.cwd ?? process.cwd();
  const git = new GitBridge(cwd);

  if (!(await git.isRepo())) {
    throw new RepositoryError(`Not inside a Git repository: ${cwd}`);
  }

  const repoRoot = await git.getRepoRoot();
  const { config, source } = await loadConfig(repoRoot, {
    ...overrides,
    base: opts.base,
    mode: opts.allCommits ? 'all-commits' : undefined,
  });
  if (source) logger.debug(`Loaded configuration from ${source}`);

  return { git, repoRoot, config, logger };
}

/** Blank lines and `#` comments are ignored. */
export function parseCommitList(text: string): string[] {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

export async function buildScope(opts: RangeOptions, session: Session): Promise<RangeScope> {
  if (opts.commits) {
    const path = resolve(opts.cwd ?? process.cwd(), opts.commits);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read commit list ${path}`, { cause: error });
    }
    const hashes = parseCommitList(text);
    if (hashes.length === 0) throw new ConfigurationError(`Commit list ${path} is empty`);
    return { type: 'explicit', hashes };
  }

  const target = opts.branch ?? (await session.git.getCurrentBranch());
  if (target === 'HEAD') {
    throw new ConfigurationError('HEAD is detached; pass --branch or --commits');
  }
  return { type: 'branch', target, base: session.config.base, mode: session.config.mode };
}
