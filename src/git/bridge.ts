import { simpleGit, type SimpleGit } from 'simple-git';
import type { CommitRef, ReflogEntry } from '../model/commit.js';
import type { ChangedFile } from '../model/diff.js';
import { RefNotFoundError, RepositoryError } from '../model/errors.js';
import type { RepositoryDataSource } from './types.js';
import { COMMIT_FORMAT, REFLOG_FORMAT, parseCommitRecords, parseReflog } from './log-reader.js';
import { mergeChangeListings, parseDiffNameStatus, parseNumstat } from './diff-reader.js';

/** Object id of the empty tree; root commits are diffed against it. */
const EMPTY_TREE = '4b825dc642cb6eb9a060e54bf8d69288fbee4904';

export class GitBridge implements RepositoryDataSource {
  private git: SimpleGit;
  private changeCache = new Map<string, Promise<ChangedFile[]>>();

  constructor(repoPath: string) {
    this.git = simpleGit({ baseDir: repoPath, config: ['core.quotePath=false'] });
  }

  async isRepo(): Promise<boolean> {
    try {
      await this.git.revparse(['--is-inside-work-tree']);
      return true;
    } catch {
      return false;
    }
  }

  async getRepoRoot(): Promise<string> {
    const root = await this.git.revparse(['--show-toplevel']);
    return root.trim();
  }

  async getCurrentBranch(): Promise<string> {
    const branch = await this.git.revparse(['--abbrev-ref', 'HEAD']);
    return branch.trim();
  }

  async getRef(name: string): Promise<CommitRef> {
    // rev-parse would read a leading dash as an option
    if (name.startsWith('-')) throw new RefNotFoundError(name);

    let hash: string;
    try {
      hash = (await this.git.raw(['rev-parse', '--verify', '--quiet', `${name}^{commit}`])).trim();
    } catch (error) {
      throw new RefNotFoundError(name, { cause: error });
    }
    if (!hash) throw new RefNotFoundError(name);

    const [commit] = parseCommitRecords(await this.git.raw(['show', '-s', `--format=${COMMIT_FORMAT}`, hash]));
    if (!commit) throw new RepositoryError(`git show returned no commit for ${hash}`);
    return commit;
  }

  async listAncestors(ref: string): Promise<CommitRef[]> {
    const output = await this.git.raw(['log', `--format=${COMMIT_FORMAT}`, '--end-of-options', ref]);
    return parseCommitRecords(output);
  }

  async mergeBase(a: string, b: string): Promise<CommitRef | null> {
    let hash: string;
    try {
      hash = (await this.git.raw(['merge-base', a, b])).trim();
    } catch {
      // merge-base exits 1 when the histories share no commit
      return null;
    }
    return hash ? this.getRef(hash) : null;
  }

  async getReflog(ref: string): Promise<ReflogEntry[]> {
    await this.getRef(ref);
    const fullName = (await this.git.raw(['rev-parse', '--verify', '--quiet', '--symbolic-full-name', ref])).trim() || ref;
    if (!(await this.hasReflog(fullName))) return [];

    const output = await this.git.raw(['log', '-g', '--date=unix', `--format=${REFLOG_FORMAT}`, fullName]);
    return parseReflog(output);
  }

  async listChangedFiles(commit: CommitRef): Promise<ChangedFile[]> {
    let pending = this.changeCache.get(commit.hash);
    if (!pending) {
      pending = this.readChangedFiles(commit);
      this.changeCache.set(commit.hash, pending);
    }
    return pending;
  }

  async getFileDiff(commit: CommitRef, path: string, oldPath?: string): Promise<string> {
    const paths = oldPath && oldPath !== path ? [oldPath, path] : [path];
    return this.git.raw(['diff', '-M', '--no-color', '--no-ext-diff', parentOf(commit), commit.hash, '--', ...paths]);
  }

  async isBinary(commit: CommitRef, path: string): Promise<boolean> {
    const files = await this.listChangedFiles(commit);
    const file = files.find(f => f.path === path);
    return file !== undefined && file.added === -1;
  }

  private async readChangedFiles(commit: CommitRef): Promise<ChangedFile[]> {
    const range = [parentOf(commit), commit.hash];
    const [nameStatus, numstat] = await Promise.all([
      this.git.raw(['diff', '-M', '--name-status', ...range]),
      this.git.raw(['diff', '-M', '--numstat', ...range]),
    ]);
    return mergeChangeListings(parseDiffNameStatus(nameStatus), parseNumstat(numstat));
  }

  /**
   * `<ref>@{0}` only resolves while the ref has a reflog entry. git exits 1
   * with nothing on stderr otherwise, which simple-git hands back as empty
   * output rather than an error.
   */
  private async hasReflog(fullName: string): Promise<boolean> {
    const newest = await this.git.raw(['rev-parse', '--verify', '--quiet', `${fullName}@{0}`]);
    return newest.trim() !== '';
  }
}

function parentOf(commit: CommitRef): string {
  return commit.parents[0] ?? EMPTY_TREE;
}
