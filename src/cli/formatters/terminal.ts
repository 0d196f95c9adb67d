import chalk from 'chalk';
import { type ResolvedRange, firstLine } from '../../model/commit.js';
import type { RunIssue } from '../../pipeline/context.js';
import type { PipelineRun } from '../../pipeline/run.js';
import type { WrittenDocument } from '../assembler/markdown.js';

const STRATEGY_LABELS: Record<ResolvedRange['strategy'], string> = {
  explicit: 'explicit list',
  'all-commits': 'full history',
  'two-ref-exclusion': 'two-ref exclusion',
  'reflog-recovery': 'reflog recovery',
};

export function formatRange(range: ResolvedRange): string {
  const lines: string[] = [];
  const scope = range.scope.type === 'branch'
    ? `${range.scope.target} vs ${range.scope.base} (${range.scope.mode})`
    : `${range.scope.hashes.length} listed hash(es)`;

  lines.push(chalk.bold(`Range: ${scope}`));
  lines.push(chalk.dim(`Strategy: ${STRATEGY_LABELS[range.strategy]}`));
  if (range.mergeBase) lines.push(chalk.dim(`Merge base: ${range.mergeBase.shortHash}`));
  if (range.recoveredTip) lines.push(chalk.dim(`Recovered tip: ${range.recoveredTip.shortHash}`));
  lines.push('');

  if (range.commits.length === 0) {
    lines.push(chalk.dim('No commits in range.'));
    return lines.join('\n');
  }

  for (const commit of range.commits) {
    lines.push(`${chalk.yellow(commit.shortHash)} ${firstLine(commit.message)} ${chalk.dim(`(${commit.author})`)}`);
  }
  lines.push('');
  lines.push(`${range.commits.length} commit${range.commits.length !== 1 ? 's' : ''}`);
  return lines.join('\n');
}

export function formatIssues(issues: RunIssue[]): string {
  if (issues.length === 0) return '';

  const lines = [chalk.bold(`Issues (${issues.length}):`)];
  for (const issue of issues) {
    const color = issue.severity === 'error' ? chalk.red : chalk.yellow;
    const where = [issue.commit?.slice(0, 8), issue.path].filter(Boolean).join(' ');
    lines.push(`  ${color(issue.code.padEnd(18))} ${where ? chalk.dim(`${where} `) : ''}${issue.message}`);
  }
  return lines.join('\n');
}

export function formatRunSummary(run: PipelineRun, written?: WrittenDocument): string {
  const lines: string[] = [];
  const pages = run.commits.reduce((sum, result) => sum + result.pages.length, 0);
  const failed = run.range.commits.length - run.commits.length;

  const parts = [chalk.green(`${run.commits.length} commit(s) documented`), `${pages} page(s)`];
  if (failed > 0) parts.push(chalk.red(`${failed} skipped`));
  if (run.cancelled) parts.push(chalk.yellow('cancelled'));
  lines.push(parts.join(', '));

  if (written) lines.push(chalk.dim(`Document: ${written.markdownPath} (${written.imageCount} image(s))`));

  const issues = formatIssues(run.issues);
  if (issues) {
    lines.push('');
    lines.push(issues);
  }
  return lines.join('\n');
}
