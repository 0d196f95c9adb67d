import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ChangeKind, FileDiffMeta } from '../../model/diff.js';
import { type CommitRef, firstLine } from '../../model/commit.js';
import type { RenderedPage } from '../../model/page.js';
import type { CommitResult } from '../../pipeline/process-commit.js';
import type { PipelineRun } from '../../pipeline/run.js';
import { getExtension } from '../../utils/path.js';

export interface DocumentInfo {
  repoName: string;
  branch?: string;
  generatedAt: Date;
}

export interface DocumentEntry {
  result: CommitResult;
  /** Image paths relative to the markdown file, in sequence order */
  imagePaths: string[];
}

export interface WrittenDocument {
  markdownPath: string;
  imageCount: number;
}

const TOC_THRESHOLD = 10;
const TOC_LIMIT = 20;
const TOC_SUBJECT_LENGTH = 60;

const CHANGE_ICONS: Record<ChangeKind, string> = {
  added: '🟢',
  deleted: '🔴',
  modified: '🔵',
  renamed: '🟣',
};

/** `<NNN>-<shortHash>-<seq>.<ext>`, NNN being the commit's 1-based place in the range. */
export function imageFileName(position: number, commit: CommitRef, page: RenderedPage): string {
  return `${String(position).padStart(3, '0')}-${commit.shortHash}-${page.sequenceNumber}.${page.format}`;
}

export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function buildMarkdown(info: DocumentInfo, entries: DocumentEntry[]): string {
  const parts = [renderHeader(info)];
  if (entries.length > TOC_THRESHOLD) parts.push(renderToc(entries));
  for (const entry of entries) parts.push(renderCommit(entry));
  parts.push(`\n---\n\n*Generated by diffdoc on ${formatTimestamp(info.generatedAt)}*\n`);
  return parts.join('');
}

/**
 * Write every page under `<outputDir>/images/` and the document beside
 * it. Only completed commits appear; numbering follows the range.
 */
export async function writeDocument(outputDir: string, info: DocumentInfo, run: PipelineRun): Promise<WrittenDocument> {
  const imagesDir = join(outputDir, 'images');
  await mkdir(imagesDir, { recursive: true });

  const positions = new Map(run.range.commits.map((commit, index) => [commit.hash, index + 1]));
  const entries: DocumentEntry[] = [];
  let imageCount = 0;

  for (const result of run.commits) {
    const position = positions.get(result.commit.hash) ?? entries.length + 1;
    const imagePaths: string[] = [];
    for (const page of result.pages) {
      const name = imageFileName(position, result.commit, page);
      await writeFile(join(imagesDir, name), page.image);
      imagePaths.push(`./images/${name}`);
      imageCount++;
    }
    entries.push({ result, imagePaths });
  }

  const markdownPath = join(outputDir, 'commit-history.md');
  await writeFile(markdownPath, buildMarkdown(info, entries), 'utf-8');
  return { markdownPath, imageCount };
}

function renderHeader(info: DocumentInfo): string {
  let header = `# Git Commit History - ${info.repoName}\n\n`;
  if (info.branch) header += `**Branch:** \`${info.branch}\`\n\n`;
  header += `**Generated:** ${formatTimestamp(info.generatedAt)}\n\n---\n\n`;
  return header;
}

function renderToc(entries: DocumentEntry[]): string {
  let toc = '## Table of Contents\n\n';
  entries.slice(0, TOC_LIMIT).forEach(({ result: { commit } }, index) => {
    const subject = firstLine(commit.message);
    const label = subject.length > TOC_SUBJECT_LENGTH ? `${subject.slice(0, TOC_SUBJECT_LENGTH)}...` : subject;
    toc += `${index + 1}. [${commit.shortHash} - ${label}](#${commit.shortHash})\n`;
  });
  if (entries.length > TOC_LIMIT) {
    toc += `\n*... and ${entries.length - TOC_LIMIT} more commits*\n`;
  }
  return `${toc}\n---\n\n`;
}

/** Per-extension file counts and line totals, in order of first appearance. */
function renderChangesByType(files: FileDiffMeta[]): string {
  const groups = new Map<string, { count: number; added: number; removed: number }>();
  for (const file of files) {
    const ext = getExtension(file.path);
    const group = groups.get(ext) ?? { count: 0, added: 0, removed: 0 };
    group.count++;
    group.added += file.added;
    group.removed += file.removed;
    groups.set(ext, group);
  }

  let section = '### Summary of Changes\n\n';
  for (const [ext, group] of groups) {
    const label = ext ? `${ext} files` : 'Configuration files';
    section += `- ${label}: ${group.count} file(s) modified (+${group.added} -${group.removed})\n`;
  }
  return `${section}\n`;
}

function renderCommit({ result, imagePaths }: DocumentEntry): string {
  const { commit, summary, files, pages } = result;
  const message = commit.message.trim();

  let section = `## <a id="${commit.shortHash}"></a>${commit.shortHash} - ${firstLine(message)}\n\n`;
  section += `**Author:** ${commit.author} <${commit.email}>  \n`;
  section += `**Date:** ${formatTimestamp(new Date(commit.timestamp * 1000))}  \n`;
  section += `**Changes:** ${summary.filesChanged} files | +${summary.totalAdded} insertions | -${summary.totalRemoved} deletions\n\n`;

  if (message.includes('\n')) {
    section += `### Commit Message\n\n\`\`\`\n${message}\n\`\`\`\n\n`;
  }

  if (imagePaths.length > 0) {
    const pagesPerFile = new Map<string, number>();
    for (const page of pages) pagesPerFile.set(page.filePath, (pagesPerFile.get(page.filePath) ?? 0) + 1);

    section += '### Visual Diff\n\n';
    pages.forEach((page, index) => {
      section += `![${page.filePath} (${page.pageIndex}/${pagesPerFile.get(page.filePath) ?? 1})](${imagePaths[index]})\n\n`;
    });
  }

  if (files.length > 0) {
    section += '### Changed Files\n\n';
    for (const file of files) {
      const from = file.oldPath && file.oldPath !== file.path ? ` ← \`${file.oldPath}\`` : '';
      const truncated = file.truncated ? ' *(truncated)*' : '';
      section += `- ${CHANGE_ICONS[file.changeKind]} \`${file.path}\`${from} (+${file.added} -${file.removed})${truncated}\n`;
    }
    section += '\n';
    section += renderChangesByType(files);
  }

  if (summary.summarizedFiles.size > 0) {
    const names = [...summary.summarizedFiles].map(path => `\`${path}\``).join(', ');
    section += `*${summary.summarizedFiles.size} more file(s) counted but not rendered: ${names}*\n\n`;
  }
  if (summary.binaryFiles.length > 0) {
    const names = summary.binaryFiles.map(path => `\`${path}\``).join(', ');
    section += `*Binary files not rendered: ${names}*\n\n`;
  }

  return `${section}---\n\n`;
}
