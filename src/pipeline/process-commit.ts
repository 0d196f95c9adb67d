import type { CommitRef } from '../model/commit.js';
import type { ChangeSummary, FileDiff, FileDiffMeta } from '../model/diff.js';
import { toFileMeta } from '../model/diff.js';
import { EncodingError } from '../model/errors.js';
import type { PageImage, RenderedPage } from '../model/page.js';
import type { DiffNormalizer } from '../diff/normalizer.js';
import type { LayoutOptions } from '../render/layout.js';
import type { DiffRenderer } from '../render/renderer.js';
import type { RunContext } from './context.js';
import { mapWithConcurrency } from './pool.js';

export interface CommitResult {
  commit: CommitRef;
  /** Files that made it to pages, in normalizer order */
  files: FileDiffMeta[];
  summary: ChangeSummary;
  pages: RenderedPage[];
}

export class CommitProcessor {
  constructor(
    private normalizer: DiffNormalizer,
    private renderer: DiffRenderer,
    private layout: LayoutOptions,
    private fileConcurrency: number,
  ) {}

  async process(commit: CommitRef, ctx: RunContext): Promise<CommitResult> {
    const { files, summary } = await this.normalizer.normalize(commit, ctx);

    const rendered = await mapWithConcurrency(files, this.fileConcurrency, file =>
      this.renderFile(commit, file, ctx, summary),
    );

    const kept: FileDiff[] = [];
    const pagesByFile: PageImage[][] = [];
    files.forEach((file, index) => {
      const pages = rendered[index];
      if (pages === undefined || pages === null) return;
      kept.push(file);
      pagesByFile.push(pages);
    });

    // Every file is done at this point; only now are sequence numbers handed out.
    const pages = ctx.numberPages(commit.hash, pagesByFile);

    return { commit, files: kept.map(toFileMeta), summary, pages };
  }

  private async renderFile(
    commit: CommitRef,
    file: FileDiff,
    ctx: RunContext,
    summary: ChangeSummary,
  ): Promise<PageImage[] | null> {
    try {
      const output = await this.renderer.render(file, this.layout);
      for (const rejected of output.rejected) {
        ctx.warn(rejected, { commit: commit.hash, path: file.path });
      }
      return output.pages;
    } catch (error) {
      // one file failing to draw never costs the commit its other files
      ctx.warn(error, { commit: commit.hash, path: file.path });
      summary.skippedFiles.push({ path: file.path, reason: error instanceof EncodingError ? 'encoding' : 'render-error' });
      return null;
    }
  }
}
