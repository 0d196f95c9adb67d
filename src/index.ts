// Model types
export type { CommitRef, ReflogEntry, RangeMode, RangeScope, RangeStrategy, ResolvedRange } from './model/commit.js';
export type { ChangeKind, ChangedFile, ChangeSummary, DiffLine, FileDiff, FileDiffMeta, Hunk, SkipReason } from './model/diff.js';
export type { ImageFormat, PageImage, RenderedPage } from './model/page.js';
export * from './model/errors.js';

// Git
export { GitBridge } from './git/bridge.js';
export type { RepositoryDataSource } from './git/types.js';

// Range resolution
export { CommitGraph } from './resolver/graph.js';
export { CommitRangeResolver } from './resolver/resolver.js';

// Diff normalization
export { DiffNormalizer } from './diff/normalizer.js';
export type { NormalizeOptions, NormalizedCommit } from './diff/normalizer.js';
export { parsePatch, flattenSide } from './diff/patch-parser.js';
export { DEFAULT_EXCLUDE_PATTERNS, TEXT_EXTENSIONS, isExcluded, isTextFile } from './diff/filters.js';

// Rendering
export type { DiffRenderer, RenderOutput } from './render/renderer.js';
export { SideBySideRenderer } from './render/renderer.js';
export type { PageRasterizer } from './render/rasterizer.js';
export { SharpRasterizer, SvgRasterizer } from './render/rasterizer.js';
export { RendererRegistry, createDefaultRegistry } from './render/registry.js';
export type { LayoutOptions } from './render/layout.js';

// Pipeline
export { RunContext } from './pipeline/context.js';
export type { RunIssue } from './pipeline/context.js';
export { runPipeline } from './pipeline/run.js';
export type { PipelineHooks, PipelineOptions, PipelineRun } from './pipeline/run.js';
export type { CommitResult } from './pipeline/process-commit.js';

// Configuration
export { ConfigSchema, loadConfig, resolveConfig, toPipelineOptions } from './config/config.js';
export type { DiffDocConfig, ConfigOverrides } from './config/config.js';

// Utilities
export { Logger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
