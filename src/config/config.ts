import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import yaml from 'js-yaml';
import * as TOML from 'smol-toml';
import { z } from 'zod';
import { ConfigurationError } from '../model/errors.js';
import type { PipelineOptions } from '../pipeline/run.js';

/** Looked up at the repository root, first match wins. */
export const RC_FILES = ['.diffdocrc.json', '.diffdocrc', '.diffdocrc.yaml', '.diffdocrc.yml', '.diffdocrc.toml'];

export const ConfigSchema = z
  .object({
    maxFilesPerCommit: z.number().int().positive().default(10),
    perFileLineCeiling: z.number().int().positive().default(100),
    perCommitLineCeiling: z.number().int().positive().default(1000),
    excludePatterns: z.array(z.string().min(1, 'pattern must not be empty')).default([]),
    textExtensions: z.array(z.string().min(1)).optional(),
    imageWidth: z.number().int().min(320, 'imageWidth must be at least 320').default(1200),
    maxRowsPerPage: z.number().int().positive().default(60),
    fontSize: z.number().positive().default(12),
    lineHeight: z.number().positive().default(20),
    format: z.enum(['png', 'svg']).default('png'),
    concurrency: z.number().int().positive().default(4),
    fileConcurrency: z.number().int().positive().default(4),
    mode: z.enum(['branch-unique', 'all-commits']).default('branch-unique'),
    base: z.string().min(1).default('main'),
    cancelGraceMs: z.number().int().nonnegative().default(5000),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export type DiffDocConfig = z.output<typeof ConfigSchema>;
export type ConfigOverrides = Partial<z.input<typeof ConfigSchema>>;

export interface LoadedConfig {
  config: DiffDocConfig;
  /** The rc file the values came from, if any */
  source?: string;
}

export function parseRcFile(path: string, text: string): unknown {
  try {
    switch (extname(path)) {
      case '.yaml':
      case '.yml':
        return yaml.load(text) ?? {};
      case '.toml':
        return TOML.parse(text);
      default:
        return JSON.parse(text);
    }
  } catch (error) {
    throw new ConfigurationError(`Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}

/** File values first, then every override that is actually set. */
export function resolveConfig(fileValues: unknown, overrides: ConfigOverrides = {}, source?: string): DiffDocConfig {
  const merged: Record<string, unknown> = {};
  if (fileValues !== undefined) {
    if (!isRecord(fileValues)) {
      throw new ConfigurationError(`${source ?? 'Configuration'} must contain an object`);
    }
    Object.assign(merged, fileValues);
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration${source ? ` in ${source}` : ''}: ${problems.join('; ')}`);
  }
  return result.data;
}

export async function loadConfig(dir: string, overrides: ConfigOverrides = {}): Promise<LoadedConfig> {
  const source = RC_FILES.map(name => join(dir, name)).find(path => existsSync(path));
  if (!source) return { config: resolveConfig(undefined, overrides) };

  const values = parseRcFile(source, await readFile(source, 'utf-8'));
  return { config: resolveConfig(values, overrides, source), source };
}

export function toPipelineOptions(config: DiffDocConfig): PipelineOptions {
  return {
    normalize: {
      maxFilesPerCommit: config.maxFilesPerCommit,
      excludePatterns: config.excludePatterns,
      perFileLineCeiling: config.perFileLineCeiling,
      perCommitLineCeiling: config.perCommitLineCeiling,
      textExtensions: config.textExtensions,
    },
    layout: {
      imageWidth: config.imageWidth,
      maxRowsPerPage: config.maxRowsPerPage,
      fontSize: config.fontSize,
      lineHeight: config.lineHeight,
    },
    format: config.format,
    concurrency: config.concurrency,
    fileConcurrency: config.fileConcurrency,
    cancelGraceMs: config.cancelGraceMs,
    timeoutMs: config.timeoutMs,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
