import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, parseRcFile, resolveConfig, toPipelineOptions } from '../src/config/config.js';
import { ConfigurationError } from '../src/model/errors.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'diffdoc-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('falls back to defaults without an rc file', async () => {
    const { config, source } = await loadConfig(dir);

    expect(source).toBeUndefined();
    expect(config).toEqual({
      maxFilesPerCommit: 10,
      perFileLineCeiling: 100,
      perCommitLineCeiling: 1000,
      excludePatterns: [],
      imageWidth: 1200,
      maxRowsPerPage: 60,
      fontSize: 12,
      lineHeight: 20,
      format: 'png',
      concurrency: 4,
      fileConcurrency: 4,
      mode: 'branch-unique',
      base: 'main',
      cancelGraceMs: 5000,
    });
  });

  it('reads YAML', async () => {
    await writeFile(join(dir, '.diffdocrc.yaml'), "maxFilesPerCommit: 3\nexcludePatterns:\n  - '*.snap'\n");
    const { config, source } = await loadConfig(dir);

    expect(source).toBe(join(dir, '.diffdocrc.yaml'));
    expect(config.maxFilesPerCommit).toBe(3);
    expect(config.excludePatterns).toEqual(['*.snap']);
  });

  it('reads TOML', async () => {
    await writeFile(join(dir, '.diffdocrc.toml'), 'format = "svg"\nconcurrency = 2\nbase = "develop"\n');
    const { config } = await loadConfig(dir);

    expect(config.format).toBe('svg');
    expect(config.concurrency).toBe(2);
    expect(config.base).toBe('develop');
  });

  it('prefers .diffdocrc.json over the other names', async () => {
    await writeFile(join(dir, '.diffdocrc.json'), JSON.stringify({ imageWidth: 800 }));
    await writeFile(join(dir, '.diffdocrc.toml'), 'imageWidth = 1600\n');

    expect((await loadConfig(dir)).config.imageWidth).toBe(800);
  });

  it('lets set overrides win over the file', async () => {
    await writeFile(join(dir, '.diffdocrc'), JSON.stringify({ maxFilesPerCommit: 3, imageWidth: 900 }));
    const { config } = await loadConfig(dir, { maxFilesPerCommit: 7, imageWidth: undefined });

    expect(config.maxFilesPerCommit).toBe(7);
    expect(config.imageWidth).toBe(900);
  });

  it('reports malformed files', async () => {
    await writeFile(join(dir, '.diffdocrc.yml'), 'base: [unclosed\n');
    await expect(loadConfig(dir)).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('resolveConfig', () => {
  it('names the offending field', () => {
    expect(() => resolveConfig({ maxRowsPerPage: 0 }))
      .toThrow('Invalid configuration: maxRowsPerPage: Number must be greater than 0');
  });

  it('rejects unknown keys', () => {
    expect(() => resolveConfig({ colour: 'red' })).toThrow(ConfigurationError);
  });

  it('rejects a file that is not an object', () => {
    expect(() => resolveConfig(['a'], {}, '.diffdocrc.yaml')).toThrow('.diffdocrc.yaml must contain an object');
  });
});

describe('parseRcFile', () => {
  it('treats an empty YAML file as no settings', () => {
    expect(parseRcFile('.diffdocrc.yaml', '')).toEqual({});
  });
});

describe('toPipelineOptions', () => {
  it('splits settings between normalizer and layout', () => {
    const options = toPipelineOptions(resolveConfig({ maxRowsPerPage: 40, timeoutMs: 60000 }));

    expect(options.normalize).toEqual({
      maxFilesPerCommit: 10,
      excludePatterns: [],
      perFileLineCeiling: 100,
      perCommitLineCeiling: 1000,
      textExtensions: undefined,
    });
    expect(options.layout).toEqual({ imageWidth: 1200, maxRowsPerPage: 40, fontSize: 12, lineHeight: 20 });
    expect(options.timeoutMs).toBe(60000);
  });
});
