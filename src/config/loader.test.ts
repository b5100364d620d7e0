import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ConfigValidationError, loadConfig, validateConfig } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('loadConfig', () => {
  const testDir = resolve(process.cwd(), 'tmp/config-loader-test');

  beforeAll(async () => {
    await mkdir(testDir, { recursive: true });
    await writeFile(resolve(testDir, 'assay.config.yaml'), [
      'ingestion:',
      '  headerRows: "${ASSAY_TEST_HEADER_ROWS:-3}"',
      "  extensions: ['.CSV']",
      'normalization:',
      '  barcodeMode: prefix',
      '',
    ].join('\n'));
    await writeFile(resolve(testDir, 'invalid.yaml'), [
      'normalization:',
      '  onRowError: explode',
      '',
    ].join('\n'));
    await writeFile(resolve(testDir, 'broken.yaml'), 'ingestion: [\n');
    await writeFile(resolve(testDir, 'mixed.yaml'), [
      'ingestion:',
      '  headerRows: 3',
      'normalization:',
      '  onRowError: explode',
      '',
    ].join('\n'));
    await writeFile(resolve(testDir, 'normalization-only.yaml'), [
      'normalization:',
      '  onRowError: throw',
      '',
    ].join('\n'));
  });

  afterEach(() => {
    delete process.env.ASSAY_TEST_HEADER_ROWS;
  });

  afterAll(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('merges file settings over the defaults', async () => {
    const config = await loadConfig({ configPath: resolve(testDir, 'assay.config.yaml') });
    expect(config).toEqual({
      ingestion: { headerRows: 3, extensions: ['.csv'] },
      normalization: { barcodeMode: 'prefix', onRowError: 'skip' },
    });
  });

  it('substitutes environment variables', async () => {
    process.env.ASSAY_TEST_HEADER_ROWS = '7';
    const config = await loadConfig({ configPath: resolve(testDir, 'assay.config.yaml') });
    expect(config.ingestion.headerRows).toBe(7);
  });

  it('falls back to defaults when the file is missing', async () => {
    const config = await loadConfig({ configPath: resolve(testDir, 'missing.yaml') });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('rejects invalid values', async () => {
    await expect(loadConfig({ configPath: resolve(testDir, 'invalid.yaml') })).rejects.toThrow(ConfigValidationError);
  });

  it('drops invalid sections when validation is off', async () => {
    const config = await loadConfig({ configPath: resolve(testDir, 'invalid.yaml'), validate: false });
    expect(config.normalization).toEqual(DEFAULT_CONFIG.normalization);
  });

  it('keeps valid sections when validation is off', async () => {
    const config = await loadConfig({ configPath: resolve(testDir, 'mixed.yaml'), validate: false });
    expect(config.ingestion.headerRows).toBe(3);
    expect(config.normalization).toEqual(DEFAULT_CONFIG.normalization);
  });

  it('does not share default arrays with loaded configs', async () => {
    const config = await loadConfig({ configPath: resolve(testDir, 'normalization-only.yaml') });
    expect(config.normalization.onRowError).toBe('throw');

    config.ingestion.extensions.push('.txt');
    expect(DEFAULT_CONFIG.ingestion.extensions).toEqual(['.xls', '.xlsx', '.csv']);
  });

  it('reports unparseable YAML', async () => {
    await expect(loadConfig({ configPath: resolve(testDir, 'broken.yaml') })).rejects.toThrow(/Failed to parse config file/);
  });
});

describe('validateConfig', () => {
  it('accepts an empty document', () => {
    expect(validateConfig(null)).toEqual({});
  });

  it('points at the offending key', () => {
    try {
      validateConfig({ ingestion: { headerRows: -1 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.path).toBe('ingestion.headerRows');
        expect(err.value).toBe(-1);
      }
    }
  });

  it('rejects extensions without a leading dot', () => {
    expect(() => validateConfig({ ingestion: { extensions: ['xls'] } })).toThrow(
      "Config validation error at 'ingestion.extensions[0]': extension must be a string starting with \".\"",
    );
  });
});
