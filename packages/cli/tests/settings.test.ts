import { writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '@scriptorium/core';
import { DEFAULT_SETTINGS, loadSettings, modelFor } from '../src/settings.js';
import { createTempDir } from './helpers.js';

describe('loadSettings', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  async function writeConfig(content: unknown): Promise<string> {
    const file = path.join(dir, 'scriptorium.json');
    await writeFile(file, typeof content === 'string' ? content : JSON.stringify(content), 'utf8');
    return file;
  }

  it('returns the defaults when nothing is configured', async () => {
    const settings = await loadSettings({ env: {} });

    expect(settings).toEqual(DEFAULT_SETTINGS);
    expect(settings.imageParameters).toEqual({
      region: 'full',
      size: '!3000,3000',
      rotation: '0',
      quality: 'default',
      format: 'jpg',
    });
  });

  it('merges nested values from the settings file over the defaults', async () => {
    const configPath = await writeConfig({
      engine: 'tesseract',
      imageParameters: { size: 'full' },
      kraken: { autoInstall: false },
      engineOptions: { psm: 6 },
    });

    const settings = await loadSettings({ configPath, env: {} });

    expect(settings.engine).toBe('tesseract');
    expect(settings.imageParameters.size).toBe('full');
    expect(settings.imageParameters.region).toBe('full');
    expect(settings.kraken).toEqual({ command: 'kraken', autoInstall: false });
    expect(settings.engineOptions).toEqual({ psm: 6 });
  });

  it('applies file, then environment, then command-line values', async () => {
    const configPath = await writeConfig({ engine: 'tesseract', cacheDir: '/from/file', model: 'deu' });

    const settings = await loadSettings({
      configPath,
      env: { SCRIPTORIUM_ENGINE: 'google-vision', SCRIPTORIUM_CACHE_DIR: '/from/env' },
      overrides: { engine: 'kraken', model: undefined },
    });

    expect(settings.engine).toBe('kraken');
    expect(settings.cacheDir).toBe('/from/env');
    expect(settings.model).toBe('deu');
  });

  it('lets command-line image parameters override single fields', async () => {
    const settings = await loadSettings({
      env: {},
      overrides: { imageParameters: { size: '!2000,2000', format: undefined } },
    });

    expect(settings.imageParameters.size).toBe('!2000,2000');
    expect(settings.imageParameters.format).toBe('jpg');
  });

  it('accepts WARNING as a log level', async () => {
    const settings = await loadSettings({ env: { SCRIPTORIUM_LOG_LEVEL: 'WARNING' } });

    expect(settings.logLevel).toBe('warn');
  });

  it('reads the Vision API key from the environment', async () => {
    const settings = await loadSettings({ env: { GOOGLE_VISION_API_KEY: 'test-key' } });

    expect(settings.googleVision.apiKey).toBe('test-key');
  });

  it('ignores empty environment values', async () => {
    const settings = await loadSettings({ env: { SCRIPTORIUM_ENGINE: '  ', SCRIPTORIUM_MODEL: '' } });

    expect(settings.engine).toBe('kraken');
    expect(settings.model).toBeUndefined();
  });

  it('finds the settings file through SCRIPTORIUM_CONFIG', async () => {
    const configPath = await writeConfig({ logFormat: 'json' });

    const settings = await loadSettings({ env: { SCRIPTORIUM_CONFIG: configPath } });

    expect(settings.logFormat).toBe('json');
  });

  it('rejects an unknown engine', async () => {
    await expect(loadSettings({ env: {}, overrides: { engine: 'abbyy' } })).rejects.toThrow(
      /^Invalid settings: engine: /,
    );
  });

  it('rejects an unknown log level', async () => {
    await expect(loadSettings({ env: { SCRIPTORIUM_LOG_LEVEL: 'verbose' } })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it('rejects unknown keys in the settings file', async () => {
    const configPath = await writeConfig({ engien: 'kraken' });

    await expect(loadSettings({ configPath, env: {} })).rejects.toThrow(
      `Invalid settings in ${configPath}: settings: Unrecognized key(s) in object: 'engien'`,
    );
  });

  it('rejects a non-positive timeout', async () => {
    const configPath = await writeConfig({ imageTimeoutMs: 0 });

    await expect(loadSettings({ configPath, env: {} })).rejects.toThrow(
      `Invalid settings in ${configPath}: imageTimeoutMs: Number must be greater than 0`,
    );
  });

  it('rejects a missing settings file', async () => {
    const configPath = path.join(dir, 'missing.json');

    await expect(loadSettings({ configPath, env: {} })).rejects.toThrow(
      `Settings file not found: ${configPath}`,
    );
  });

  it('rejects a settings file that is not JSON', async () => {
    const configPath = await writeConfig('{ engine: kraken');

    const error = await loadSettings({ configPath, env: {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty('message', `Settings file is not valid JSON: ${configPath}`);
  });
});

describe('modelFor', () => {
  it('falls back to the engine default', () => {
    expect(modelFor({ engine: 'kraken' })).toBe('10.5281/zenodo.10592716');
    expect(modelFor({ engine: 'tesseract' })).toBe('eng');
    expect(modelFor({ engine: 'google-vision' })).toBe('builtin/stable');
  });

  it('prefers the configured model', () => {
    expect(modelFor({ engine: 'tesseract', model: 'kor+eng' })).toBe('kor+eng');
  });
});
