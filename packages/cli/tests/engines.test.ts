import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '@scriptorium/core';
import {
  GoogleVisionEngine,
  GoogleVisionModelResolver,
  type HttpPostOptions,
} from '@scriptorium/ocr-google-vision';
import { KrakenEngine, KrakenModelResolver, type CommandOptions } from '@scriptorium/ocr-kraken';
import { TesseractEngine, TesseractLanguageResolver } from '@scriptorium/ocr-tesseract';
import { createEngine } from '../src/engines.js';
import { DEFAULT_SETTINGS, type ScriptoriumSettings } from '../src/settings.js';

function settingsWith(patch: Partial<ScriptoriumSettings>): ScriptoriumSettings {
  return { ...DEFAULT_SETTINGS, ...patch };
}

describe('createEngine', () => {
  it('builds the kraken engine and resolver by default', () => {
    const { engine, modelResolver } = createEngine(DEFAULT_SETTINGS);

    expect(engine).toBeInstanceOf(KrakenEngine);
    expect(engine.id).toBe('kraken');
    expect(modelResolver).toBeInstanceOf(KrakenModelResolver);
  });

  it('adds no identity options for kraken', () => {
    expect(createEngine(DEFAULT_SETTINGS).options).toEqual({});
  });

  it('passes the kraken command and runner through to the resolver', async () => {
    const run = vi.fn(async (_command: string, _args: readonly string[], _options?: CommandOptions) => ({
      stdout: 'kraken, version 5.2.9\n',
      stderr: '',
    }));
    const { modelResolver } = createEngine(
      settingsWith({ kraken: { command: '/opt/kraken/bin/kraken', autoInstall: false } }),
      { run },
    );

    const resolved = await modelResolver.resolve('10.5281/zenodo.10592716');

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toBe('/opt/kraken/bin/kraken');
    expect(resolved).toEqual({
      engine: 'kraken',
      reference: '10.5281/zenodo.10592716',
      resolved: '10.5281/zenodo.10592716',
      engineVersion: '5.2.9',
    });
  });

  it('builds the tesseract engine and language resolver', () => {
    const { engine, modelResolver } = createEngine(settingsWith({ engine: 'tesseract' }));

    expect(engine).toBeInstanceOf(TesseractEngine);
    expect(modelResolver).toBeInstanceOf(TesseractLanguageResolver);
  });

  it('reports the tesseract data path as an identity option', () => {
    const { options } = createEngine(
      settingsWith({ engine: 'tesseract', tesseract: { langPath: '/srv/tessdata_best' } }),
    );

    expect(options).toEqual({ langPath: '/srv/tessdata_best' });
  });

  it('builds the Vision engine when an API key is configured', () => {
    const { engine, modelResolver } = createEngine(
      settingsWith({
        engine: 'google-vision',
        googleVision: { apiKey: 'test-key', languageHints: ['la'] },
      }),
    );

    expect(engine).toBeInstanceOf(GoogleVisionEngine);
    expect(engine.id).toBe('google-vision');
    expect(modelResolver).toBeInstanceOf(GoogleVisionModelResolver);
  });

  it('reports the Vision language hints as an identity option', () => {
    const { options } = createEngine(
      settingsWith({
        engine: 'google-vision',
        googleVision: { apiKey: 'test-key', languageHints: ['la', 'grc'] },
      }),
    );

    expect(options).toEqual({ languageHints: 'la,grc' });
  });

  it('passes the engine timeout to the Vision transport', async () => {
    const httpPost = vi.fn(async (_url: string, _options: HttpPostOptions) => ({
      status: 200,
      body: JSON.stringify({ responses: [{ fullTextAnnotation: { text: 'ok' } }] }),
    }));
    const { engine } = createEngine(
      settingsWith({
        engine: 'google-vision',
        engineTimeoutMs: 30_000,
        googleVision: { apiKey: 'test-key', languageHints: [] },
      }),
      { httpPost },
    );

    await engine.recognize(
      { url: 'https://images.example.org/iiif/p1/full/max/0/default.jpg', bytes: new Uint8Array([1]) },
      {
        manifestReference: 'https://iiif.example.org/manifests/m1',
        canvasId: 'https://iiif.example.org/canvas/p1',
        configuration: {
          engine: 'google-vision',
          model: { reference: 'builtin/stable', resolved: 'builtin/stable' },
          imageParameters: DEFAULT_SETTINGS.imageParameters,
        },
      },
    );

    expect(httpPost.mock.calls[0][1].timeoutMs).toBe(30_000);
  });

  it('refuses the Vision engine without an API key', () => {
    expect(() => createEngine(settingsWith({ engine: 'google-vision' }))).toThrow(ConfigurationError);
  });
});
