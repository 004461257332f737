import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_IMAGE_PARAMETERS,
  EngineError,
  type FetchedImage,
  type RecognitionContext,
  type RecognitionEnginePort,
} from '@scriptorium/core';
import { createWorker } from 'tesseract.js';
import { TesseractEngine } from '../src/tesseract-engine.js';

const mockTerminate = vi.fn(() => Promise.resolve());
const mockRecognize = vi.fn();

vi.mock('tesseract.js', () => ({
  OEM: { LSTM_ONLY: 1 },
  createWorker: vi.fn(() =>
    Promise.resolve({
      recognize: mockRecognize,
      terminate: mockTerminate,
    }),
  ),
}));

function createContext(lang: string): RecognitionContext {
  return {
    manifestReference: 'https://iiif.example.org/manifests/m1',
    canvasId: 'https://iiif.example.org/manifests/m1/canvas/a',
    configuration: {
      engine: 'tesseract',
      model: { reference: lang, resolved: lang },
      imageParameters: DEFAULT_IMAGE_PARAMETERS,
    },
  };
}

const IMAGE: FetchedImage = {
  url: 'https://images.example.org/iiif/a/full/!3000,3000/0/default.jpg',
  bytes: new Uint8Array([1, 2, 3]),
};

describe('TesseractEngine', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockRecognize.mockResolvedValue({
      data: { text: '  Hello world \n\n second line\n', confidence: 87 },
    });
  });

  it('implements RecognitionEnginePort', () => {
    const engine: RecognitionEnginePort = new TesseractEngine();
    expect(engine.id).toBe('tesseract');
  });

  it('returns trimmed, non-empty lines', async () => {
    let now = 0;
    const engine = new TesseractEngine({ clock: () => (now += 100) });

    const result = await engine.recognize(IMAGE, createContext('eng'));

    expect(result).toEqual({
      text: 'Hello world\nsecond line',
      engine: 'tesseract',
      engineVersion: undefined,
      modelResolved: 'eng',
      elapsedMs: 100,
      warnings: undefined,
    });
    expect(mockRecognize).toHaveBeenCalledWith(Buffer.from([1, 2, 3]));
  });

  it('creates the worker for the resolved language with LSTM only', async () => {
    const engine = new TesseractEngine({ langPath: '/data/tessdata' });

    await engine.recognize(IMAGE, createContext('kor+eng'));

    expect(createWorker).toHaveBeenCalledWith('kor+eng', 1, {
      langPath: '/data/tessdata',
      cachePath: undefined,
      workerPath: undefined,
      corePath: undefined,
    });
  });

  it('reuses one worker per language', async () => {
    const engine = new TesseractEngine();

    await engine.recognize(IMAGE, createContext('eng'));
    await engine.recognize(IMAGE, createContext('eng'));
    await engine.recognize(IMAGE, createContext('lat'));

    expect(createWorker).toHaveBeenCalledTimes(2);
  });

  it('warns when nothing was recognized', async () => {
    mockRecognize.mockResolvedValue({ data: { text: '\n \n', confidence: 0 } });

    const result = await new TesseractEngine().recognize(IMAGE, createContext('eng'));

    expect(result.text).toBe('');
    expect(result.warnings).toEqual(['no text recognized']);
  });

  it('wraps recognition failures in EngineError', async () => {
    mockRecognize.mockRejectedValue(new Error('Error attempting to read image.'));

    const error = await new TesseractEngine().recognize(IMAGE, createContext('eng')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineError);
    expect(error).toMatchObject({
      message: 'tesseract: recognition failed: Error attempting to read image.',
      retryable: false,
    });
  });

  it('terminate: releases every worker', async () => {
    const engine = new TesseractEngine();
    await engine.recognize(IMAGE, createContext('eng'));
    await engine.recognize(IMAGE, createContext('lat'));

    await engine.terminate();

    expect(mockTerminate).toHaveBeenCalledTimes(2);
  });
});
