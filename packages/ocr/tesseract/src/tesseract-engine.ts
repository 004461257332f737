import { createWorker, OEM, type Worker } from 'tesseract.js';
import {
  EngineError,
  silentLogger,
  type FetchedImage,
  type Logger,
  type RecognitionContext,
  type RecognitionEnginePort,
  type RecognitionResult,
} from '@scriptorium/core';

export const TESSERACT_ENGINE_ID = 'tesseract';

export interface TesseractEngineConfig {
  /** Where traineddata files are downloaded from */
  langPath?: string;
  /** Where downloaded traineddata files are kept */
  cachePath?: string;
  workerPath?: string;
  corePath?: string;
}

export interface TesseractEngineOptions extends TesseractEngineConfig {
  readonly logger?: Logger;
  readonly clock?: () => number;
}

/** One lazily created worker per language string, reused across pages. */
export class TesseractEngine implements RecognitionEnginePort {
  readonly id = TESSERACT_ENGINE_ID;

  private readonly workers = new Map<string, Promise<Worker>>();
  private readonly config: TesseractEngineConfig;
  private readonly log: Logger;
  private readonly clock: () => number;

  constructor(options: TesseractEngineOptions = {}) {
    this.config = {
      langPath: options.langPath,
      cachePath: options.cachePath,
      workerPath: options.workerPath,
      corePath: options.corePath,
    };
    this.log = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => performance.now());
  }

  async recognize(image: FetchedImage, context: RecognitionContext): Promise<RecognitionResult> {
    const lang = context.configuration.model.resolved;
    const worker = await this.workerFor(lang);

    const started = this.clock();
    let text: string;
    let confidence: number;
    try {
      const { data } = await worker.recognize(Buffer.from(image.bytes));
      text = data.text;
      confidence = data.confidence;
    } catch (error) {
      throw new EngineError(TESSERACT_ENGINE_ID, `recognition failed: ${describe(error)}`, {
        retryable: false,
        cause: error,
      });
    }
    const elapsedMs = this.clock() - started;

    const lines = text
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    this.log.debug(`Recognized ${lines.length} line(s) in ${context.canvasId}`, { confidence });

    return {
      text: lines.join('\n'),
      engine: TESSERACT_ENGINE_ID,
      engineVersion: context.configuration.engineVersion,
      modelResolved: lang,
      elapsedMs,
      warnings: lines.length === 0 ? ['no text recognized'] : undefined,
    };
  }

  async terminate(): Promise<void> {
    const workers = [...this.workers.values()];
    this.workers.clear();
    for (const pending of workers) {
      const worker = await pending;
      await worker.terminate();
    }
  }

  private workerFor(lang: string): Promise<Worker> {
    let worker = this.workers.get(lang);
    if (!worker) {
      worker = this.createWorker(lang);
      this.workers.set(lang, worker);
    }
    return worker;
  }

  private async createWorker(lang: string): Promise<Worker> {
    try {
      return await createWorker(lang, OEM.LSTM_ONLY, {
        langPath: this.config.langPath,
        cachePath: this.config.cachePath,
        workerPath: this.config.workerPath,
        corePath: this.config.corePath,
      });
    } catch (error) {
      this.workers.delete(lang);
      throw new EngineError(TESSERACT_ENGINE_ID, `cannot load language ${lang}: ${describe(error)}`, {
        retryable: false,
        cause: error,
      });
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
