import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  EngineError,
  isMissingFileError,
  silentLogger,
  type FetchedImage,
  type Logger,
  type RecognitionContext,
  type RecognitionEnginePort,
  type RecognitionResult,
} from '@scriptorium/core';
import { CommandError, execCommand, type CommandRunner } from './command.js';

export const KRAKEN_ENGINE_ID = 'kraken';

export const DEFAULT_KRAKEN_TIMEOUT_MS = 2 * 60 * 60 * 1000;

export const NO_OUTPUT_WARNING = 'kraken produced no output file';

export interface KrakenEngineOptions {
  readonly command?: string;
  readonly timeoutMs?: number;
  readonly run?: CommandRunner;
  readonly logger?: Logger;
  readonly clock?: () => number;
}

/**
 * Runs `kraken -i <image> <out> binarize segment -bl ocr -m <model>` per page.
 * Baseline segmentation (`-bl`) matches baseline-trained recognition models.
 */
export class KrakenEngine implements RecognitionEnginePort {
  readonly id = KRAKEN_ENGINE_ID;

  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;
  private readonly log: Logger;
  private readonly clock: () => number;

  constructor(options: KrakenEngineOptions = {}) {
    this.command = options.command ?? 'kraken';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_KRAKEN_TIMEOUT_MS;
    this.run = options.run ?? execCommand;
    this.log = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => performance.now());
  }

  async recognize(image: FetchedImage, context: RecognitionContext): Promise<RecognitionResult> {
    const { configuration } = context;
    const model = configuration.model.resolved;
    const workDir = await mkdtemp(path.join(tmpdir(), 'scriptorium-kraken-'));

    try {
      const input = image.path ?? (await this.writeInput(workDir, image));
      const output = path.join(workDir, 'out.txt');

      const started = this.clock();
      try {
        await this.run(
          this.command,
          ['-i', input, output, 'binarize', 'segment', '-bl', 'ocr', '-m', model],
          { timeoutMs: this.timeoutMs },
        );
      } catch (error) {
        throw this.toEngineError(error);
      }
      const elapsedMs = this.clock() - started;

      const base = {
        engine: KRAKEN_ENGINE_ID,
        engineVersion: configuration.engineVersion,
        modelResolved: model,
        elapsedMs,
      };

      const text = await this.readOutput(output);
      if (text === undefined) {
        this.log.info(`No output for ${context.canvasId}`, { image: image.url, model });
        return { ...base, text: '', warnings: [NO_OUTPUT_WARNING] };
      }
      return { ...base, text };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async writeInput(workDir: string, image: FetchedImage): Promise<string> {
    const input = path.join(workDir, `input${path.extname(image.url)}`);
    await writeFile(input, image.bytes);
    return input;
  }

  private async readOutput(output: string): Promise<string | undefined> {
    try {
      return await readFile(output, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) return undefined;
      throw new EngineError(KRAKEN_ENGINE_ID, `cannot read output: ${output}`, {
        retryable: false,
        cause: error,
      });
    }
  }

  private toEngineError(error: unknown): EngineError {
    if (!(error instanceof CommandError)) {
      return new EngineError(KRAKEN_ENGINE_ID, 'OCR failed', { retryable: false, cause: error });
    }
    switch (error.failure) {
      case 'not-found':
        return new EngineError(KRAKEN_ENGINE_ID, 'CLI not found on PATH', { retryable: false, cause: error });
      case 'timeout':
        return new EngineError(KRAKEN_ENGINE_ID, `timed out after ${this.timeoutMs}ms`, {
          retryable: true,
          cause: error,
        });
      case 'exit':
        return new EngineError(KRAKEN_ENGINE_ID, `OCR failed: ${error.output || error.message}`, {
          retryable: false,
          cause: error,
        });
    }
  }
}
