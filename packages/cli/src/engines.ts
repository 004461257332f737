import {
  ConfigurationError,
  type EngineOptionValue,
  type Logger,
  type ModelResolverPort,
  type RecognitionEnginePort,
} from '@scriptorium/core';
import { GoogleVisionEngine, GoogleVisionModelResolver, type HttpPostFn } from '@scriptorium/ocr-google-vision';
import { KrakenEngine, KrakenModelResolver, type CommandRunner } from '@scriptorium/ocr-kraken';
import { TesseractEngine, TesseractLanguageResolver } from '@scriptorium/ocr-tesseract';
import type { ScriptoriumSettings } from './settings.js';

export interface EngineBundle {
  readonly engine: RecognitionEnginePort;
  readonly modelResolver: ModelResolverPort;
  /** Settings that change the recognized text, folded into the work identity */
  readonly options: Readonly<Record<string, EngineOptionValue>>;
}

export interface EngineFactoryOptions {
  readonly logger?: Logger;
  /** Replaces the kraken subprocess runner */
  readonly run?: CommandRunner;
  /** Replaces the Vision API transport */
  readonly httpPost?: HttpPostFn;
}

export function createEngine(settings: ScriptoriumSettings, options: EngineFactoryOptions = {}): EngineBundle {
  const { logger } = options;

  switch (settings.engine) {
    case 'kraken': {
      const { command, autoInstall } = settings.kraken;
      return {
        engine: new KrakenEngine({
          command,
          timeoutMs: settings.engineTimeoutMs,
          run: options.run,
          logger,
        }),
        modelResolver: new KrakenModelResolver({ command, autoInstall, run: options.run, logger }),
        options: {},
      };
    }
    case 'tesseract': {
      const { langPath } = settings.tesseract;
      return {
        engine: new TesseractEngine({ ...settings.tesseract, logger }),
        modelResolver: new TesseractLanguageResolver(),
        options: langPath !== undefined ? { langPath } : {},
      };
    }
    case 'google-vision': {
      const { apiKey, languageHints } = settings.googleVision;
      if (!apiKey) {
        throw new ConfigurationError(
          'Google Vision needs an API key: set GOOGLE_VISION_API_KEY or googleVision.apiKey',
        );
      }
      return {
        engine: new GoogleVisionEngine({
          apiKey,
          languageHints: languageHints.length > 0 ? languageHints : undefined,
          timeoutMs: settings.engineTimeoutMs,
          httpPost: options.httpPost,
          logger,
        }),
        modelResolver: new GoogleVisionModelResolver(),
        options: languageHints.length > 0 ? { languageHints: languageHints.join(',') } : {},
      };
    }
  }
}
