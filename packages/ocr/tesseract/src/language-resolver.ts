import {
  ConfigurationError,
  type ModelResolverPort,
  type ResolvedModel,
} from '@scriptorium/core';
import { TESSERACT_ENGINE_ID } from './tesseract-engine.js';

/** `eng`, `kor+eng`, `chi_sim` */
const LANGUAGES = /^[a-z][a-z0-9_]*(\+[a-z][a-z0-9_]*)*$/i;

export interface TesseractLanguageResolverOptions {
  /** Recorded as the engine version in every configuration */
  readonly engineVersion?: string;
}

/** For tesseract the model reference is its language string. */
export class TesseractLanguageResolver implements ModelResolverPort {
  constructor(private readonly options: TesseractLanguageResolverOptions = {}) {}

  async resolve(reference: string): Promise<ResolvedModel> {
    const lang = reference.trim();
    if (!LANGUAGES.test(lang)) {
      throw new ConfigurationError(`Invalid tesseract language: "${reference}" (expected e.g. eng or kor+eng)`);
    }
    return {
      engine: TESSERACT_ENGINE_ID,
      reference,
      resolved: lang,
      engineVersion: this.options.engineVersion,
    };
  }
}
