import { ConfigurationError, type ModelResolverPort, type ResolvedModel } from '@scriptorium/core';
import { GOOGLE_VISION_ENGINE_ID } from './google-vision-engine.js';

export const DEFAULT_VISION_MODEL = 'builtin/stable';

const MODEL = /^builtin\/[a-z]+$/;

/** Vision models are named by the API (`builtin/stable`, `builtin/latest`). */
export class GoogleVisionModelResolver implements ModelResolverPort {
  async resolve(reference: string): Promise<ResolvedModel> {
    const model = reference.trim();
    if (!MODEL.test(model)) {
      throw new ConfigurationError(
        `Invalid Vision model: "${reference}" (expected builtin/stable or builtin/latest)`,
      );
    }
    return { engine: GOOGLE_VISION_ENGINE_ID, reference, resolved: model };
  }
}
