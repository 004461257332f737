import type { ImageRequestParameters } from './image-request.js';

export type EngineOptionValue = string | number | boolean;

export interface ModelReference {
  /** As supplied by the operator (DOI, installed name, path, language code) */
  readonly reference: string;
  /** As actually loaded by the engine */
  readonly resolved: string;
}

export interface EngineConfiguration {
  readonly engine: string;
  readonly engineVersion?: string;
  readonly model: ModelReference;
  readonly imageParameters: ImageRequestParameters;
  readonly options?: Readonly<Record<string, EngineOptionValue>>;
}
