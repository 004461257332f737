import type { EngineConfiguration } from '../models/engine-configuration.js';
import type { FetchedImage } from './image-source.js';

export interface RecognitionContext {
  readonly manifestReference: string;
  readonly canvasId: string;
  readonly configuration: EngineConfiguration;
}

export interface RecognitionResult {
  readonly text: string;
  readonly engine: string;
  readonly engineVersion?: string;
  readonly modelResolved?: string;
  readonly elapsedMs: number;
  readonly warnings?: readonly string[];
}

export interface RecognitionEnginePort {
  readonly id: string;
  /** Rejects with EngineError */
  recognize(image: FetchedImage, context: RecognitionContext): Promise<RecognitionResult>;
  /** Release engine resources */
  terminate?(): Promise<void>;
}
