export type { FetchedImage, ImageSourcePort } from './image-source.js';
export type { ManifestTraverserPort } from './manifest-traverser.js';
export type { ModelResolverPort, ResolvedModel } from './model-resolver.js';
export type { OutputWriterPort } from './output-writer.js';
export type {
  RecognitionContext,
  RecognitionEnginePort,
  RecognitionResult,
} from './recognition-engine.js';
