export * from './models/index.js';
export type {
  FetchedImage,
  ImageSourcePort,
  ManifestTraverserPort,
  ModelResolverPort,
  OutputWriterPort,
  RecognitionContext,
  RecognitionEnginePort,
  RecognitionResult,
  ResolvedModel,
} from './ports/index.js';

export {
  ConfigurationError,
  EngineError,
  FileSystemError,
  formatPageError,
  IdentityError,
  isMissingFileError,
  ManifestFailedError,
  ManifestValidationError,
  OutputWriteError,
  PageFetchError,
  TraversalError,
  WorkItemListError,
} from './exceptions.js';
export type {
  FileSystemOperation,
  PageErrorDetail,
  PageErrorKind,
  ValidationIssue,
} from './exceptions.js';

export { sha1Hex, sha256Hex } from './hash.js';
export { canonicalJson, fingerprint } from './identity/canonical-json.js';
export {
  deriveWorkIdentity,
  manifestOutputPath,
  OUTPUT_EXTENSION,
} from './identity/work-identity.js';
export type { WorkIdentity, WorkIdentityInput } from './identity/work-identity.js';

export { createLogger, LOG_LEVELS, parseLogLevel, silentLogger } from './logger.js';
export type { LogFormat, Logger, LoggerOptions, LogLevel, LogMeta, Namespace } from './logger.js';

export { ResumeIndex } from './resume-index.js';
export type { ResumeIndexOptions, ResumeIndexStats } from './resume-index.js';
export { JsonlOutputWriter } from './output-writer.js';
export { PageWorker } from './page-worker.js';
export type { PageWorkerDependencies, PageWorkerOptions } from './page-worker.js';
export { CollectionExpander } from './collection-expander.js';
export type { CollectionExpanderOptions } from './collection-expander.js';
export {
  formatWorkItemList,
  parseWorkItemList,
  readWorkItemList,
  selectWorkItem,
  writeWorkItemList,
} from './work-item-list.js';
export type { ParseWorkItemListOptions } from './work-item-list.js';
