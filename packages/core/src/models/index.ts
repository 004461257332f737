export type { ImageRequest, ImageRequestParameters } from './image-request.js';
export { DEFAULT_IMAGE_PARAMETERS, imageRequestUrl } from './image-request.js';
export type { ManifestReference, PageDescriptor } from './page-descriptor.js';
export type {
  EngineConfiguration,
  EngineOptionValue,
  ModelReference,
} from './engine-configuration.js';
export type {
  OutputRecord,
  ParsedLine,
  PersistedRecord,
  Provenance,
  WireRecord,
} from './output-record.js';
export {
  fromWireRecord,
  parseRecordLine,
  serializeRecord,
  toWireRecord,
  wireRecordSchema,
} from './output-record.js';
export type { WorkItem } from './work-item.js';
export type { ManifestSummary, PageFailure, PageState } from './summary.js';
