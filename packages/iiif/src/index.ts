export {
  annotationSchema,
  canvasSchema,
  COLLECTION_TYPE,
  collectionSchema,
  firstService,
  imageResourceSchema,
  imageServiceSchema,
  labelText,
  MANIFEST_TYPE,
  manifestCanvases,
  manifestIds,
  manifestSchema,
  primaryImageService,
  sequenceSchema,
  subCollectionIds,
} from './models.js';
export type {
  Annotation,
  Canvas,
  Collection,
  ImageResource,
  ImageService,
  Manifest,
  Sequence,
} from './models.js';

export {
  DEFAULT_LOAD_TIMEOUT_MS,
  documentType,
  expandHome,
  formatIssuePath,
  loadCollection,
  loadJson,
  loadManifest,
  parseCollection,
  parseManifest,
} from './loaders.js';
export type { LoadJsonOptions } from './loaders.js';

export { validateCanvas, validateCollection, validateManifest } from './validation.js';

export { IiifTraverser } from './iiif-traverser.js';
export type { IiifTraverserOptions, ValidateOptions, ValidationReport } from './iiif-traverser.js';

export { DEFAULT_IMAGE_TIMEOUT_MS, HttpImageSource, imageCachePath } from './image-source.js';
export type { HttpImageSourceOptions } from './image-source.js';

export { fetchHttpGet } from './http.js';
export type { HttpGetFn, HttpResponse } from './http.js';
