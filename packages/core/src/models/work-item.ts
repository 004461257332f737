import type { ManifestReference } from './page-descriptor.js';

export interface WorkItem {
  readonly manifestReference: ManifestReference;
  readonly outputLocation: string;
}
