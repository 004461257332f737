import type { ManifestReference, PageDescriptor } from '../models/page-descriptor.js';

export interface ManifestTraverserPort {
  /** Pages in reading order. Rejects with TraversalError. */
  traverse(reference: ManifestReference): Promise<PageDescriptor[]>;
  isCollection(reference: string): Promise<boolean>;
  /** Manifest references contained in a collection, in document order */
  expandCollection(reference: string): Promise<ManifestReference[]>;
  /**
   * expandCollection for a collection, in a single load. Resolves to
   * undefined when the reference is a manifest.
   */
  expandReference(reference: string): Promise<ManifestReference[] | undefined>;
}
