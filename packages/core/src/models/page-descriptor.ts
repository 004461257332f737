import type { ImageRequest } from './image-request.js';

export type ManifestReference = string;

export interface PageDescriptor {
  /** Stable within a manifest; order-independent part of the identity */
  readonly canvasId: string;
  /** Zero-based traversal position, informational only */
  readonly canvasIndex: number;
  readonly imageRequest: ImageRequest;
  readonly pageLabel?: string;
}
