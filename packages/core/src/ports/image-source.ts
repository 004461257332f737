import type { ImageRequest } from '../models/image-request.js';

export interface FetchedImage {
  readonly url: string;
  readonly bytes: Uint8Array;
  /** Local file holding the same bytes, when the source keeps one */
  readonly path?: string;
}

export interface ImageSourcePort {
  /** Rejects with PageFetchError */
  fetch(request: ImageRequest): Promise<FetchedImage>;
}
