export interface ImageRequestParameters {
  readonly region: string;
  readonly size: string;
  readonly rotation: string;
  readonly quality: string;
  readonly format: string;
}

/** A fully resolved IIIF Image API request: service endpoint plus parameters. */
export interface ImageRequest extends ImageRequestParameters {
  readonly serviceId: string;
}

export const DEFAULT_IMAGE_PARAMETERS: ImageRequestParameters = {
  region: 'full',
  size: '!3000,3000',
  rotation: '0',
  quality: 'default',
  format: 'jpg',
};

export function imageRequestUrl(request: ImageRequest): string {
  const base = request.serviceId.replace(/\/+$/, '');
  return `${base}/${request.region}/${request.size}/${request.rotation}/${request.quality}.${request.format}`;
}
