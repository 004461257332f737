import { vi } from 'vitest';
import type { HttpResponse } from '../src/http.js';
import { parseCollection, parseManifest } from '../src/loaders.js';
import { canvasSchema, type Canvas, type Collection, type Manifest } from '../src/models.js';

export const MANIFEST_URL = 'https://iiif.example.org/manifests/m1';
export const COLLECTION_URL = 'https://iiif.example.org/collections/c1';

const encoder = new TextEncoder();

export interface CanvasOptions {
  readonly label?: unknown;
  /** Service @id; `null` leaves the image without a service */
  readonly service?: string | null;
  readonly images?: boolean;
}

export function canvasId(name: string, manifestId = MANIFEST_URL): string {
  return `${manifestId}/canvas/${name}`;
}

export function createCanvas(name: string, options: CanvasOptions = {}, manifestId = MANIFEST_URL) {
  const id = canvasId(name, manifestId);
  const serviceId =
    options.service === undefined ? `https://images.example.org/iiif/${name}` : options.service;

  return {
    '@id': id,
    '@type': 'sc:Canvas',
    ...(options.label !== undefined && { label: options.label }),
    width: 2000,
    height: 3000,
    images:
      options.images === false
        ? []
        : [
            {
              '@type': 'oa:Annotation',
              motivation: 'sc:painting',
              on: id,
              resource: {
                '@id': `https://images.example.org/iiif/${name}/full/full/0/default.jpg`,
                '@type': 'dctypes:Image',
                format: 'image/jpeg',
                ...(serviceId !== null && {
                  service: {
                    '@context': 'http://iiif.io/api/image/2/context.json',
                    '@id': serviceId,
                    profile: 'http://iiif.io/api/image/2/level2.json',
                  },
                }),
              },
            },
          ],
  };
}

export function createManifest(id: string, ...sequences: unknown[][]) {
  return {
    '@context': 'http://iiif.io/api/presentation/2/context.json',
    '@id': id,
    '@type': 'sc:Manifest',
    label: 'Test manifest',
    sequences: sequences.map((canvases) => ({ '@type': 'sc:Sequence', canvases })),
  };
}

export function createCollection(id: string, manifests: string[], collections: string[] = []) {
  return {
    '@context': 'http://iiif.io/api/presentation/2/context.json',
    '@id': id,
    '@type': 'sc:Collection',
    label: 'Test collection',
    manifests: manifests.map((m) => ({ '@id': m, '@type': 'sc:Manifest' })),
    collections: collections.map((c) => ({ '@id': c, '@type': 'sc:Collection' })),
  };
}

/** Serves the given documents as JSON; anything else is a 404. */
export function createFakeHttp(documents: Record<string, unknown>) {
  return vi.fn(async (url: string): Promise<HttpResponse> => {
    if (!(url in documents)) {
      return { status: 404, body: encoder.encode('not found') };
    }
    return { status: 200, body: encoder.encode(JSON.stringify(documents[url])) };
  });
}

export function parseManifestDoc(data: unknown): Manifest {
  return parseManifest(MANIFEST_URL, data);
}

export function parseCollectionDoc(data: unknown): Collection {
  return parseCollection(COLLECTION_URL, data);
}

export function parseCanvas(data: unknown): Canvas {
  return canvasSchema.parse(data);
}
