import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { vi } from 'vitest';
import {
  EngineError,
  type FetchedImage,
  type ModelResolverPort,
  type RecognitionContext,
  type RecognitionEnginePort,
  type RecognitionResult,
} from '@scriptorium/core';
import type { HttpResponse } from '@scriptorium/iiif';
import type { EngineBundle } from '../src/engines.js';
import type { CliOutput } from '../src/output.js';

export const MANIFEST_URL = 'https://iiif.example.org/manifests/m1';
export const SECOND_MANIFEST_URL = 'https://iiif.example.org/manifests/m2';
export const COLLECTION_URL = 'https://iiif.example.org/collections/c1';
export const IMAGE_BASE = 'https://images.example.org/iiif';

const encoder = new TextEncoder();

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(tmpdir(), 'scriptorium-cli-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export function createManifest(id: string, pages: string[]) {
  return {
    '@context': 'http://iiif.io/api/presentation/2/context.json',
    '@id': id,
    '@type': 'sc:Manifest',
    label: 'Test manifest',
    sequences: [
      {
        '@type': 'sc:Sequence',
        canvases: pages.map((name) => ({
          '@id': `${id}/canvas/${name}`,
          '@type': 'sc:Canvas',
          label: name,
          images: [
            {
              '@type': 'oa:Annotation',
              motivation: 'sc:painting',
              resource: {
                '@id': `${IMAGE_BASE}/${name}/full/full/0/default.jpg`,
                '@type': 'dctypes:Image',
                service: {
                  '@context': 'http://iiif.io/api/image/2/context.json',
                  '@id': `${IMAGE_BASE}/${name}`,
                },
              },
            },
          ],
        })),
      },
    ],
  };
}

export function createCollection(id: string, manifests: string[]) {
  return {
    '@context': 'http://iiif.io/api/presentation/2/context.json',
    '@id': id,
    '@type': 'sc:Collection',
    label: 'Test collection',
    manifests: manifests.map((m) => ({ '@id': m, '@type': 'sc:Manifest' })),
  };
}

/** Serves JSON documents and, for any image URL, the URL itself as bytes. */
export function createFakeHttp(documents: Record<string, unknown>) {
  return vi.fn(async (url: string): Promise<HttpResponse> => {
    if (url.startsWith(`${IMAGE_BASE}/`)) {
      return { status: 200, body: encoder.encode(url) };
    }
    if (!(url in documents)) {
      return { status: 404, body: encoder.encode('not found') };
    }
    return { status: 200, body: encoder.encode(JSON.stringify(documents[url])) };
  });
}

/** A kraken stand-in; images whose URL contains a name in `failing` raise EngineError. */
export function createFakeEngines(failing: readonly string[] = []): EngineBundle {
  const engine: RecognitionEnginePort = {
    id: 'kraken',
    recognize: vi.fn(
      async (image: FetchedImage, context: RecognitionContext): Promise<RecognitionResult> => {
        if (failing.some((name) => image.url.includes(`/${name}/`))) {
          throw new EngineError('kraken', 'segmentation failed', { retryable: false });
        }
        return {
          text: `text of ${context.canvasId}`,
          engine: 'kraken',
          elapsedMs: 5,
        };
      },
    ),
    terminate: vi.fn(async () => {}),
  };
  const modelResolver: ModelResolverPort = {
    resolve: vi.fn(async (reference: string) => ({
      engine: 'kraken',
      reference,
      resolved: 'catmus-print.mlmodel',
      engineVersion: '5.2.9',
    })),
  };
  return { engine, modelResolver, options: {} };
}

export function createOutput(): CliOutput & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => {
      stdout.push(line);
    },
    err: (line) => {
      stderr.push(line);
    },
  };
}
