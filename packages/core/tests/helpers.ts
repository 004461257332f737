import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { vi } from 'vitest';
import { EngineError, PageFetchError, TraversalError } from '../src/exceptions.js';
import { deriveWorkIdentity } from '../src/identity/work-identity.js';
import type { EngineConfiguration } from '../src/models/engine-configuration.js';
import { DEFAULT_IMAGE_PARAMETERS, imageRequestUrl } from '../src/models/image-request.js';
import type { ImageRequest } from '../src/models/image-request.js';
import type { OutputRecord } from '../src/models/output-record.js';
import type { PageDescriptor } from '../src/models/page-descriptor.js';
import type { FetchedImage, ImageSourcePort } from '../src/ports/image-source.js';
import type { ManifestTraverserPort } from '../src/ports/manifest-traverser.js';
import type { ModelResolverPort } from '../src/ports/model-resolver.js';
import type {
  RecognitionContext,
  RecognitionEnginePort,
  RecognitionResult,
} from '../src/ports/recognition-engine.js';

export const MANIFEST = 'https://iiif.example.org/manifests/m1';

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(tmpdir(), 'scriptorium-core-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export function createImageRequest(serviceId: string): ImageRequest {
  return { serviceId, ...DEFAULT_IMAGE_PARAMETERS };
}

export function createPages(...names: string[]): PageDescriptor[] {
  return names.map((name, i) => ({
    canvasId: `${MANIFEST}/canvas/${name}`,
    canvasIndex: i,
    imageRequest: createImageRequest(`https://images.example.org/iiif/${name}`),
    pageLabel: `p. ${i + 1}`,
  }));
}

export function createFakeTraverser(pages: Map<string, PageDescriptor[]>): ManifestTraverserPort {
  return {
    traverse: vi.fn(async (reference: string) => {
      const found = pages.get(reference);
      if (!found) throw new TraversalError(reference, 'not found');
      return found;
    }),
    isCollection: vi.fn(async () => false),
    expandCollection: vi.fn(async (): Promise<string[]> => []),
    expandReference: vi.fn(async (): Promise<string[] | undefined> => undefined),
  };
}

export function createFakeImageSource(failing: ReadonlySet<string> = new Set()): ImageSourcePort {
  return {
    fetch: vi.fn(async (request: ImageRequest): Promise<FetchedImage> => {
      const url = imageRequestUrl(request);
      if (failing.has(request.serviceId)) {
        throw new PageFetchError(url, 'HTTP 503', { status: 503 });
      }
      return { url, bytes: new TextEncoder().encode(url) };
    }),
  };
}

/** Recognizes the image URL back as text; canvases in `failing` raise EngineError. */
export function createFakeEngine(failing: ReadonlySet<string> = new Set()): RecognitionEnginePort {
  return {
    id: 'fake',
    recognize: vi.fn(
      async (image: FetchedImage, context: RecognitionContext): Promise<RecognitionResult> => {
        if (failing.has(context.canvasId)) {
          throw new EngineError('fake', 'segmentation failed', { retryable: false });
        }
        return {
          text: `text of ${image.url}`,
          engine: 'fake',
          elapsedMs: 42,
        };
      },
    ),
  };
}

export function createFakeResolver(resolved = 'models/fake-v1.mlmodel'): ModelResolverPort {
  return {
    resolve: vi.fn(async (reference: string) => ({
      engine: 'fake',
      reference,
      resolved,
    })),
  };
}

export const ENGINE_CONFIGURATION: EngineConfiguration = {
  engine: 'fake',
  model: { reference: 'fake-model', resolved: 'models/fake-v1.mlmodel' },
  imageParameters: DEFAULT_IMAGE_PARAMETERS,
};

export function createRecord(page: PageDescriptor, overrides: Partial<OutputRecord> = {}): OutputRecord {
  return {
    workIdentity: deriveWorkIdentity({
      manifestReference: MANIFEST,
      canvasId: page.canvasId,
      engineConfiguration: ENGINE_CONFIGURATION,
      imageRequest: page.imageRequest,
    }),
    manifestReference: MANIFEST,
    canvasId: page.canvasId,
    canvasIndex: page.canvasIndex,
    imageRequest: page.imageRequest,
    engineConfiguration: ENGINE_CONFIGURATION,
    text: `text of ${page.canvasId}`,
    elapsedMs: 10,
    createdAt: '2026-01-15T12:00:00.000Z',
    ...overrides,
  };
}
