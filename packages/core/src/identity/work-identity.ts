import * as path from 'node:path';
import { sha1Hex, sha256Hex } from '../hash.js';
import type { EngineConfiguration } from '../models/engine-configuration.js';
import type { ImageRequest } from '../models/image-request.js';
import type { ManifestReference } from '../models/page-descriptor.js';
import { canonicalJson, fingerprint } from './canonical-json.js';

export type WorkIdentity = string;

export interface WorkIdentityInput {
  readonly manifestReference: ManifestReference;
  readonly canvasId: string;
  readonly engineConfiguration: EngineConfiguration;
  readonly imageRequest: ImageRequest;
}

export function deriveWorkIdentity(input: WorkIdentityInput): WorkIdentity {
  return sha256Hex(
    canonicalJson([
      input.manifestReference,
      input.canvasId,
      fingerprint(input.engineConfiguration),
      fingerprint(input.imageRequest),
    ]),
  );
}

export const OUTPUT_EXTENSION = '.jsonl';

/** Content-addressed artifact path: one manifest, one file, no lookup table. */
export function manifestOutputPath(reference: ManifestReference, outputDir: string): string {
  return path.join(outputDir, `${sha1Hex(reference)}${OUTPUT_EXTENSION}`);
}
