import type { PageErrorDetail } from '../exceptions.js';

export type PageState = 'skipped' | 'written' | 'failed';

export interface PageFailure {
  readonly canvasId: string;
  readonly canvasIndex: number;
  readonly workIdentity: string;
  readonly imageUrl: string;
  readonly error: PageErrorDetail;
}

export interface ManifestSummary {
  readonly manifestReference: string;
  readonly outputLocation: string;
  readonly attempted: number;
  readonly skipped: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly elapsedMs: number;
  readonly failures: readonly PageFailure[];
}
