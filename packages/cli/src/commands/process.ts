import {
  ManifestFailedError,
  PageWorker,
  type ManifestSummary,
  type Provenance,
  type WorkItem,
} from '@scriptorium/core';
import { EXIT_FAILURE, EXIT_OK, type CliOutput, type ExitCode } from '../output.js';
import type { Runtime } from '../runtime.js';
import { modelFor } from '../settings.js';

export interface WorkerFlags {
  readonly maxPages?: number;
  readonly resume: boolean;
  readonly recordFailures: boolean;
  readonly provenance?: Provenance;
}

export type ManifestOutcome =
  | { readonly ok: true; readonly summary: ManifestSummary }
  | { readonly ok: false; readonly summary: ManifestSummary; readonly error: ManifestFailedError };

/**
 * Runs the items one after another with a single worker, so the model is
 * resolved once. Configuration errors propagate before any output is touched.
 */
export async function processWorkItems(
  runtime: Runtime,
  items: readonly WorkItem[],
  flags: WorkerFlags,
): Promise<ManifestOutcome[]> {
  const { settings } = runtime;
  const bundle = runtime.createEngine();
  const { engine, modelResolver } = bundle;
  const merged = { ...bundle.options, ...settings.engineOptions };
  const engineOptions = Object.keys(merged).length > 0 ? merged : undefined;

  const worker = new PageWorker(
    {
      traverser: runtime.traverser,
      imageSource: runtime.imageSource,
      engine,
      modelResolver,
      writer: runtime.writer,
      logger: runtime.logger('Worker'),
    },
    {
      model: modelFor(settings),
      imageParameters: settings.imageParameters,
      engineOptions,
      maxPages: flags.maxPages,
      resume: flags.resume,
      recordFailures: flags.recordFailures,
      provenance: flags.provenance,
    },
  );

  const outcomes: ManifestOutcome[] = [];
  try {
    await worker.resolveConfiguration();
    for (const item of items) {
      try {
        outcomes.push({ ok: true, summary: await worker.processManifest(item) });
      } catch (error) {
        if (!(error instanceof ManifestFailedError)) throw error;
        outcomes.push({ ok: false, summary: error.summary, error });
      }
    }
  } finally {
    await engine.terminate?.();
  }
  return outcomes;
}

function report(outcome: ManifestOutcome, output: CliOutput): void {
  output.out(JSON.stringify({ status: outcome.ok ? 'completed' : 'failed', ...outcome.summary }));
  if (!outcome.ok) {
    output.err(outcome.error.message);
  }
}

/** Exit 0 once every page was attempted, even when some of them failed. */
export async function processCommand(
  runtime: Runtime,
  item: WorkItem,
  flags: WorkerFlags,
  output: CliOutput,
): Promise<ExitCode> {
  const [outcome] = await processWorkItems(runtime, [item], flags);
  report(outcome, output);
  return outcome.ok ? EXIT_OK : EXIT_FAILURE;
}

export async function runCommand(
  runtime: Runtime,
  items: readonly WorkItem[],
  flags: WorkerFlags,
  output: CliOutput,
): Promise<ExitCode> {
  const outcomes = await processWorkItems(runtime, items, flags);
  outcomes.forEach((outcome) => report(outcome, output));

  const failed = outcomes.filter((outcome) => !outcome.ok).length;
  runtime.logger('Cli').info(`Processed ${outcomes.length} manifest(s), ${failed} failed`);
  return failed > 0 ? EXIT_FAILURE : EXIT_OK;
}
