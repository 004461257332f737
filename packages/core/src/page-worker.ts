import {
  ConfigurationError,
  formatPageError,
  ManifestFailedError,
  TraversalError,
} from './exceptions.js';
import { deriveWorkIdentity, type WorkIdentity } from './identity/work-identity.js';
import { silentLogger, type Logger } from './logger.js';
import type { EngineConfiguration, EngineOptionValue } from './models/engine-configuration.js';
import { imageRequestUrl, type ImageRequestParameters } from './models/image-request.js';
import type { OutputRecord, Provenance } from './models/output-record.js';
import type { PageDescriptor } from './models/page-descriptor.js';
import type { ManifestSummary, PageFailure, PageState } from './models/summary.js';
import type { WorkItem } from './models/work-item.js';
import type { ImageSourcePort } from './ports/image-source.js';
import type { ManifestTraverserPort } from './ports/manifest-traverser.js';
import type { ModelResolverPort, ResolvedModel } from './ports/model-resolver.js';
import type { OutputWriterPort } from './ports/output-writer.js';
import type { RecognitionEnginePort, RecognitionResult } from './ports/recognition-engine.js';
import { ResumeIndex } from './resume-index.js';

export interface PageWorkerDependencies {
  readonly traverser: ManifestTraverserPort;
  readonly imageSource: ImageSourcePort;
  readonly engine: RecognitionEnginePort;
  readonly modelResolver: ModelResolverPort;
  readonly writer: OutputWriterPort;
  readonly logger?: Logger;
  /** Wall clock for `created_at` */
  readonly now?: () => Date;
  /** Monotonic milliseconds for elapsed times */
  readonly clock?: () => number;
}

export interface PageWorkerOptions {
  readonly model: string;
  readonly imageParameters: ImageRequestParameters;
  readonly engineOptions?: Readonly<Record<string, EngineOptionValue>>;
  /** Stop after this many pages were attempted. Skipped pages never count. */
  readonly maxPages?: number;
  readonly resume?: boolean;
  /** Also append a degraded record (empty text, `errors`) for failed pages */
  readonly recordFailures?: boolean;
  readonly provenance?: Provenance;
}

interface Counters {
  attempted: number;
  skipped: number;
  succeeded: number;
  failed: number;
}

export class PageWorker {
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly clock: () => number;
  private configuration: Promise<EngineConfiguration> | null = null;

  constructor(
    private readonly deps: PageWorkerDependencies,
    private readonly options: PageWorkerOptions,
  ) {
    this.log = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.clock = deps.clock ?? (() => performance.now());

    if (options.maxPages !== undefined && (!Number.isInteger(options.maxPages) || options.maxPages < 0)) {
      throw new ConfigurationError(`maxPages must be a non-negative integer, got ${options.maxPages}`);
    }
  }

  /** Resolved once per worker; rejects with ConfigurationError. */
  resolveConfiguration(): Promise<EngineConfiguration> {
    if (!this.configuration) {
      this.configuration = this.loadConfiguration();
      void this.configuration.catch(() => {
        this.configuration = null;
      });
    }
    return this.configuration;
  }

  async processManifest(item: WorkItem): Promise<ManifestSummary> {
    const { manifestReference, outputLocation } = item;
    const started = this.clock();
    const counters: Counters = { attempted: 0, skipped: 0, succeeded: 0, failed: 0 };
    const failures: PageFailure[] = [];

    const summarize = (): ManifestSummary => ({
      manifestReference,
      outputLocation,
      ...counters,
      elapsedMs: Math.round(this.clock() - started),
      failures: [...failures],
    });

    const configuration = await this.resolveConfiguration();

    try {
      const index =
        this.options.resume === false
          ? ResumeIndex.empty()
          : await ResumeIndex.build(outputLocation, { logger: this.log });

      const pages = await this.traverse(manifestReference);
      this.log.info(`Processing ${pages.length} page(s): ${manifestReference}`, {
        outputLocation,
        resumed: index.size,
      });

      for (const page of pages) {
        if (this.options.maxPages !== undefined && counters.attempted >= this.options.maxPages) {
          this.log.info(`Page limit reached (${this.options.maxPages}): ${manifestReference}`);
          break;
        }

        const workIdentity = deriveWorkIdentity({
          manifestReference,
          canvasId: page.canvasId,
          engineConfiguration: configuration,
          imageRequest: page.imageRequest,
        });

        if (index.has(workIdentity)) {
          counters.skipped++;
          this.log.debug(`Skipped (already recorded): ${page.canvasId}`);
          continue;
        }

        counters.attempted++;
        const state = await this.processPage(item, page, workIdentity, configuration, failures);
        if (state === 'written') {
          index.add(workIdentity);
          counters.succeeded++;
        } else {
          counters.failed++;
        }
      }
    } catch (error) {
      const summary = summarize();
      this.log.error(`Manifest failed: ${manifestReference}`, error, { outputLocation });
      throw new ManifestFailedError(summary, error);
    }

    const summary = summarize();
    this.log.info(
      `Completed: ${summary.succeeded} written, ${summary.skipped} skipped, ${summary.failed} failed (${summary.elapsedMs}ms)`,
      { manifestReference, outputLocation },
    );
    return summary;
  }

  private async loadConfiguration(): Promise<EngineConfiguration> {
    let resolved: ResolvedModel;
    try {
      resolved = await this.deps.modelResolver.resolve(this.options.model);
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      throw new ConfigurationError(`Model could not be resolved: ${this.options.model}`, error);
    }

    if (resolved.engine !== this.deps.engine.id) {
      throw new ConfigurationError(
        `Model resolver for ${resolved.engine} does not match engine ${this.deps.engine.id}`,
      );
    }

    return {
      engine: resolved.engine,
      engineVersion: resolved.engineVersion,
      model: { reference: resolved.reference, resolved: resolved.resolved },
      imageParameters: { ...this.options.imageParameters },
      options: this.options.engineOptions,
    };
  }

  private async traverse(manifestReference: string): Promise<PageDescriptor[]> {
    try {
      return await this.deps.traverser.traverse(manifestReference);
    } catch (error) {
      if (error instanceof TraversalError) throw error;
      throw new TraversalError(manifestReference, error instanceof Error ? error.message : String(error), error);
    }
  }

  /** PENDING → RECOGNIZING → WRITTEN | FAILED. Only output write failures escape. */
  private async processPage(
    item: WorkItem,
    page: PageDescriptor,
    workIdentity: WorkIdentity,
    configuration: EngineConfiguration,
    failures: PageFailure[],
  ): Promise<Exclude<PageState, 'skipped'>> {
    const imageUrl = imageRequestUrl(page.imageRequest);
    const started = this.clock();

    let result: RecognitionResult;
    try {
      const image = await this.deps.imageSource.fetch(page.imageRequest);
      result = await this.deps.engine.recognize(image, {
        manifestReference: item.manifestReference,
        canvasId: page.canvasId,
        configuration,
      });
    } catch (error) {
      const detail = formatPageError(error);
      failures.push({
        canvasId: page.canvasId,
        canvasIndex: page.canvasIndex,
        workIdentity,
        imageUrl,
        error: detail,
      });
      this.log.error(`Page failed: ${page.canvasId}`, error, {
        manifestReference: item.manifestReference,
        canvasIndex: page.canvasIndex,
        workIdentity,
        imageUrl,
      });

      if (this.options.recordFailures) {
        await this.deps.writer.append(
          item.outputLocation,
          this.buildRecord(item, page, workIdentity, configuration, {
            text: '',
            elapsedMs: Math.round(this.clock() - started),
            errors: [detail],
          }),
        );
      }
      return 'failed';
    }

    const warnings = [...(result.warnings ?? [])];
    if (result.modelResolved !== undefined && result.modelResolved !== configuration.model.resolved) {
      warnings.push(`engine reported model ${result.modelResolved}`);
    }

    await this.deps.writer.append(
      item.outputLocation,
      this.buildRecord(item, page, workIdentity, configuration, {
        text: result.text,
        elapsedMs: Math.round(result.elapsedMs),
        warnings: warnings.length > 0 ? warnings : undefined,
      }),
    );
    this.log.debug(`Recognized ${page.canvasId} in ${Math.round(result.elapsedMs)}ms`);
    return 'written';
  }

  private buildRecord(
    item: WorkItem,
    page: PageDescriptor,
    workIdentity: WorkIdentity,
    configuration: EngineConfiguration,
    outcome: Pick<OutputRecord, 'text' | 'elapsedMs' | 'warnings' | 'errors'>,
  ): OutputRecord {
    return {
      workIdentity,
      manifestReference: item.manifestReference,
      canvasId: page.canvasId,
      canvasIndex: page.canvasIndex,
      imageRequest: page.imageRequest,
      engineConfiguration: configuration,
      createdAt: this.now().toISOString(),
      pageLabel: page.pageLabel,
      provenance: this.options.provenance,
      ...outcome,
    };
  }
}
