import { manifestOutputPath } from './identity/work-identity.js';
import { silentLogger, type Logger } from './logger.js';
import type { ManifestReference } from './models/page-descriptor.js';
import type { WorkItem } from './models/work-item.js';
import type { ManifestTraverserPort } from './ports/manifest-traverser.js';

export interface CollectionExpanderOptions {
  readonly outputDir: string;
  readonly logger?: Logger;
}

export class CollectionExpander {
  private readonly log: Logger;

  constructor(
    private readonly traverser: Pick<ManifestTraverserPort, 'expandReference'>,
    private readonly options: CollectionExpanderOptions,
  ) {
    this.log = options.logger ?? silentLogger;
  }

  /**
   * One work item per distinct manifest. A string is a collection or a single
   * manifest; an array is a flat list of manifest references.
   */
  async expand(input: string | readonly ManifestReference[]): Promise<WorkItem[]> {
    if (typeof input !== 'string') {
      return this.toWorkItems(input);
    }

    const reference = input.trim();
    const manifests = await this.traverser.expandReference(reference);
    if (manifests === undefined) {
      return this.toWorkItems([reference]);
    }
    this.log.info(`Collection ${reference} lists ${manifests.length} manifest(s)`);
    return this.toWorkItems(manifests);
  }

  private toWorkItems(references: readonly ManifestReference[]): WorkItem[] {
    const seen = new Set<string>();
    const items: WorkItem[] = [];

    for (const raw of references) {
      const manifestReference = raw.trim();
      if (manifestReference.length === 0) continue;
      if (seen.has(manifestReference)) {
        this.log.warn(`Duplicate manifest dropped: ${manifestReference}`);
        continue;
      }
      seen.add(manifestReference);
      items.push({
        manifestReference,
        outputLocation: manifestOutputPath(manifestReference, this.options.outputDir),
      });
    }

    return items;
  }
}
