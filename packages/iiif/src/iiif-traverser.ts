import {
  DEFAULT_IMAGE_PARAMETERS,
  imageRequestUrl,
  ManifestValidationError,
  silentLogger,
  type ImageRequestParameters,
  type Logger,
  type ManifestReference,
  type ManifestTraverserPort,
  type PageDescriptor,
  type ValidationIssue,
} from '@scriptorium/core';
import {
  documentType,
  loadJson,
  loadManifest,
  parseCollection,
  parseManifest,
  type LoadJsonOptions,
} from './loaders.js';
import {
  COLLECTION_TYPE,
  labelText,
  manifestCanvases,
  manifestIds,
  primaryImageService,
  subCollectionIds,
  type Collection,
  type Manifest,
} from './models.js';
import { validateCollection, validateManifest } from './validation.js';

export interface IiifTraverserOptions extends LoadJsonOptions {
  /** Image API parameters applied to every canvas's image service */
  readonly imageParameters?: ImageRequestParameters;
  readonly logger?: Logger;
}

export interface ValidationReport {
  readonly reference: ManifestReference;
  readonly kind: 'manifest' | 'collection';
  readonly issues: readonly ValidationIssue[];
}

export interface ValidateOptions {
  /** For collections, check the collection document only */
  readonly skipManifests?: boolean;
}

/** IIIF Presentation 2.x manifests and collections, from URLs or local files. */
export class IiifTraverser implements ManifestTraverserPort {
  private readonly imageParameters: ImageRequestParameters;
  private readonly loadOptions: LoadJsonOptions;
  private readonly log: Logger;

  constructor(options: IiifTraverserOptions = {}) {
    this.imageParameters = options.imageParameters ?? DEFAULT_IMAGE_PARAMETERS;
    this.loadOptions = { timeoutMs: options.timeoutMs, httpGet: options.httpGet };
    this.log = options.logger ?? silentLogger;
  }

  async traverse(reference: ManifestReference): Promise<PageDescriptor[]> {
    const manifest = await loadManifest(reference, this.loadOptions);
    const issues = validateManifest(manifest);
    if (issues.length > 0) {
      throw new ManifestValidationError(reference, issues);
    }

    const pages = this.pagesOf(manifest);
    this.log.debug(`Traversed ${pages.length} canvas(es): ${reference}`);
    return pages;
  }

  async isCollection(reference: ManifestReference): Promise<boolean> {
    return documentType(await loadJson(reference, this.loadOptions)) === COLLECTION_TYPE;
  }

  /** Manifest references in document order; nested collections are followed, each once. */
  async expandCollection(reference: ManifestReference): Promise<ManifestReference[]> {
    const root = parseCollection(reference, await loadJson(reference, this.loadOptions));
    return this.collectManifests(reference, root);
  }

  async expandReference(reference: ManifestReference): Promise<ManifestReference[] | undefined> {
    const data = await loadJson(reference, this.loadOptions);
    if (documentType(data) !== COLLECTION_TYPE) return undefined;
    return this.collectManifests(reference, parseCollection(reference, data));
  }

  /** The first Image API URL found across a manifest or collection, if any. */
  async firstImageUrl(reference: ManifestReference): Promise<string | undefined> {
    const data = await loadJson(reference, this.loadOptions);

    if (documentType(data) !== COLLECTION_TYPE) {
      return this.firstImageOf(parseManifest(reference, data));
    }

    const manifests = await this.collectManifests(reference, parseCollection(reference, data));
    for (const manifestRef of manifests) {
      const url = this.firstImageOf(await loadManifest(manifestRef, this.loadOptions));
      if (url !== undefined) return url;
    }
    return undefined;
  }

  /**
   * Reports every resource with issues. Documents that do not parse as IIIF
   * are reported, not thrown; load failures still throw TraversalError.
   */
  async validate(reference: ManifestReference, options: ValidateOptions = {}): Promise<ValidationReport[]> {
    const data = await loadJson(reference, this.loadOptions);
    const reports: ValidationReport[] = [];

    if (documentType(data) !== COLLECTION_TYPE) {
      const issues = this.checkManifest(reference, () => parseManifest(reference, data));
      if (issues.length > 0) reports.push({ reference, kind: 'manifest', issues });
      return reports;
    }

    let collection: Collection;
    try {
      collection = parseCollection(reference, data);
    } catch (error) {
      if (error instanceof ManifestValidationError) {
        return [{ reference, kind: 'collection', issues: error.issues }];
      }
      throw error;
    }

    const collectionIssues = validateCollection(collection);
    if (collectionIssues.length > 0) {
      reports.push({ reference, kind: 'collection', issues: collectionIssues });
    }
    if (options.skipManifests) return reports;

    for (const manifestRef of await this.collectManifests(reference, collection)) {
      const manifestData = await loadJson(manifestRef, this.loadOptions);
      const issues = this.checkManifest(manifestRef, () => parseManifest(manifestRef, manifestData));
      if (issues.length > 0) reports.push({ reference: manifestRef, kind: 'manifest', issues });
    }
    return reports;
  }

  private checkManifest(reference: ManifestReference, parse: () => Manifest): readonly ValidationIssue[] {
    try {
      return validateManifest(parse());
    } catch (error) {
      if (error instanceof ManifestValidationError) return error.issues;
      throw error;
    }
  }

  private async collectManifests(reference: ManifestReference, root: Collection): Promise<ManifestReference[]> {
    const manifests: ManifestReference[] = [];
    const visited = new Set<string>([reference]);

    const visit = async (collectionRef: string, collection: Collection): Promise<void> => {
      const ids = manifestIds(collection);
      if (ids.length < collection.manifests.length) {
        this.log.warn(
          `Collection ${collectionRef}: ${collection.manifests.length - ids.length} manifest entr(ies) without @id ignored`,
        );
      }
      manifests.push(...ids);

      for (const childRef of subCollectionIds(collection)) {
        if (visited.has(childRef)) {
          this.log.warn(`Collection already visited: ${childRef}`);
          continue;
        }
        visited.add(childRef);
        const child = parseCollection(childRef, await loadJson(childRef, this.loadOptions));
        await visit(childRef, child);
      }
    };

    await visit(reference, root);
    return manifests;
  }

  private pagesOf(manifest: Manifest): PageDescriptor[] {
    return manifestCanvases(manifest).flatMap((canvas, canvasIndex): PageDescriptor[] => {
      const service = primaryImageService(canvas);
      if (!service) return [];
      return [
        {
          canvasId: canvas['@id'],
          canvasIndex,
          imageRequest: { serviceId: service['@id'], ...this.imageParameters },
          pageLabel: labelText(canvas.label),
        },
      ];
    });
  }

  private firstImageOf(manifest: Manifest): string | undefined {
    for (const canvas of manifestCanvases(manifest)) {
      const service = primaryImageService(canvas);
      if (service) return imageRequestUrl({ serviceId: service['@id'], ...this.imageParameters });
    }
    return undefined;
  }
}
