import { z } from 'zod';

/** Labels in the wild: plain strings, `{ "@value": ... }` objects, or arrays of either. */
const labelSchema = z
  .union([z.string(), z.record(z.unknown()), z.array(z.unknown())])
  .nullish();

export const imageServiceSchema = z
  .object({
    '@id': z.string(),
    '@type': z.string().nullish(),
    '@context': z.union([z.string(), z.array(z.unknown())]).nullish(),
    profile: z.union([z.string(), z.array(z.unknown())]).nullish(),
  })
  .passthrough();

export const imageResourceSchema = z
  .object({
    '@id': z.string().nullish(),
    '@type': z.string().nullish(),
    format: z.string().nullish(),
    width: z.number().int().nullish(),
    height: z.number().int().nullish(),
    service: z.union([imageServiceSchema, z.array(imageServiceSchema)]).nullish(),
  })
  .passthrough();

export const annotationSchema = z
  .object({
    '@id': z.string().nullish(),
    '@type': z.string().nullish(),
    motivation: z.string().nullish(),
    resource: imageResourceSchema,
    on: z.string().nullish(),
  })
  .passthrough();

export const canvasSchema = z
  .object({
    '@id': z.string(),
    '@type': z.string(),
    label: labelSchema,
    width: z.number().int().nullish(),
    height: z.number().int().nullish(),
    images: z.array(annotationSchema).default([]),
  })
  .passthrough();

export const sequenceSchema = z
  .object({
    '@id': z.string().nullish(),
    '@type': z.string(),
    canvases: z.array(canvasSchema).default([]),
  })
  .passthrough();

export const manifestSchema = z
  .object({
    '@id': z.string(),
    '@type': z.literal('sc:Manifest'),
    label: labelSchema,
    metadata: z.array(z.record(z.unknown())).nullish(),
    sequences: z.array(sequenceSchema).default([]),
  })
  .passthrough();

const collectionEntrySchema = z.record(z.unknown());

export const collectionSchema = z
  .object({
    '@id': z.string(),
    '@type': z.literal('sc:Collection'),
    label: labelSchema,
    manifests: z.array(collectionEntrySchema).default([]),
    collections: z.array(collectionEntrySchema).default([]),
  })
  .passthrough();

export type ImageService = z.infer<typeof imageServiceSchema>;
export type ImageResource = z.infer<typeof imageResourceSchema>;
export type Annotation = z.infer<typeof annotationSchema>;
export type Canvas = z.infer<typeof canvasSchema>;
export type Sequence = z.infer<typeof sequenceSchema>;
export type Manifest = z.infer<typeof manifestSchema>;
export type Collection = z.infer<typeof collectionSchema>;

export const MANIFEST_TYPE = 'sc:Manifest';
export const COLLECTION_TYPE = 'sc:Collection';

export function firstService(resource: ImageResource): ImageService | undefined {
  const { service } = resource;
  if (!service) return undefined;
  return Array.isArray(service) ? service[0] : service;
}

/** The first image service of the canvas's first image annotation. */
export function primaryImageService(canvas: Canvas): ImageService | undefined {
  const [first] = canvas.images;
  return first ? firstService(first.resource) : undefined;
}

/** All canvases of all sequences, in reading order. */
export function manifestCanvases(manifest: Manifest): Canvas[] {
  return manifest.sequences.flatMap((sequence) => sequence.canvases);
}

function entryIds(entries: readonly Record<string, unknown>[]): string[] {
  return entries.flatMap((entry) => {
    const id = entry['@id'];
    return typeof id === 'string' ? [id] : [];
  });
}

export function manifestIds(collection: Collection): string[] {
  return entryIds(collection.manifests);
}

export function subCollectionIds(collection: Collection): string[] {
  return entryIds(collection.collections);
}

export function labelText(label: unknown): string | undefined {
  if (typeof label === 'string') return label;
  if (Array.isArray(label)) {
    for (const entry of label) {
      const text = labelText(entry);
      if (text !== undefined) return text;
    }
    return undefined;
  }
  if (typeof label === 'object' && label !== null && '@value' in label) {
    const value = label['@value'];
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}
