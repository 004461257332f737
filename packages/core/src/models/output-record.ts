import { z } from 'zod';
import type { PageErrorDetail } from '../exceptions.js';
import type { EngineConfiguration } from './engine-configuration.js';
import { imageRequestUrl, type ImageRequest } from './image-request.js';

export interface Provenance {
  readonly sourceMetadataId?: string;
  readonly ark?: string;
}

/** One completed (or, with `errors`, degraded) page. Never mutated once written. */
export interface OutputRecord {
  readonly workIdentity: string;
  readonly manifestReference: string;
  readonly canvasId: string;
  readonly canvasIndex: number;
  readonly imageRequest: ImageRequest;
  readonly engineConfiguration: EngineConfiguration;
  readonly text: string;
  readonly elapsedMs: number;
  /** ISO 8601, UTC */
  readonly createdAt: string;
  readonly pageLabel?: string;
  readonly warnings?: readonly string[];
  readonly errors?: readonly PageErrorDetail[];
  readonly provenance?: Provenance;
}

const imageParametersSchema = z.object({
  region: z.string(),
  size: z.string(),
  rotation: z.string(),
  quality: z.string(),
  format: z.string(),
});

const imageRequestDescriptorSchema = imageParametersSchema.extend({
  service_id: z.string(),
  url: z.string().optional(),
});

const engineConfigurationSchema = z.object({
  engine: z.string(),
  engine_version: z.string().nullish(),
  model: z.object({
    reference: z.string(),
    resolved: z.string(),
  }),
  image_parameters: imageParametersSchema,
  options: z.record(z.union([z.string(), z.number(), z.boolean()])).nullish(),
});

const pageErrorSchema = z.object({
  kind: z.enum(['fetch', 'engine', 'unexpected']),
  message: z.string(),
  retryable: z.boolean().optional(),
});

export const wireRecordSchema = z.object({
  work_identity: z.string().min(1).nullish(),
  manifest_reference: z.string(),
  canvas_id: z.string(),
  canvas_index: z.number().int().nonnegative(),
  image_request_descriptor: imageRequestDescriptorSchema,
  engine_configuration: engineConfigurationSchema,
  text: z.string(),
  elapsed_ms: z.number().nonnegative(),
  created_at: z.string(),
  page_label: z.string().nullish(),
  warnings: z.array(z.string()).nullish(),
  errors: z.array(pageErrorSchema).nullish(),
  source_metadata_id: z.string().nullish(),
  ark: z.string().nullish(),
});

export type WireRecord = z.infer<typeof wireRecordSchema>;

/** A persisted record whose identity may still need to be re-derived. */
export type PersistedRecord = Omit<OutputRecord, 'workIdentity'> & {
  readonly workIdentity?: string;
};

export function toWireRecord(record: OutputRecord): WireRecord {
  const { engineConfiguration: config, imageRequest, provenance } = record;
  return {
    work_identity: record.workIdentity,
    manifest_reference: record.manifestReference,
    canvas_id: record.canvasId,
    canvas_index: record.canvasIndex,
    image_request_descriptor: {
      service_id: imageRequest.serviceId,
      region: imageRequest.region,
      size: imageRequest.size,
      rotation: imageRequest.rotation,
      quality: imageRequest.quality,
      format: imageRequest.format,
      url: imageRequestUrl(imageRequest),
    },
    engine_configuration: {
      engine: config.engine,
      engine_version: config.engineVersion,
      model: { reference: config.model.reference, resolved: config.model.resolved },
      image_parameters: { ...config.imageParameters },
      options: config.options ? { ...config.options } : undefined,
    },
    text: record.text,
    elapsed_ms: record.elapsedMs,
    created_at: record.createdAt,
    page_label: record.pageLabel,
    warnings: record.warnings ? [...record.warnings] : undefined,
    errors: record.errors ? record.errors.map((e) => ({ ...e })) : undefined,
    source_metadata_id: provenance?.sourceMetadataId,
    ark: provenance?.ark,
  };
}

export function serializeRecord(record: OutputRecord): string {
  return `${JSON.stringify(toWireRecord(record))}\n`;
}

function dropNullish<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

export function fromWireRecord(wire: WireRecord): PersistedRecord {
  const descriptor = wire.image_request_descriptor;
  const config = wire.engine_configuration;
  const provenance: Provenance = {
    sourceMetadataId: dropNullish(wire.source_metadata_id),
    ark: dropNullish(wire.ark),
  };

  return {
    workIdentity: dropNullish(wire.work_identity),
    manifestReference: wire.manifest_reference,
    canvasId: wire.canvas_id,
    canvasIndex: wire.canvas_index,
    imageRequest: {
      serviceId: descriptor.service_id,
      region: descriptor.region,
      size: descriptor.size,
      rotation: descriptor.rotation,
      quality: descriptor.quality,
      format: descriptor.format,
    },
    engineConfiguration: {
      engine: config.engine,
      engineVersion: dropNullish(config.engine_version),
      model: config.model,
      imageParameters: config.image_parameters,
      options: dropNullish(config.options),
    },
    text: wire.text,
    elapsedMs: wire.elapsed_ms,
    createdAt: wire.created_at,
    pageLabel: dropNullish(wire.page_label),
    warnings: dropNullish(wire.warnings),
    errors: dropNullish(wire.errors),
    provenance:
      provenance.sourceMetadataId !== undefined || provenance.ark !== undefined
        ? provenance
        : undefined,
  };
}

export type ParsedLine =
  | { readonly ok: true; readonly record: PersistedRecord }
  | { readonly ok: false; readonly reason: string };

export function parseRecordLine(line: string): ParsedLine {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    return { ok: false, reason: `invalid JSON (${error instanceof Error ? error.message : String(error)})` };
  }

  const result = wireRecordSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? first.path.join('.') : 'record';
    return { ok: false, reason: `invalid record at ${where}: ${first?.message ?? 'unknown'}` };
  }
  return { ok: true, record: fromWireRecord(result.data) };
}
