import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import * as path from 'node:path';
import type { z } from 'zod';
import { ManifestValidationError, TraversalError, type ValidationIssue } from '@scriptorium/core';
import {
  describeError,
  fetchHttpGet,
  isRemoteReference,
  isSuccessStatus,
  type HttpGetFn,
  type HttpResponse,
} from './http.js';
import { collectionSchema, manifestSchema, type Collection, type Manifest } from './models.js';

export const DEFAULT_LOAD_TIMEOUT_MS = 10_000;

export interface LoadJsonOptions {
  readonly timeoutMs?: number;
  readonly httpGet?: HttpGetFn;
}

export function expandHome(filePath: string): string {
  if (filePath === '~') return homedir();
  if (filePath.startsWith('~/')) return path.join(homedir(), filePath.slice(2));
  return filePath;
}

/** Loads a IIIF document from an http(s) URL or a local path. */
export async function loadJson(reference: string, options: LoadJsonOptions = {}): Promise<unknown> {
  let text: string;

  if (isRemoteReference(reference)) {
    const httpGet = options.httpGet ?? fetchHttpGet;
    let res: HttpResponse;
    try {
      res = await httpGet(reference, { timeoutMs: options.timeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS });
    } catch (error) {
      throw new TraversalError(reference, `request failed: ${describeError(error)}`, error);
    }
    if (!isSuccessStatus(res.status)) {
      throw new TraversalError(reference, `HTTP ${res.status}`);
    }
    text = new TextDecoder().decode(res.body);
  } else {
    try {
      text = await readFile(expandHome(reference), 'utf8');
    } catch (error) {
      throw new TraversalError(reference, `cannot read file: ${describeError(error)}`, error);
    }
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new TraversalError(reference, `invalid JSON: ${describeError(error)}`, error);
  }
}

export function documentType(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null || !('@type' in data)) return undefined;
  const type = data['@type'];
  return typeof type === 'string' ? type : undefined;
}

/** `sequences[0].canvases[2].@id` */
export function formatIssuePath(segments: readonly (string | number)[]): string {
  return segments.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc.length === 0 ? segment : `${acc}.${segment}`;
  }, '');
}

function parseWith<T extends z.ZodTypeAny>(schema: T, reference: string, data: unknown): z.output<T> {
  const result = schema.safeParse(data);
  if (result.success) return result.data;

  const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
    path: formatIssuePath(issue.path) || '$',
    message: issue.message,
  }));
  throw new ManifestValidationError(reference, issues);
}

export function parseManifest(reference: string, data: unknown): Manifest {
  return parseWith(manifestSchema, reference, data);
}

export function parseCollection(reference: string, data: unknown): Collection {
  return parseWith(collectionSchema, reference, data);
}

export async function loadManifest(reference: string, options?: LoadJsonOptions): Promise<Manifest> {
  return parseManifest(reference, await loadJson(reference, options));
}

export async function loadCollection(reference: string, options?: LoadJsonOptions): Promise<Collection> {
  return parseCollection(reference, await loadJson(reference, options));
}
