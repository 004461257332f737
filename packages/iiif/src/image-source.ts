import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
  imageRequestUrl,
  isMissingFileError,
  PageFetchError,
  sha1Hex,
  silentLogger,
  type FetchedImage,
  type ImageRequest,
  type ImageSourcePort,
  type Logger,
} from '@scriptorium/core';
import {
  describeError,
  fetchHttpGet,
  isSuccessStatus,
  type HttpGetFn,
  type HttpResponse,
} from './http.js';

export const DEFAULT_IMAGE_TIMEOUT_MS = 30_000;

export interface HttpImageSourceOptions {
  /** Content-addressed image cache shared by every worker process */
  readonly cacheDir?: string;
  readonly timeoutMs?: number;
  readonly httpGet?: HttpGetFn;
  readonly logger?: Logger;
}

export function imageCachePath(cacheDir: string, request: ImageRequest): string {
  return path.join(cacheDir, `${sha1Hex(imageRequestUrl(request))}.${request.format}`);
}

/**
 * Fetches Image API renditions. Cache entries are written once, by rename,
 * and never invalidated.
 */
export class HttpImageSource implements ImageSourcePort {
  private readonly httpGet: HttpGetFn;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(private readonly options: HttpImageSourceOptions = {}) {
    this.httpGet = options.httpGet ?? fetchHttpGet;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_IMAGE_TIMEOUT_MS;
    this.log = options.logger ?? silentLogger;
  }

  async fetch(request: ImageRequest): Promise<FetchedImage> {
    const url = imageRequestUrl(request);
    const { cacheDir } = this.options;

    if (cacheDir === undefined) {
      return { url, bytes: await this.download(url) };
    }

    const cachePath = imageCachePath(cacheDir, request);
    const cached = await this.readCached(cachePath);
    if (cached) {
      this.log.debug(`Cache hit: ${url}`);
      return { url, bytes: cached, path: cachePath };
    }

    const bytes = await this.download(url);
    const stored = await this.store(cachePath, bytes);
    return stored ? { url, bytes, path: cachePath } : { url, bytes };
  }

  private async download(url: string): Promise<Uint8Array> {
    let res: HttpResponse;
    try {
      res = await this.httpGet(url, { timeoutMs: this.timeoutMs });
    } catch (error) {
      throw new PageFetchError(url, `request failed: ${describeError(error)}`, { cause: error });
    }

    if (!isSuccessStatus(res.status)) {
      throw new PageFetchError(url, `HTTP ${res.status}`, { status: res.status });
    }
    if (res.body.length === 0) {
      throw new PageFetchError(url, 'empty response body', { status: res.status });
    }
    return res.body;
  }

  /** Unreadable entries count as misses. */
  private async readCached(cachePath: string): Promise<Uint8Array | undefined> {
    try {
      return new Uint8Array(await readFile(cachePath));
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.log.warn(`Image cache read failed: ${cachePath}`, { error: describeError(error) });
      }
      return undefined;
    }
  }

  /** Resolves false when the entry could not be written. */
  private async store(cachePath: string, bytes: Uint8Array): Promise<boolean> {
    const temp = `${cachePath}.${randomUUID()}.tmp`;
    try {
      await mkdir(path.dirname(cachePath), { recursive: true });
      await writeFile(temp, bytes);
      await rename(temp, cachePath);
      return true;
    } catch (error) {
      this.log.warn(`Image cache write failed: ${cachePath}`, { error: describeError(error) });
      await rm(temp, { force: true }).catch((cleanupError: unknown) => {
        this.log.debug(`Could not remove ${temp}`, { error: describeError(cleanupError) });
      });
      return false;
    }
  }
}
