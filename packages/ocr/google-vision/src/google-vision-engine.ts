import { z } from 'zod';
import {
  EngineError,
  silentLogger,
  type FetchedImage,
  type Logger,
  type RecognitionContext,
  type RecognitionEnginePort,
  type RecognitionResult,
} from '@scriptorium/core';

export const GOOGLE_VISION_ENGINE_ID = 'google-vision';

export const VISION_API_URL = 'https://vision.googleapis.com/v1/images:annotate';

export const DEFAULT_VISION_TIMEOUT_MS = 120_000;

export interface HttpPostOptions {
  body: string;
  headers: Record<string, string>;
  /** Aborts the request once elapsed */
  timeoutMs?: number;
}

export type HttpPostFn = (url: string, options: HttpPostOptions) => Promise<{ status: number; body: string }>;

export const fetchHttpPost: HttpPostFn = async (url, { body, headers, timeoutMs }) => {
  const res = await fetch(url, {
    method: 'POST',
    body,
    headers,
    signal: timeoutMs !== undefined ? AbortSignal.timeout(timeoutMs) : undefined,
  });
  return { status: res.status, body: await res.text() };
};

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export interface GoogleVisionEngineConfig {
  readonly apiKey: string;
  readonly languageHints?: readonly string[];
  /** Per request, defaults to DEFAULT_VISION_TIMEOUT_MS */
  readonly timeoutMs?: number;
  readonly httpPost?: HttpPostFn;
  readonly logger?: Logger;
  readonly clock?: () => number;
}

const symbolSchema = z.object({ text: z.string().optional() }).passthrough();
const wordSchema = z.object({ symbols: z.array(symbolSchema).optional() }).passthrough();
const paragraphSchema = z.object({ words: z.array(wordSchema).optional() }).passthrough();
const blockSchema = z
  .object({
    confidence: z.number().optional(),
    paragraphs: z.array(paragraphSchema).optional(),
  })
  .passthrough();

const visionResponseSchema = z
  .object({
    responses: z
      .array(
        z
          .object({
            fullTextAnnotation: z
              .object({
                text: z.string().optional(),
                pages: z
                  .array(
                    z
                      .object({
                        confidence: z.number().optional(),
                        blocks: z.array(blockSchema).optional(),
                      })
                      .passthrough(),
                  )
                  .optional(),
              })
              .passthrough()
              .optional(),
            error: z.object({ message: z.string().optional(), code: z.number().optional() }).optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

type VisionResponse = z.infer<typeof visionResponseSchema>;
type VisionBlock = z.infer<typeof blockSchema>;

function uint8ArrayToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/** DOCUMENT_TEXT_DETECTION through the Cloud Vision REST API. */
export class GoogleVisionEngine implements RecognitionEnginePort {
  readonly id = GOOGLE_VISION_ENGINE_ID;

  private readonly httpPost: HttpPostFn;
  private readonly log: Logger;
  private readonly clock: () => number;

  constructor(private readonly config: GoogleVisionEngineConfig) {
    this.httpPost = config.httpPost ?? fetchHttpPost;
    this.log = config.logger ?? silentLogger;
    this.clock = config.clock ?? (() => performance.now());
  }

  async recognize(image: FetchedImage, context: RecognitionContext): Promise<RecognitionResult> {
    const { configuration } = context;
    const started = this.clock();
    const response = await this.callApi(image, context);
    const elapsedMs = this.clock() - started;

    const text = this.mapResponse(response);
    this.log.debug(`Recognized ${context.canvasId}`, { characters: text.length });

    return {
      text,
      engine: GOOGLE_VISION_ENGINE_ID,
      engineVersion: configuration.engineVersion,
      modelResolved: configuration.model.resolved,
      elapsedMs,
      warnings: text.length === 0 ? ['no text detected'] : undefined,
    };
  }

  /** A `languageHints` engine option (comma separated) overrides the configured hints. */
  private languageHints(context: RecognitionContext): readonly string[] | undefined {
    const option = context.configuration.options?.languageHints;
    if (typeof option === 'string') {
      return option
        .split(',')
        .map((hint) => hint.trim())
        .filter((hint) => hint.length > 0);
    }
    return this.config.languageHints;
  }

  private async callApi(image: FetchedImage, context: RecognitionContext): Promise<VisionResponse> {
    const languageHints = this.languageHints(context);

    const body = {
      requests: [
        {
          image: { content: uint8ArrayToBase64(image.bytes) },
          features: [{ type: 'DOCUMENT_TEXT_DETECTION', model: context.configuration.model.resolved }],
          ...(languageHints?.length && {
            imageContext: { languageHints },
          }),
        },
      ],
    };

    const timeoutMs = this.config.timeoutMs ?? DEFAULT_VISION_TIMEOUT_MS;
    let res: { status: number; body: string };
    try {
      res = await this.httpPost(`${VISION_API_URL}?key=${this.config.apiKey}`, {
        body: JSON.stringify(body),
        headers: { 'Content-Type': 'application/json' },
        timeoutMs,
      });
    } catch (error) {
      if (isAbort(error)) {
        throw new EngineError(GOOGLE_VISION_ENGINE_ID, `Vision API request timed out after ${timeoutMs}ms`, {
          retryable: true,
          cause: error,
        });
      }
      throw new EngineError(
        GOOGLE_VISION_ENGINE_ID,
        `Vision API request failed: ${error instanceof Error ? error.message : String(error)}`,
        { retryable: true, cause: error },
      );
    }

    if (res.status === 401 || res.status === 403) {
      throw new EngineError(
        GOOGLE_VISION_ENGINE_ID,
        `Vision API authentication failed (${res.status}): ${res.body}`,
        { retryable: false },
      );
    }

    if (res.status < 200 || res.status >= 300) {
      throw new EngineError(GOOGLE_VISION_ENGINE_ID, `Vision API error (${res.status}): ${res.body}`, {
        retryable: isRetryableStatus(res.status),
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(res.body);
    } catch (error) {
      throw new EngineError(GOOGLE_VISION_ENGINE_ID, 'Vision API returned invalid JSON', {
        retryable: false,
        cause: error,
      });
    }
    const parsed = visionResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EngineError(GOOGLE_VISION_ENGINE_ID, 'Vision API returned an unexpected response', {
        retryable: false,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private mapResponse(response: VisionResponse): string {
    const first = response.responses?.[0];
    if (first?.error) {
      throw new EngineError(
        GOOGLE_VISION_ENGINE_ID,
        `Vision API error: ${first.error.message ?? 'Unknown error'}`,
        { retryable: false },
      );
    }

    const annotation = first?.fullTextAnnotation;
    if (!annotation) return '';
    if (annotation.text !== undefined) return annotation.text.replace(/\n+$/, '');

    return (annotation.pages ?? [])
      .flatMap((page) => page.blocks ?? [])
      .map((block) => this.extractBlockText(block))
      .join('\n');
  }

  private extractBlockText(block: VisionBlock): string {
    return (block.paragraphs ?? [])
      .flatMap((p) => p.words ?? [])
      .map((w) => (w.symbols ?? []).map((s) => s.text ?? '').join(''))
      .join(' ');
  }
}
