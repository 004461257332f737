import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  ConfigurationError,
  DEFAULT_IMAGE_PARAMETERS,
  isMissingFileError,
  parseLogLevel,
  type EngineOptionValue,
  type ImageRequestParameters,
  type LogFormat,
  type LogLevel,
} from '@scriptorium/core';

export const ENGINE_IDS = ['kraken', 'tesseract', 'google-vision'] as const;

export type EngineId = (typeof ENGINE_IDS)[number];

export const DEFAULT_MODELS: Record<EngineId, string> = {
  kraken: '10.5281/zenodo.10592716',
  tesseract: 'eng',
  'google-vision': 'builtin/stable',
};

export interface GoogleVisionSettings {
  apiKey: string;
  languageHints: string[];
}

export interface TesseractSettings {
  langPath?: string;
  cachePath?: string;
}

export interface KrakenSettings {
  command: string;
  /** Run `kraken get` for DOI model references */
  autoInstall: boolean;
}

export interface ScriptoriumSettings {
  engine: EngineId;
  /** Falls back to the engine's entry in DEFAULT_MODELS */
  model?: string;
  cacheDir: string;
  imageParameters: ImageRequestParameters;
  manifestTimeoutMs: number;
  imageTimeoutMs: number;
  engineTimeoutMs: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
  engineOptions: Record<string, EngineOptionValue>;
  googleVision: GoogleVisionSettings;
  tesseract: TesseractSettings;
  kraken: KrakenSettings;
}

export const DEFAULT_SETTINGS: ScriptoriumSettings = {
  engine: 'kraken',
  cacheDir: '.scriptorium-cache',
  imageParameters: { ...DEFAULT_IMAGE_PARAMETERS },
  manifestTimeoutMs: 10_000,
  imageTimeoutMs: 30_000,
  engineTimeoutMs: 2 * 60 * 60 * 1000,
  logLevel: 'info',
  logFormat: 'text',
  engineOptions: {},
  googleVision: {
    apiKey: '',
    languageHints: [],
  },
  tesseract: {},
  kraken: {
    command: 'kraken',
    autoInstall: true,
  },
};

const imageParametersSchema = z.object({
  region: z.string().min(1),
  size: z.string().min(1),
  rotation: z.string().min(1),
  quality: z.string().min(1),
  format: z.string().min(1),
});

const googleVisionSchema = z.object({
  apiKey: z.string(),
  languageHints: z.array(z.string().min(1)),
});

const tesseractSchema = z.object({
  langPath: z.string().min(1).optional(),
  cachePath: z.string().min(1).optional(),
});

const krakenSchema = z.object({
  command: z.string().min(1),
  autoInstall: z.boolean(),
});

const timeoutSchema = z.number().int().positive();

const settingsSchema = z.object({
  engine: z.enum(ENGINE_IDS),
  model: z.string().min(1).optional(),
  cacheDir: z.string().min(1),
  imageParameters: imageParametersSchema,
  manifestTimeoutMs: timeoutSchema,
  imageTimeoutMs: timeoutSchema,
  engineTimeoutMs: timeoutSchema,
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  logFormat: z.enum(['text', 'json']),
  engineOptions: z.record(z.union([z.string(), z.number(), z.boolean()])),
  googleVision: googleVisionSchema,
  tesseract: tesseractSchema,
  kraken: krakenSchema,
});

const settingsFileSchema = settingsSchema
  .partial()
  .extend({
    imageParameters: imageParametersSchema.partial().optional(),
    googleVision: googleVisionSchema.partial().optional(),
    tesseract: tesseractSchema.optional(),
    kraken: krakenSchema.partial().optional(),
  })
  .strict();

type SettingsFile = z.infer<typeof settingsFileSchema>;

/** Command-line values; anything left undefined keeps the lower layer's value. */
export type SettingsOverrides = {
  engine?: string;
  model?: string;
  cacheDir?: string;
  logLevel?: string;
  logFormat?: string;
  imageParameters?: Partial<ImageRequestParameters>;
};

export interface LoadSettingsOptions {
  /** JSON settings file; `SCRIPTORIUM_CONFIG` when omitted */
  readonly configPath?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: SettingsOverrides;
}

type EnvironmentKey = 'engine' | 'model' | 'cacheDir' | 'logLevel' | 'logFormat';

const ENVIRONMENT: ReadonlyArray<readonly [string, EnvironmentKey]> = [
  ['SCRIPTORIUM_ENGINE', 'engine'],
  ['SCRIPTORIUM_MODEL', 'model'],
  ['SCRIPTORIUM_CACHE_DIR', 'cacheDir'],
  ['SCRIPTORIUM_LOG_LEVEL', 'logLevel'],
  ['SCRIPTORIUM_LOG_FORMAT', 'logFormat'],
];

function compact(values: Readonly<Record<string, unknown>> | undefined): Record<string, unknown> {
  if (!values) return {};
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/** `warning` and mixed case are accepted; anything else is left for validation to reject. */
function normalizeLevel(layer: Record<string, unknown>): Record<string, unknown> {
  const { logLevel } = layer;
  if (typeof logLevel !== 'string') return layer;
  return { ...layer, logLevel: parseLogLevel(logLevel) ?? logLevel };
}

function environmentLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  for (const [name, key] of ENVIRONMENT) {
    const value = env[name]?.trim();
    if (value) layer[key] = value;
  }
  return normalizeLevel(layer);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'settings'}: ${issue.message}`)
    .join('; ');
}

export async function readSettingsFile(configPath: string): Promise<SettingsFile> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigurationError(`Settings file not found: ${configPath}`, error);
    }
    throw new ConfigurationError(`Settings file cannot be read: ${configPath}`, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Settings file is not valid JSON: ${configPath}`, error);
  }

  const parsed = settingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid settings in ${configPath}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Defaults, then the settings file, then the environment, then command-line values. */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<ScriptoriumSettings> {
  const env = options.env ?? {};
  const configPath = options.configPath ?? (env.SCRIPTORIUM_CONFIG?.trim() || undefined);
  const file: SettingsFile = configPath ? await readSettingsFile(configPath) : {};
  const overrides = options.overrides ?? {};
  const apiKey = env.GOOGLE_VISION_API_KEY?.trim();

  const candidate = {
    ...DEFAULT_SETTINGS,
    ...compact(file),
    ...environmentLayer(env),
    ...normalizeLevel(compact({ ...overrides, imageParameters: undefined })),
    imageParameters: {
      ...DEFAULT_SETTINGS.imageParameters,
      ...compact(file.imageParameters),
      ...compact(overrides.imageParameters),
    },
    engineOptions: { ...DEFAULT_SETTINGS.engineOptions, ...file.engineOptions },
    googleVision: {
      ...DEFAULT_SETTINGS.googleVision,
      ...compact(file.googleVision),
      ...(apiKey ? { apiKey } : {}),
    },
    tesseract: { ...DEFAULT_SETTINGS.tesseract, ...compact(file.tesseract) },
    kraken: { ...DEFAULT_SETTINGS.kraken, ...compact(file.kraken) },
  };

  const parsed = settingsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid settings: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function modelFor(settings: Pick<ScriptoriumSettings, 'engine' | 'model'>): string {
  return settings.model ?? DEFAULT_MODELS[settings.engine];
}
