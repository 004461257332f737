import {
  ConfigurationError,
  silentLogger,
  type Logger,
  type ModelResolverPort,
  type ResolvedModel,
} from '@scriptorium/core';
import { CommandError, execCommand, type CommandRunner } from './command.js';
import { KRAKEN_ENGINE_ID } from './kraken-engine.js';

const MODEL_FILES = /\(model files:\s*([^)]+)\)/;
const VERSION = /version\s+(\S+)/i;

export interface KrakenModelResolverOptions {
  readonly command?: string;
  /** Install DOI references with `kraken get` */
  readonly autoInstall?: boolean;
  readonly timeoutMs?: number;
  readonly run?: CommandRunner;
  readonly logger?: Logger;
}

export function looksLikeDoi(reference: string): boolean {
  return reference.startsWith('10.') || reference.includes('zenodo.');
}

/** `kraken get` prints e.g. `(model files: catmus-print-fondue-large.mlmodel)` */
export function parseModelFiles(output: string): string | undefined {
  const match = MODEL_FILES.exec(output);
  if (!match) return undefined;
  const [first] = match[1].trim().split(/\s+/);
  const file = first.replace(/,+$/, '');
  return file ? file : undefined;
}

export function parseKrakenVersion(output: string): string | undefined {
  return VERSION.exec(output)?.[1];
}

const NOT_FOUND = 'Kraken CLI not found. Install kraken and make sure it is on PATH.';

export class KrakenModelResolver implements ModelResolverPort {
  private readonly command: string;
  private readonly run: CommandRunner;
  private readonly log: Logger;

  constructor(private readonly options: KrakenModelResolverOptions = {}) {
    this.command = options.command ?? 'kraken';
    this.run = options.run ?? execCommand;
    this.log = options.logger ?? silentLogger;
  }

  async resolve(reference: string): Promise<ResolvedModel> {
    const engineVersion = await this.version();

    let resolved = reference;
    if (looksLikeDoi(reference) && this.options.autoInstall !== false) {
      resolved = await this.install(reference);
    }

    this.log.info(`Using model ${resolved}`, { reference, engineVersion });
    return { engine: KRAKEN_ENGINE_ID, reference, resolved, engineVersion };
  }

  private async version(): Promise<string | undefined> {
    try {
      const { stdout, stderr } = await this.run(this.command, ['--version'], {
        timeoutMs: this.options.timeoutMs,
      });
      return parseKrakenVersion(`${stdout}\n${stderr}`);
    } catch (error) {
      throw this.toConfigurationError('kraken --version', error);
    }
  }

  private async install(reference: string): Promise<string> {
    let output: string;
    try {
      const { stdout, stderr } = await this.run(this.command, ['get', reference], {
        timeoutMs: this.options.timeoutMs,
      });
      output = `${stdout}\n${stderr}`;
    } catch (error) {
      throw this.toConfigurationError('kraken get', error);
    }

    const file = parseModelFiles(output);
    if (file === undefined) {
      this.log.warn(`Could not read the installed model file name; using ${reference}`);
      return reference;
    }
    return file;
  }

  private toConfigurationError(step: string, error: unknown): ConfigurationError {
    if (error instanceof CommandError) {
      if (error.failure === 'not-found') return new ConfigurationError(NOT_FOUND, error);
      return new ConfigurationError(`${step} failed: ${error.output || error.message}`, error);
    }
    return new ConfigurationError(`${step} failed`, error);
  }
}
