import {
  createLogger,
  JsonlOutputWriter,
  type ImageSourcePort,
  type Logger,
  type Namespace,
  type OutputWriterPort,
} from '@scriptorium/core';
import { HttpImageSource, IiifTraverser, type HttpGetFn } from '@scriptorium/iiif';
import { createEngine, type EngineBundle, type EngineFactoryOptions } from './engines.js';
import type { ScriptoriumSettings } from './settings.js';

/** Everything a command needs, built from one set of settings. */
export interface Runtime {
  readonly settings: ScriptoriumSettings;
  readonly traverser: IiifTraverser;
  readonly imageSource: ImageSourcePort;
  readonly writer: OutputWriterPort;
  logger(namespace: Namespace): Logger;
  /** Engines are built on demand so that commands without one never need its settings. */
  createEngine(): EngineBundle;
}

export interface RuntimeOptions extends Omit<EngineFactoryOptions, 'logger'> {
  readonly httpGet?: HttpGetFn;
  readonly engineFactory?: (settings: ScriptoriumSettings, options: EngineFactoryOptions) => EngineBundle;
}

export function createRuntime(settings: ScriptoriumSettings, options: RuntimeOptions = {}): Runtime {
  const logger = (namespace: Namespace): Logger =>
    createLogger(namespace, { level: settings.logLevel, format: settings.logFormat });
  const engineFactory = options.engineFactory ?? createEngine;

  return {
    settings,
    traverser: new IiifTraverser({
      imageParameters: settings.imageParameters,
      timeoutMs: settings.manifestTimeoutMs,
      httpGet: options.httpGet,
      logger: logger('Traverse'),
    }),
    imageSource: new HttpImageSource({
      cacheDir: settings.cacheDir,
      timeoutMs: settings.imageTimeoutMs,
      httpGet: options.httpGet,
      logger: logger('Image'),
    }),
    writer: new JsonlOutputWriter(logger('Output')),
    logger,
    createEngine: () =>
      engineFactory(settings, {
        logger: logger('Engine'),
        run: options.run,
        httpPost: options.httpPost,
      }),
  };
}
