export {
  DEFAULT_KRAKEN_TIMEOUT_MS,
  KRAKEN_ENGINE_ID,
  KrakenEngine,
  NO_OUTPUT_WARNING,
} from './kraken-engine.js';
export type { KrakenEngineOptions } from './kraken-engine.js';
export {
  KrakenModelResolver,
  looksLikeDoi,
  parseKrakenVersion,
  parseModelFiles,
} from './model-resolver.js';
export type { KrakenModelResolverOptions } from './model-resolver.js';
export { CommandError, execCommand, toCommandError } from './command.js';
export type { CommandFailure, CommandOptions, CommandOutput, CommandRunner } from './command.js';
