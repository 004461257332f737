export { main, parseCount, resolveTaskIndex, USAGE, UsageError } from './main.js';
export type { MainOptions } from './main.js';
export {
  DEFAULT_MODELS,
  DEFAULT_SETTINGS,
  ENGINE_IDS,
  loadSettings,
  modelFor,
  readSettingsFile,
} from './settings.js';
export type {
  EngineId,
  GoogleVisionSettings,
  KrakenSettings,
  LoadSettingsOptions,
  ScriptoriumSettings,
  SettingsOverrides,
  TesseractSettings,
} from './settings.js';
export { createEngine } from './engines.js';
export type { EngineBundle, EngineFactoryOptions } from './engines.js';
export { createRuntime } from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
export { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, processOutput } from './output.js';
export type { CliOutput, ExitCode } from './output.js';
export { parseReferenceList, prepareCommand } from './commands/prepare.js';
export type { PrepareFlags, PrepareSource } from './commands/prepare.js';
export { processCommand, processWorkItems, runCommand } from './commands/process.js';
export type { ManifestOutcome, WorkerFlags } from './commands/process.js';
export { validateCommand } from './commands/validate.js';
export type { ValidateFlags } from './commands/validate.js';
export { sampleImageUrlCommand } from './commands/sample-image-url.js';
