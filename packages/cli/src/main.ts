import { parseArgs } from 'node:util';
import {
  ConfigurationError,
  manifestOutputPath,
  readWorkItemList,
  selectWorkItem,
  WorkItemListError,
  type Provenance,
  type WorkItem,
} from '@scriptorium/core';
import { prepareCommand, type PrepareSource } from './commands/prepare.js';
import { processCommand, runCommand, type WorkerFlags } from './commands/process.js';
import { sampleImageUrlCommand } from './commands/sample-image-url.js';
import { validateCommand } from './commands/validate.js';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, processOutput, type CliOutput, type ExitCode } from './output.js';
import { createRuntime, type Runtime, type RuntimeOptions } from './runtime.js';
import { loadSettings, type ScriptoriumSettings } from './settings.js';

export const USAGE = `Usage: scriptorium <command> [options]

Commands:
  prepare <collection|manifest> --manifest-list <file> --output-dir <dir>
  prepare --from-list <file> --manifest-list <file> --output-dir <dir>
  process <manifest> --out <file>
  process --work-list <file> [--task-index <n>]
  run <work-list> [--output-dir <dir>]
  validate <collection|manifest> [--skip-manifests]
  sample-image-url <collection|manifest>

Options:
  --engine <kraken|tesseract|google-vision>  --model <ref>  --cache-dir <dir>
  --max-pages <n>  --no-resume  --record-failures
  --region <r>  --size <s>  --rotation <r>  --quality <q>  --format <f>
  --log-level <debug|info|warn|error>  --log-format <text|json>  --config <file>
  --source-metadata-id <id>  --ark <ark>`;

const OPTIONS = {
  engine: { type: 'string' },
  model: { type: 'string' },
  'cache-dir': { type: 'string' },
  'max-pages': { type: 'string' },
  'no-resume': { type: 'boolean' },
  'record-failures': { type: 'boolean' },
  region: { type: 'string' },
  size: { type: 'string' },
  rotation: { type: 'string' },
  quality: { type: 'string' },
  format: { type: 'string' },
  'log-level': { type: 'string' },
  'log-format': { type: 'string' },
  config: { type: 'string' },
  'source-metadata-id': { type: 'string' },
  ark: { type: 'string' },
  out: { type: 'string' },
  'work-list': { type: 'string' },
  'task-index': { type: 'string' },
  'manifest-list': { type: 'string' },
  'output-dir': { type: 'string' },
  'from-list': { type: 'string' },
  'skip-manifests': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

type ParsedArgs = ReturnType<typeof parseCommandLine>;
type Values = ParsedArgs['values'];

const COMMANDS = ['prepare', 'process', 'run', 'validate', 'sample-image-url'] as const;

type Command = (typeof COMMANDS)[number];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface MainOptions extends RuntimeOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly output?: CliOutput;
  readonly runtimeFactory?: (settings: ScriptoriumSettings, options: RuntimeOptions) => Runtime;
}

function parseCommandLine(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

export function parseCount(flag: string, value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new UsageError(`--${flag} must be a non-negative integer, got "${value}"`);
  }
  return Number(value.trim());
}

function required(values: Values, flag: 'manifest-list' | 'output-dir'): string {
  const value = values[flag];
  if (!value) throw new UsageError(`--${flag} is required`);
  return value;
}

function single(positionals: readonly string[], what: string): string {
  if (positionals.length !== 1) {
    throw new UsageError(`expected exactly one ${what}, got ${positionals.length}`);
  }
  return positionals[0];
}

function workerFlags(values: Values): WorkerFlags {
  const provenance: Provenance = {
    sourceMetadataId: values['source-metadata-id'],
    ark: values.ark,
  };
  return {
    maxPages: values['max-pages'] === undefined ? undefined : parseCount('max-pages', values['max-pages']),
    resume: !values['no-resume'],
    recordFailures: values['record-failures'] ?? false,
    provenance: provenance.sourceMetadataId !== undefined || provenance.ark !== undefined ? provenance : undefined,
  };
}

/** `--task-index` wins over `SLURM_ARRAY_TASK_ID`; both are 1-based. */
export function resolveTaskIndex(flag: string | undefined, env: NodeJS.ProcessEnv): number {
  const raw = flag ?? env.SLURM_ARRAY_TASK_ID;
  if (raw === undefined || raw.trim() === '') {
    throw new UsageError('--task-index is required when SLURM_ARRAY_TASK_ID is not set');
  }
  return parseCount('task-index', raw);
}

async function processTarget(
  positionals: readonly string[],
  values: Values,
  env: NodeJS.ProcessEnv,
): Promise<WorkItem> {
  const workList = values['work-list'];
  if (workList !== undefined) {
    if (positionals.length > 0) {
      throw new UsageError('give either a manifest or --work-list, not both');
    }
    const items = await readWorkItemList(workList, { outputDir: values['output-dir'] });
    return selectWorkItem(items, resolveTaskIndex(values['task-index'], env));
  }

  const manifestReference = single(positionals, 'manifest');
  const outputDir = values['output-dir'];
  const out = values.out ?? (outputDir ? manifestOutputPath(manifestReference, outputDir) : undefined);
  if (out === undefined) {
    throw new UsageError('--out or --output-dir is required');
  }
  return { manifestReference, outputLocation: out };
}

function prepareSource(positionals: readonly string[], values: Values): PrepareSource {
  const listPath = values['from-list'];
  if (listPath !== undefined) {
    if (positionals.length > 0) {
      throw new UsageError('give either a reference or --from-list, not both');
    }
    return { kind: 'list', listPath };
  }
  return { kind: 'reference', reference: single(positionals, 'collection or manifest reference') };
}

async function dispatch(
  command: Command,
  positionals: readonly string[],
  values: Values,
  runtime: Runtime,
  env: NodeJS.ProcessEnv,
  output: CliOutput,
): Promise<ExitCode> {
  switch (command) {
    case 'prepare':
      return prepareCommand(
        runtime,
        {
          source: prepareSource(positionals, values),
          manifestList: required(values, 'manifest-list'),
          outputDir: required(values, 'output-dir'),
        },
        output,
      );
    case 'process':
      return processCommand(runtime, await processTarget(positionals, values, env), workerFlags(values), output);
    case 'run': {
      const items = await readWorkItemList(single(positionals, 'work list'), { outputDir: values['output-dir'] });
      return runCommand(runtime, items, workerFlags(values), output);
    }
    case 'validate':
      return validateCommand(
        runtime,
        { reference: single(positionals, 'reference'), skipManifests: values['skip-manifests'] ?? false },
        output,
      );
    case 'sample-image-url':
      return sampleImageUrlCommand(runtime, single(positionals, 'reference'), output);
  }
}

function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof UsageError || error instanceof ConfigurationError || error instanceof WorkItemListError) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}

/**
 * 0: every page attempted (page failures included); 1: a manifest failed;
 * 2: bad usage or configuration.
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<ExitCode> {
  const env = options.env ?? process.env;
  const output = options.output ?? processOutput;
  const runtimeFactory = options.runtimeFactory ?? createRuntime;

  try {
    const { values, positionals } = parseCommandLine(argv);
    const [command, ...rest] = positionals;

    if (values.help) {
      output.out(USAGE);
      return EXIT_OK;
    }
    if (!isCommand(command)) {
      throw new UsageError(command === undefined ? 'missing command' : `unknown command: ${command}`);
    }

    const settings = await loadSettings({
      configPath: values.config,
      env,
      overrides: {
        engine: values.engine,
        model: values.model,
        cacheDir: values['cache-dir'],
        logLevel: values['log-level'],
        logFormat: values['log-format'],
        imageParameters: {
          region: values.region,
          size: values.size,
          rotation: values.rotation,
          quality: values.quality,
          format: values.format,
        },
      },
    });
    const runtime = runtimeFactory(settings, options);

    return await dispatch(command, rest, values, runtime, env, output);
  } catch (error) {
    if (error instanceof UsageError) {
      output.err(`${error.message}\n\n${USAGE}`);
    } else {
      output.err(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
    }
    return exitCodeFor(error);
  }
}
