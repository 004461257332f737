import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface CommandOutput {
  readonly stdout: string;
  readonly stderr: string;
}

export interface CommandOptions {
  /** 0 or absent: no limit */
  readonly timeoutMs?: number;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandOutput>;

export type CommandFailure = 'not-found' | 'timeout' | 'exit';

function describeFailure(failure: CommandFailure, exitCode?: number): string {
  switch (failure) {
    case 'not-found':
      return 'command not found';
    case 'timeout':
      return 'timed out';
    case 'exit':
      return exitCode === undefined ? 'failed' : `exited with code ${exitCode}`;
  }
}

export class CommandError extends Error {
  readonly command: string;
  readonly failure: CommandFailure;
  readonly exitCode?: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    command: string,
    failure: CommandFailure,
    details: { exitCode?: number; stdout?: string; stderr?: string; cause?: unknown } = {},
  ) {
    super(`${command}: ${describeFailure(failure, details.exitCode)}`);
    this.name = 'CommandError';
    this.command = command;
    this.failure = failure;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
    this.cause = details.cause;
  }

  /** stderr, or stdout when the tool reported nothing on stderr */
  get output(): string {
    return this.stderr.trim() || this.stdout.trim();
  }
}

function stringField(error: object, key: 'stdout' | 'stderr'): string | undefined {
  if (!(key in error)) return undefined;
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

export function toCommandError(command: string, error: unknown): CommandError {
  if (typeof error !== 'object' || error === null) {
    return new CommandError(command, 'exit', { cause: error });
  }

  const code = 'code' in error ? error.code : undefined;
  const details = {
    stdout: stringField(error, 'stdout'),
    stderr: stringField(error, 'stderr'),
    cause: error,
  };

  if (code === 'ENOENT') return new CommandError(command, 'not-found', details);
  if ('killed' in error && error.killed === true) return new CommandError(command, 'timeout', details);
  return new CommandError(command, 'exit', {
    ...details,
    exitCode: typeof code === 'number' ? code : undefined,
  });
}

export const execCommand: CommandRunner = async (command, args, options = {}) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      encoding: 'utf8',
      timeout: options.timeoutMs ?? 0,
      maxBuffer: MAX_OUTPUT_BYTES,
    });
    return { stdout, stderr };
  } catch (error) {
    throw toCommandError(command, error);
  }
};
