import { describe, expect, it } from 'vitest';
import { CommandError, toCommandError } from '../src/command.js';

describe('toCommandError', () => {
  it('recognizes a missing executable', () => {
    const error = toCommandError('kraken', Object.assign(new Error('spawn kraken ENOENT'), { code: 'ENOENT' }));
    expect(error.failure).toBe('not-found');
  });

  it('recognizes a process killed by the timeout', () => {
    const raw = Object.assign(new Error('Command failed'), {
      killed: true,
      signal: 'SIGTERM',
      code: null,
      stdout: '',
      stderr: 'segmenting...',
    });
    const error = toCommandError('kraken', raw);
    expect(error.failure).toBe('timeout');
    expect(error.stderr).toBe('segmenting...');
  });

  it('keeps the exit code and output of a failed run', () => {
    const raw = Object.assign(new Error('Command failed'), {
      killed: false,
      code: 1,
      stdout: 'partial',
      stderr: 'Error: model not found\n',
    });

    const error = toCommandError('kraken', raw);

    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({ failure: 'exit', exitCode: 1, stdout: 'partial' });
    expect(error.output).toBe('Error: model not found');
    expect(error.message).toBe('kraken: exited with code 1');
  });

  it('falls back to stdout when stderr is empty', () => {
    const error = new CommandError('kraken', 'exit', { stdout: ' only stdout ', stderr: '' });
    expect(error.output).toBe('only stdout');
  });

  it('wraps non-object throwables', () => {
    expect(toCommandError('kraken', 'boom')).toMatchObject({ failure: 'exit', cause: 'boom' });
  });
});
