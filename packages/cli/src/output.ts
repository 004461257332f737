export const EXIT_OK = 0;
/** A manifest failed; the scheduler may resubmit it */
export const EXIT_FAILURE = 1;
/** Bad usage or configuration; resubmitting will not help */
export const EXIT_USAGE = 2;

export type ExitCode = typeof EXIT_OK | typeof EXIT_FAILURE | typeof EXIT_USAGE;

/** Results go to `out`, diagnostics to `err`; logging has its own sinks. */
export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const processOutput: CliOutput = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
};
