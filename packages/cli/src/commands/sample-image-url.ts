import { EXIT_OK, EXIT_USAGE, type CliOutput, type ExitCode } from '../output.js';
import type { Runtime } from '../runtime.js';

/** Prints the first image request URL, for a quick look before a long run. */
export async function sampleImageUrlCommand(
  runtime: Runtime,
  reference: string,
  output: CliOutput,
): Promise<ExitCode> {
  const url = await runtime.traverser.firstImageUrl(reference);
  if (url === undefined) {
    output.err(`No image found: ${reference}`);
    return EXIT_USAGE;
  }
  output.out(url);
  return EXIT_OK;
}
