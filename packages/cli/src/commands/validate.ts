import { EXIT_OK, EXIT_USAGE, type CliOutput, type ExitCode } from '../output.js';
import type { Runtime } from '../runtime.js';

export interface ValidateFlags {
  readonly reference: string;
  readonly skipManifests: boolean;
}

export async function validateCommand(runtime: Runtime, flags: ValidateFlags, output: CliOutput): Promise<ExitCode> {
  const reports = await runtime.traverser.validate(flags.reference, { skipManifests: flags.skipManifests });

  let issues = 0;
  for (const report of reports) {
    for (const issue of report.issues) {
      issues++;
      output.out(`${report.kind} ${report.reference}: ${issue.path}: ${issue.message}`);
    }
  }

  if (issues > 0) {
    output.err(`${issues} issue(s) in ${reports.length} document(s)`);
    return EXIT_USAGE;
  }
  output.out(`OK: ${flags.reference}`);
  return EXIT_OK;
}
