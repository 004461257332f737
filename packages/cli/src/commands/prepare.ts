import { readFile } from 'node:fs/promises';
import {
  CollectionExpander,
  FileSystemError,
  writeWorkItemList,
  type ManifestReference,
} from '@scriptorium/core';
import { EXIT_OK, type CliOutput, type ExitCode } from '../output.js';
import type { Runtime } from '../runtime.js';

export type PrepareSource =
  | { readonly kind: 'reference'; readonly reference: string }
  | { readonly kind: 'list'; readonly listPath: string };

export interface PrepareFlags {
  readonly source: PrepareSource;
  readonly manifestList: string;
  readonly outputDir: string;
}

/** One reference per line; blank lines and `#` comments are ignored. */
export function parseReferenceList(text: string): ManifestReference[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

async function readReferenceList(listPath: string): Promise<ManifestReference[]> {
  try {
    return parseReferenceList(await readFile(listPath, 'utf8'));
  } catch (error) {
    throw new FileSystemError('read', listPath, error);
  }
}

export async function prepareCommand(runtime: Runtime, flags: PrepareFlags, output: CliOutput): Promise<ExitCode> {
  const expander = new CollectionExpander(runtime.traverser, {
    outputDir: flags.outputDir,
    logger: runtime.logger('Expand'),
  });

  const input =
    flags.source.kind === 'reference' ? flags.source.reference : await readReferenceList(flags.source.listPath);
  const items = await expander.expand(input);
  await writeWorkItemList(flags.manifestList, items);

  output.out(`Wrote ${items.length} work item(s) to ${flags.manifestList}`);
  return EXIT_OK;
}
