import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { FileSystemError, WorkItemListError } from './exceptions.js';
import { manifestOutputPath } from './identity/work-identity.js';
import type { WorkItem } from './models/work-item.js';

const FORBIDDEN = /[\t\r\n]/;

export function formatWorkItemList(items: readonly WorkItem[]): string {
  return items
    .map((item, i) => {
      if (FORBIDDEN.test(item.manifestReference) || FORBIDDEN.test(item.outputLocation)) {
        throw new WorkItemListError('tab or line break in work item', i + 1);
      }
      return `${item.manifestReference}\t${item.outputLocation}\n`;
    })
    .join('');
}

export interface ParseWorkItemListOptions {
  /** Derives the location of lines that carry only a manifest reference */
  readonly outputDir?: string;
}

export function parseWorkItemList(text: string, options: ParseWorkItemListOptions = {}): WorkItem[] {
  const items: WorkItem[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) return;

    const [manifestReference, outputLocation, ...rest] = line.split('\t').map((f) => f.trim());
    if (rest.length > 0) {
      throw new WorkItemListError(`expected at most 2 fields, got ${rest.length + 2}`, i + 1);
    }

    if (outputLocation) {
      items.push({ manifestReference, outputLocation });
      return;
    }
    if (options.outputDir === undefined) {
      throw new WorkItemListError('missing output location and no output directory given', i + 1);
    }
    items.push({
      manifestReference,
      outputLocation: manifestOutputPath(manifestReference, options.outputDir),
    });
  });

  return items;
}

export async function readWorkItemList(
  listPath: string,
  options: ParseWorkItemListOptions = {},
): Promise<WorkItem[]> {
  let text: string;
  try {
    text = await readFile(listPath, 'utf8');
  } catch (error) {
    throw new FileSystemError('read', listPath, error);
  }
  return parseWorkItemList(text, options);
}

export async function writeWorkItemList(listPath: string, items: readonly WorkItem[]): Promise<void> {
  const content = formatWorkItemList(items);
  try {
    await mkdir(path.dirname(listPath), { recursive: true });
    await writeFile(listPath, content, 'utf8');
  } catch (error) {
    throw new FileSystemError('write', listPath, error);
  }
}

/** Array-job dispatch; task indices are 1-based. */
export function selectWorkItem(items: readonly WorkItem[], taskIndex: number): WorkItem {
  if (!Number.isInteger(taskIndex) || taskIndex < 1) {
    throw new WorkItemListError(`task index must be a positive integer, got ${taskIndex}`);
  }
  const item = items[taskIndex - 1];
  if (!item) {
    throw new WorkItemListError(`no work item for task index ${taskIndex} (list has ${items.length})`);
  }
  return item;
}
