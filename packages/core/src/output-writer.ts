import { mkdir, open, type FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import { isMissingFileError, OutputWriteError } from './exceptions.js';
import { silentLogger, type Logger } from './logger.js';
import { serializeRecord, type OutputRecord } from './models/output-record.js';
import type { OutputWriterPort } from './ports/output-writer.js';

const NEWLINE = 0x0a;

/**
 * Appends one JSON line per record and fsyncs before resolving.
 * A location must only ever have one writer; nothing here locks.
 */
export class JsonlOutputWriter implements OutputWriterPort {
  private readonly verified = new Set<string>();

  constructor(private readonly log: Logger = silentLogger) {}

  async append(outputLocation: string, record: OutputRecord): Promise<void> {
    try {
      await mkdir(path.dirname(outputLocation), { recursive: true });

      const repair = await this.endsWithTornLine(outputLocation);
      if (repair) {
        this.log.warn(`Terminating torn final line before appending: ${outputLocation}`);
      }
      const payload = Buffer.from(`${repair ? '\n' : ''}${serializeRecord(record)}`, 'utf8');

      const handle = await open(outputLocation, 'a');
      try {
        const { bytesWritten } = await handle.write(payload);
        if (bytesWritten !== payload.length) {
          throw new Error(`short write (${bytesWritten}/${payload.length} bytes)`);
        }
        await handle.sync();
      } finally {
        await handle.close();
      }

      this.verified.add(outputLocation);
    } catch (error) {
      throw new OutputWriteError(outputLocation, error);
    }
  }

  /** Checked once per location per process: a crash mid-write leaves no trailing newline. */
  private async endsWithTornLine(outputLocation: string): Promise<boolean> {
    if (this.verified.has(outputLocation)) return false;

    let handle: FileHandle;
    try {
      handle = await open(outputLocation, 'r');
    } catch (error) {
      if (isMissingFileError(error)) return false;
      throw error;
    }

    try {
      const { size } = await handle.stat();
      if (size === 0) return false;
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      return last[0] !== NEWLINE;
    } finally {
      await handle.close();
    }
  }
}
