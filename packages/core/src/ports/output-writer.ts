import type { OutputRecord } from '../models/output-record.js';

export interface OutputWriterPort {
  /** Durable once resolved. Rejects with OutputWriteError. */
  append(outputLocation: string, record: OutputRecord): Promise<void>;
}
