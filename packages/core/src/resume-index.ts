import { open, type FileHandle } from 'node:fs/promises';
import { FileSystemError, isMissingFileError } from './exceptions.js';
import { deriveWorkIdentity, type WorkIdentity } from './identity/work-identity.js';
import { silentLogger, type Logger } from './logger.js';
import { parseRecordLine, type PersistedRecord } from './models/output-record.js';

export interface ResumeIndexStats {
  /** Valid records read, including degraded ones */
  readonly records: number;
  /** Lines skipped because they were not valid records (torn writes, garbage) */
  readonly invalid: number;
  /** Valid records carrying `errors`; these do not mark a page complete */
  readonly failures: number;
}

export interface ResumeIndexOptions {
  readonly logger?: Logger;
}

function identityOf(record: PersistedRecord): WorkIdentity {
  return (
    record.workIdentity ??
    deriveWorkIdentity({
      manifestReference: record.manifestReference,
      canvasId: record.canvasId,
      engineConfiguration: record.engineConfiguration,
      imageRequest: record.imageRequest,
    })
  );
}

export class ResumeIndex {
  private constructor(
    private readonly completed: Set<WorkIdentity>,
    readonly stats: ResumeIndexStats,
  ) {}

  static empty(): ResumeIndex {
    return new ResumeIndex(new Set(), { records: 0, invalid: 0, failures: 0 });
  }

  /**
   * Scans an existing artifact once. A missing artifact is an empty index;
   * unreadable lines are skipped without affecting the lines around them.
   */
  static async build(outputLocation: string, options: ResumeIndexOptions = {}): Promise<ResumeIndex> {
    const log = options.logger ?? silentLogger;

    let handle: FileHandle;
    try {
      handle = await open(outputLocation, 'r');
    } catch (error) {
      if (isMissingFileError(error)) {
        return ResumeIndex.empty();
      }
      throw new FileSystemError('read', outputLocation, error);
    }

    const completed = new Set<WorkIdentity>();
    let records = 0;
    let invalid = 0;
    let failures = 0;
    let lineNumber = 0;

    try {
      for await (const line of handle.readLines({ encoding: 'utf8', autoClose: false })) {
        lineNumber++;
        if (line.trim().length === 0) continue;

        const parsed = parseRecordLine(line);
        if (!parsed.ok) {
          invalid++;
          log.warn(`Skipped unreadable record: ${outputLocation}:${lineNumber} ${parsed.reason}`);
          continue;
        }

        records++;
        if (parsed.record.errors && parsed.record.errors.length > 0) {
          failures++;
          continue;
        }
        completed.add(identityOf(parsed.record));
      }
    } catch (error) {
      throw new FileSystemError('read', outputLocation, error);
    } finally {
      await handle.close();
    }

    log.info(`Loaded ${completed.size} completed page(s) from ${outputLocation}`, {
      records,
      invalid,
      failures,
    });
    return new ResumeIndex(completed, { records, invalid, failures });
  }

  has(identity: WorkIdentity): boolean {
    return this.completed.has(identity);
  }

  add(identity: WorkIdentity): void {
    this.completed.add(identity);
  }

  get size(): number {
    return this.completed.size;
  }

  identities(): ReadonlySet<WorkIdentity> {
    return this.completed;
  }
}
