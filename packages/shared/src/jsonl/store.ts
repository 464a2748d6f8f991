import { promises as fs } from 'fs';
import { basename } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { bestEffort, type BestEffortResult } from '../best-effort';
import { StorageError } from '../errors';
import { atomicWrite, ensureDir, readTextIfExists } from '../fs/io';

export interface JsonlReadOptions<T> {
  filter?: (record: T) => boolean;
  /** Maximum number of matches to return */
  limit?: number;
  /** `file` keeps file order, `recent` returns the newest matches first */
  order?: 'file' | 'recent';
}

export interface JsonlReadResult<T> {
  records: T[];
  /** Lines that were not JSON or did not match the schema */
  malformed: number;
  /** Non-blank lines in the file */
  total: number;
  /** Raw text of the malformed lines, in file order */
  unparsed: string[];
}

export interface JsonlInspection {
  exists: boolean;
  /** Lines that parsed as JSON */
  entryCount: number;
  invalidLines: number;
  /** One message per problem line, e.g. `trace.jsonl line 3: invalid JSON` */
  warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Append-only store of one JSON record per line.
 */
export class JsonlStore<T> {
  constructor(
    readonly filePath: string,
    private readonly schema: ZodType<T, ZodTypeDef, unknown>,
  ) {}

  /**
   * Appends one record as a single write. Throws StorageError on failure.
   */
  async append(record: T): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    try {
      await ensureDir(this.filePath);
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      throw new StorageError('write_failed', this.filePath, { cause: error });
    }
  }

  appendBestEffort(record: T): Promise<BestEffortResult<void>> {
    return bestEffort(() => this.append(record));
  }

  async read(options: JsonlReadOptions<T> = {}): Promise<JsonlReadResult<T>> {
    const text = await readTextIfExists(this.filePath);
    if (text === undefined) {
      return { records: [], malformed: 0, total: 0, unparsed: [] };
    }

    const parsed: T[] = [];
    const unparsed: string[] = [];
    let total = 0;
    for (const line of text.split('\n')) {
      if (line.trim() === '') {
        continue;
      }
      total++;
      const record = this.parseLine(line);
      if (record === undefined) {
        unparsed.push(line);
        continue;
      }
      parsed.push(record.value);
    }

    const matches = options.filter ? parsed.filter(options.filter) : parsed;
    const limit = options.limit ?? Number.POSITIVE_INFINITY;
    const records =
      options.order === 'recent'
        ? matches.slice(Math.max(0, matches.length - limit)).reverse()
        : matches.slice(0, limit);

    return { records, malformed: unparsed.length, total, unparsed };
  }

  /**
   * Replaces the whole file atomically. `unparsed` lines from a previous read
   * are written back verbatim after the records.
   */
  async rewrite(records: readonly T[], unparsed: readonly string[] = []): Promise<void> {
    const lines = [...records.map((record) => JSON.stringify(record)), ...unparsed];
    const body = lines.map((line) => `${line}\n`).join('');
    await atomicWrite(this.filePath, body);
  }

  /**
   * Checks the raw lines without the schema: invalid JSON and missing
   * top-level fields.
   */
  async inspect(requiredFields: readonly string[]): Promise<JsonlInspection> {
    const text = await readTextIfExists(this.filePath);
    if (text === undefined) {
      return { exists: false, entryCount: 0, invalidLines: 0, warnings: [] };
    }

    const label = basename(this.filePath);
    const warnings: string[] = [];
    let entryCount = 0;
    let invalidLines = 0;
    text.split('\n').forEach((line, index) => {
      if (line.trim() === '') {
        return;
      }
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        invalidLines++;
        warnings.push(`${label} line ${index + 1}: invalid JSON`);
        return;
      }
      entryCount++;
      const missing = isRecord(raw) ? requiredFields.filter((field) => !(field in raw)) : [...requiredFields];
      if (missing.length > 0) {
        warnings.push(`${label} line ${index + 1}: missing fields ${missing.join(', ')}`);
      }
    });
    return { exists: true, entryCount, invalidLines, warnings };
  }

  private parseLine(line: string): { value: T } | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return undefined;
    }
    const result = this.schema.safeParse(raw);
    return result.success ? { value: result.data } : undefined;
  }
}
