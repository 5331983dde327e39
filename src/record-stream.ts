import { mkdir, open, readFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ZodType, ZodTypeDef } from 'zod';
import type { SkippedRecord } from './types.js';

// ============================================================
// Newline-delimited JSON record streams
// ============================================================

export function serializeRecord(record: object): string {
  return JSON.stringify(record) + '\n';
}

/**
 * Append-only JSONL sink. Each record is written as one complete line
 * with a single write, so an interrupted run never leaves half a record.
 */
export class RecordWriter<T extends object> {
  private handle: FileHandle | null = null;
  private written = 0;

  private constructor(readonly path: string) {}

  /** Opens `path` for writing; `truncate` starts a fresh stream. */
  static async open<T extends object>(path: string, opts: { truncate?: boolean } = {}): Promise<RecordWriter<T>> {
    await mkdir(dirname(path), { recursive: true });
    const writer = new RecordWriter<T>(path);
    writer.handle = await open(path, opts.truncate === false ? 'a' : 'w');
    return writer;
  }

  async append(record: T): Promise<void> {
    if (!this.handle) {
      throw new Error(`Record stream ${this.path} is closed`);
    }
    await this.handle.write(serializeRecord(record));
    this.written++;
  }

  get count(): number {
    return this.written;
  }

  async close(): Promise<void> {
    if (!this.handle) return;
    const handle = this.handle;
    this.handle = null;
    await handle.sync();
    await handle.close();
  }
}

export async function writeRecords<T extends object>(path: string, records: Iterable<T>): Promise<number> {
  const writer = await RecordWriter.open<T>(path, { truncate: true });
  try {
    for (const record of records) {
      await writer.append(record);
    }
  } finally {
    await writer.close();
  }
  return writer.count;
}

export interface ParsedLines<T> {
  records: T[];
  skipped: SkippedRecord[];
}

/**
 * Validates each non-blank line against `schema`. Bad lines are reported
 * with their 1-based line number instead of failing the whole stream.
 */
export function parseRecordLines<T>(lines: string[], schema: ZodType<T, ZodTypeDef, unknown>): ParsedLines<T> {
  const records: T[] = [];
  const skipped: SkippedRecord[] = [];

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (!line) return;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (err: unknown) {
      skipped.push({ line: index + 1, reason: `invalid JSON (${err instanceof Error ? err.message : String(err)})` });
      return;
    }

    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'record';
      skipped.push({ line: index + 1, reason: `${field}: ${issue ? issue.message : 'invalid record'}` });
      return;
    }
    records.push(parsed.data);
  });

  return { records, skipped };
}

export async function readLines(path: string): Promise<string[]> {
  const content = await readFile(path, 'utf-8');
  return content.split('\n');
}

export async function readRecords<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<ParsedLines<T>> {
  return parseRecordLines(await readLines(path), schema);
}
