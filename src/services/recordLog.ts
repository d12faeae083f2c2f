import { createReadStream, promises as fs } from 'node:fs';
import * as path from 'node:path';
import { MalformedRecordError, SourceUnavailableError } from '../errors.js';
import type { Sample } from '../types/ecg.js';

export const CSV_HEADER = 'time,ecg_signal';

/** A sample plus the row offset it was read from. */
export type LogEntry = Sample & { offset: number };

export type LogSlice = {
  records: LogEntry[];
  /** Offset just past the last row consumed, malformed rows included. */
  end: number;
  malformed: MalformedRecordError[];
};

/**
 * Append-only, single-writer sequence of samples. Rows never move or change
 * once appended; readers address them by row offset.
 */
export interface RecordLog {
  append(records: readonly Sample[]): Promise<void>;
  readFrom(offset: number): Promise<LogSlice>;
  length(): Promise<number>;
}

export class MemoryRecordLog implements RecordLog {
  private rows: Sample[] = [];

  constructor(initial: readonly Sample[] = []) {
    for (const r of initial) this.rows.push({ time: r.time, amplitude: r.amplitude });
  }

  append(records: readonly Sample[]): Promise<void> {
    for (const r of records) this.rows.push({ time: r.time, amplitude: r.amplitude });
    return Promise.resolve();
  }

  readFrom(offset: number): Promise<LogSlice> {
    const records: LogEntry[] = [];
    for (let row = offset; row < this.rows.length; row++) records.push({ ...this.rows[row], offset: row });
    return Promise.resolve({ records, end: Math.max(offset, this.rows.length), malformed: [] });
  }

  length(): Promise<number> {
    return Promise.resolve(this.rows.length);
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function parseRow(line: string, row: number): Sample | MalformedRecordError {
  const cells = line.split(',');
  if (cells.length !== 2) return new MalformedRecordError(row, line);
  const [time, amplitude] = cells.map((c) => (c.trim() === '' ? Number.NaN : Number(c)));
  if (!Number.isFinite(time) || !Number.isFinite(amplitude)) return new MalformedRecordError(row, line);
  return { time, amplitude };
}

export type CsvRecordLogOptions = {
  /** Bytes read from disk at a time. */
  chunkSize?: number;
  /** Upper bound on rows returned by one `readFrom`; the caller reads again from `end`. */
  maxRowsPerRead?: number;
};

/** Start of data row `row` in the file. */
type Position = { row: number; byte: number };

const NEWLINE = 0x0a;

/**
 * Two-column CSV log (`time,ecg_signal`). The header is written by the first
 * append only. A trailing line without its newline is an append still in
 * progress and is left for the next read.
 *
 * Reads stream from the byte position where the previous read stopped, so a
 * poll costs the size of the new rows, not of the whole file.
 */
export class CsvRecordLog implements RecordLog {
  private readonly chunkSize: number;
  private readonly maxRowsPerRead: number;
  private hint: Position = { row: 0, byte: 0 };

  constructor(readonly filePath: string, options: CsvRecordLogOptions = {}) {
    this.chunkSize = options.chunkSize ?? 64 * 1024;
    this.maxRowsPerRead = options.maxRowsPerRead ?? 100_000;
  }

  async append(records: readonly Sample[]): Promise<void> {
    const size = await this.size();
    let chunk = '';
    if (!size) chunk = `${CSV_HEADER}\n`;
    else if (!(await this.endsWithNewline(size))) chunk = '\n';
    for (const r of records) chunk += `${r.time},${r.amplitude}\n`;
    if (chunk === '') return;
    if (size === null) await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, chunk, 'utf8');
  }

  async readFrom(offset: number): Promise<LogSlice> {
    const records: LogEntry[] = [];
    const malformed: MalformedRecordError[] = [];
    const end = await this.scan(offset, (line, row) => {
      const parsed = parseRow(line, row);
      if (parsed instanceof MalformedRecordError) malformed.push(parsed);
      else records.push({ ...parsed, offset: row });
      return records.length + malformed.length < this.maxRowsPerRead;
    });
    return { records, end: Math.max(offset, end), malformed };
  }

  async length(): Promise<number> {
    try {
      return await this.scan(Number.MAX_SAFE_INTEGER, () => true);
    } catch (e) {
      if (e instanceof SourceUnavailableError) return 0;
      throw e;
    }
  }

  private async size(): Promise<number | null> {
    try {
      return (await fs.stat(this.filePath)).size;
    } catch (e) {
      if (isMissing(e)) return null;
      throw e;
    }
  }

  private async endsWithNewline(size: number): Promise<boolean> {
    const handle = await fs.open(this.filePath, 'r');
    try {
      const { buffer } = await handle.read(Buffer.alloc(1), 0, 1, size - 1);
      return buffer[0] === NEWLINE;
    } finally {
      await handle.close();
    }
  }

  /**
   * Walks complete data rows starting at the closest known position at or
   * before `offset`, calling `visit` for each row >= `offset` until it returns
   * false. Returns the row index just past the last row walked.
   */
  private async scan(offset: number, visit: (line: string, row: number) => boolean): Promise<number> {
    const size = await this.size();
    if (size === null) throw new SourceUnavailableError(this.filePath);
    // An older hint is still valid; a later one, or a shrunken file, is not.
    let from = this.hint.row <= offset && this.hint.byte <= size ? this.hint : { row: 0, byte: 0 };

    const stream = createReadStream(this.filePath, { start: from.byte, highWaterMark: this.chunkSize });
    let row = from.row;
    let lineStart = from.byte;
    let pending: Buffer[] = [];
    let done = false;
    try {
      for await (const chunk of stream) {
        if (!Buffer.isBuffer(chunk)) continue;
        let pos = 0;
        while (!done) {
          const nl = chunk.indexOf(NEWLINE, pos);
          if (nl < 0) break;
          pending.push(chunk.subarray(pos, nl));
          const line = Buffer.concat(pending).toString('utf8').replace(/\r$/, '');
          const lineBytes = pending.reduce((n, b) => n + b.length, 0) + 1;
          pending = [];
          pos = nl + 1;
          lineStart += lineBytes;
          if (lineStart - lineBytes === 0 && line === CSV_HEADER) {
            from = { row: 0, byte: lineStart };
            continue;
          }
          if (row >= offset && !visit(line, row)) done = true;
          row++;
          from = { row, byte: lineStart };
        }
        if (done) break;
        pending.push(chunk.subarray(pos));
      }
    } catch (e) {
      if (isMissing(e)) throw new SourceUnavailableError(this.filePath, { cause: e });
      throw e;
    } finally {
      stream.destroy();
    }
    this.hint = from;
    return row;
  }
}
