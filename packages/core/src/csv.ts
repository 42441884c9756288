import fs from 'fs';
import { once } from 'events';

// Quote a field when it holds a comma, quote, CR or LF; quotes inside are doubled.
export function escapeCsvField(field: string): string {
  if (!/[",\r\n]/.test(field)) return field;
  return `"${field.replace(/"/g, '""')}"`;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',') + '\n';
}

export function toCsv(rows: ReadonlyArray<readonly string[]>): string {
  return rows.map(formatCsvRow).join('');
}

/** Where extracted rows go; the batch driver only needs these two calls. */
export interface RowSink {
  writeRow(fields: readonly string[]): Promise<void>;
  close(): Promise<void>;
}

/**
 * Appends rows to a file. A stream failure (the file cannot be opened, the disk
 * is full) is kept and rejects the next writeRow() or close().
 */
export class CsvWriter implements RowSink {
  private readonly out: fs.WriteStream;
  private failure: Error | undefined;

  constructor(file: string) {
    this.out = fs.createWriteStream(file, { encoding: 'utf8' });
    this.out.on('error', (e) => {
      this.failure = e;
    });
  }

  async writeRow(fields: readonly string[]): Promise<void> {
    this.check();
    if (!this.out.write(formatCsvRow(fields))) await once(this.out, 'drain');
  }

  async close(): Promise<void> {
    this.check();
    const finished = once(this.out, 'finish');
    this.out.end();
    await finished;
  }

  private check() {
    if (this.failure) throw this.failure;
    if (this.out.destroyed) throw new Error('CSV output stream is closed');
  }
}

/** Collects rows in memory, for HTTP responses and tests. */
export class MemoryRowSink implements RowSink {
  readonly rows: string[][] = [];
  closed = false;

  async writeRow(fields: readonly string[]): Promise<void> {
    this.rows.push([...fields]);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  toCsv(): string {
    return toCsv(this.rows);
  }
}
