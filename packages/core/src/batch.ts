import { ExtractionConfig } from './config';
import { RowSink } from './csv';
import { errorCode, errorMessage, ExtractionErrorCode } from './errors';
import { extractRecord } from './extract';
import { ParsedDocument, withDocument } from './ingest/document';
import { Logger, silentLogger } from './logger';
import { headerRow, toRow } from './record';

export type DocumentOpener = <T>(path: string, fn: (doc: ParsedDocument) => T | Promise<T>) => Promise<T>;

export interface SkippedDocument {
  file: string;
  code: ExtractionErrorCode | 'UNKNOWN';
  message: string;
}

export interface BatchSummary {
  processed: number;
  skipped: SkippedDocument[];
}

export interface BatchOptions {
  config: ExtractionConfig;
  sink: RowSink;
  logger?: Logger;
  // Documents parsed at once; rows are still written in input order.
  concurrency?: number;
  open?: DocumentOpener;
}

type Outcome = { ok: true; row: string[] } | { ok: false; skipped: SkippedDocument };

/**
 * Extracts every file and writes the header row plus one row per extracted
 * document. A document that fails is logged and listed in `skipped`; the rest
 * of the batch still runs.
 */
export async function runBatch(files: readonly string[], opts: BatchOptions): Promise<BatchSummary> {
  const log = opts.logger ?? silentLogger;
  const open: DocumentOpener = opts.open ?? withDocument;
  const { config } = opts;

  async function processOne(file: string): Promise<Outcome> {
    log.info('batch.document.start', { file });
    try {
      const record = await open(file, (doc) => extractRecord(doc.nodes, doc.source, config, { logger: log }));
      return { ok: true, row: toRow(record, config) };
    } catch (e) {
      const skipped: SkippedDocument = { file, code: errorCode(e), message: errorMessage(e) };
      log.error('batch.document.skipped', { ...skipped });
      return { ok: false, skipped };
    }
  }

  const outcomes = new Array<Outcome>(files.length);
  let next = 0;
  const worker = async () => {
    while (next < files.length) {
      const i = next++;
      outcomes[i] = await processOne(files[i]);
    }
  };
  const workers = Math.max(1, Math.min(opts.concurrency ?? 1, files.length));
  await Promise.all(Array.from({ length: workers }, worker));

  const summary: BatchSummary = { processed: 0, skipped: [] };
  await opts.sink.writeRow(headerRow(config));
  for (const o of outcomes) {
    if (o.ok) {
      await opts.sink.writeRow(o.row);
      summary.processed++;
    } else {
      summary.skipped.push(o.skipped);
    }
  }
  log.info('batch.done', { processed: summary.processed, skipped: summary.skipped.length });
  return summary;
}
