import { tableCells } from './blocks';
import { HeaderTerm } from './config';
import { HeaderNotFoundError } from './errors';
import { Logger, silentLogger } from './logger';
import { ScanGuard } from './scan';
import { labelledValue, ownerOf, Term } from './terms';
import { Block, HeaderFields, TableBlock } from './types';

export interface LocateOptions {
  logger?: Logger;
  scanFactor?: number;
}

const DEFAULT_SCAN_FACTOR = 4;

function isTable(b: Block): b is TableBlock {
  return b.kind === 'table';
}

/**
 * First table holding a header label. All tables are tried with exact matching
 * before any is tried with normalized matching.
 */
export function findHeaderTable(blocks: readonly Block[], terms: readonly Term[]): TableBlock | undefined {
  const tables = blocks.filter(isTable);
  const has = (t: TableBlock, match: (term: Term, cell: string) => boolean) =>
    tableCells(t.rows).some((cell) => terms.some((term) => match(term, cell)));
  return tables.find((t) => has(t, (term, cell) => term.matchesExact(cell)))
    ?? tables.find((t) => has(t, (term, cell) => term.matchesNormalized(cell)));
}

export function locateHeader(
  blocks: readonly Block[],
  headerTerms: readonly HeaderTerm[],
  opts: LocateOptions = {},
): HeaderFields {
  const log = opts.logger ?? silentLogger;
  const factor = opts.scanFactor ?? DEFAULT_SCAN_FACTOR;
  const terms = headerTerms.map((h) => h.term);

  const table = findHeaderTable(blocks, terms);
  if (!table) throw new HeaderNotFoundError();

  const raw = tableCells(table.rows);
  // Canonical spelling of each label cell ("DISTRICT/REGION" -> "DISTRICT"), undefined for values.
  const labels = raw.map((cell) => ownerOf(terms, cell)?.main);

  const out: HeaderFields = { Province: '', District: '', School: '', Subject: '' };
  for (const { field, term } of headerTerms) {
    const guard = new ScanGuard(term.main, raw.length, factor);
    let pos = -1;
    for (let i = 0; i < raw.length; i++) {
      guard.tick(i);
      if (labels[i] === term.main) { pos = i; break; }
    }
    if (pos >= 0) {
      // A label facing another label has no value of its own.
      const next = pos + 1 < raw.length && labels[pos + 1] === undefined ? raw[pos + 1] : '';
      out[field] = next.trim();
      log.trace('header.field', { field, position: pos });
      continue;
    }

    const inCell = raw.find((cell, i) => labels[i] === undefined && labelledValue(term, cell) !== undefined);
    const inParagraph = inCell === undefined
      ? blocks.find((b) => b.kind === 'paragraph' && labelledValue(term, b.text) !== undefined)
      : undefined;
    const text = inCell ?? (inParagraph?.kind === 'paragraph' ? inParagraph.text : undefined);
    if (text !== undefined) {
      out[field] = labelledValue(term, text) ?? '';
      log.trace('header.field.embedded', { field });
    } else {
      log.debug('header.field.missing', { field });
    }
  }

  return out;
}
