import { tableCells, tableText } from './blocks';
import { LocateOptions } from './header';
import { silentLogger, Logger } from './logger';
import { ScanGuard } from './scan';
import { labelledValue, ownerOf, Term } from './terms';
import { Block, SectionValues } from './types';

const DEFAULT_SCAN_FACTOR = 4;

// Content of the block after a heading paragraph.
function valueAfter(blocks: readonly Block[], index: number): string {
  const next = blocks[index + 1];
  if (!next) return '';
  return next.kind === 'table' ? tableText(next.rows) : next.text;
}

/**
 * Cells after `pos` up to the next cell naming another section. Several
 * sections often share one table, each opening with its label cell.
 */
function sliceTable(
  cells: readonly string[],
  pos: number,
  others: readonly Term[],
  guard: ScanGuard,
): string {
  let end = cells.length;
  for (let j = pos + 1; j < cells.length; j++) {
    guard.tick(j);
    if (others.some((o) => o.matchesNormalized(cells[j]))) { end = j; break; }
  }
  return cells.slice(pos + 1, end).filter((c) => c.trim() !== '').join('\n');
}

function locateOne(
  blocks: readonly Block[],
  terms: readonly Term[],
  term: Term,
  guard: ScanGuard,
  log: Logger,
): string {
  const belongs = (text: string) => ownerOf(terms, text) === term;

  // Heading paragraph spelled exactly like the term.
  for (let i = 0; i < blocks.length; i++) {
    guard.tick(i);
    const b = blocks[i];
    if (b.kind === 'paragraph' && term.matchesExact(b.text) && belongs(b.text)) {
      log.trace('sections.match', { via: 'paragraph.exact', block: i });
      return valueAfter(blocks, i);
    }
  }

  // Drifted spelling, as a heading paragraph or as a table cell.
  for (let i = 0; i < blocks.length; i++) {
    guard.tick(i);
    const b = blocks[i];
    if (b.kind === 'paragraph') {
      if (term.matchesNormalized(b.text) && belongs(b.text)) {
        log.trace('sections.match', { via: 'paragraph.normalized', block: i });
        return valueAfter(blocks, i);
      }
      continue;
    }
    const cells = tableCells(b.rows);
    const pos = cells.findIndex((c) => term.matchesNormalized(c) && belongs(c));
    if (pos >= 0) {
      log.trace('sections.match', { via: 'table.cell', block: i, cell: pos });
      return sliceTable(cells, pos, terms.filter((t) => t !== term), guard);
    }
  }

  // "Conclusion: all good" in one paragraph.
  for (let i = 0; i < blocks.length; i++) {
    guard.tick(i);
    const b = blocks[i];
    if (b.kind !== 'paragraph') continue;
    const value = labelledValue(term, b.text);
    if (value !== undefined) {
      log.trace('sections.match', { via: 'paragraph.prefix', block: i });
      return value;
    }
  }

  log.debug('sections.missing');
  return '';
}

/**
 * Finds the text of every section term. `terms` must be in the order the
 * sections appear in the document; when a text matches several terms it
 * belongs to the earliest one.
 */
export function locateSections(
  blocks: readonly Block[],
  terms: readonly Term[],
  opts: LocateOptions = {},
): SectionValues {
  const log = opts.logger ?? silentLogger;
  const factor = opts.scanFactor ?? DEFAULT_SCAN_FACTOR;
  const units = blocks.reduce((n, b) => n + (b.kind === 'table' ? b.rows.length * 2 : 1), 0);

  const out = new Map<string, string>();
  for (const term of terms) {
    const guard = new ScanGuard(term.main, units + blocks.length * 3, factor);
    out.set(term.main, locateOne(blocks, terms, term, guard, log.child({ term: term.main })));
  }
  return out;
}
