import { ContentNode, TableNode } from './ingest/types';
import { Logger, silentLogger } from './logger';
import { Block, Row } from './types';

export interface BuildOptions {
  logger?: Logger;
}

function isBlank(s: string): boolean {
  return s.trim() === '';
}

// Rows of a table, two cells each. Nested tables are appended after the row holding them.
function flattenTable(table: TableNode, log: Logger, depth: number): Row[] {
  const rows: Row[] = [];
  table.rows.forEach((row, r) => {
    let first = '';
    let second = '';
    const nested: Row[] = [];
    row.cells.forEach((cell, column) => {
      for (const child of cell.children) {
        if (child.kind === 'paragraph') {
          const text = child.runs.join('');
          if (column === 0) first += text;
          else if (column === 1) second += text;
          else if (!isBlank(text)) log.debug('blocks.cell.dropped', { row: r, column, depth, text });
        } else if (child.kind === 'table') {
          if (column > 1) {
            log.debug('blocks.nested_table.dropped', { row: r, column, depth });
            continue;
          }
          nested.push(...flattenTable(child, log, depth + 1));
        } else {
          log.debug('blocks.cell.unhandled', { row: r, column, depth, tag: child.tag });
        }
      }
    });
    if (!isBlank(first) || !isBlank(second)) rows.push([first, second]);
    rows.push(...nested);
  });
  return rows;
}

/** Turns the body's content nodes into paragraph and table blocks, in reading order. */
export function buildBlocks(nodes: readonly ContentNode[], opts: BuildOptions = {}): Block[] {
  const log = opts.logger ?? silentLogger;
  const blocks: Block[] = [];
  for (const node of nodes) {
    switch (node.kind) {
      case 'paragraph': {
        const text = node.runs.join('');
        if (!isBlank(text)) blocks.push({ kind: 'paragraph', text });
        break;
      }
      case 'table': {
        const rows = flattenTable(node, log, 0);
        if (rows.length) blocks.push({ kind: 'table', rows });
        else log.debug('blocks.table.empty');
        break;
      }
      default:
        log.debug('blocks.node.skipped', { tag: node.tag });
    }
  }
  log.trace('blocks.built', { blocks: blocks.length });
  return blocks;
}

/** Cells of a table in row-major, cell-major order, empty cells included. */
export function tableCells(rows: readonly Row[]): string[] {
  const out: string[] = [];
  for (const [a, b] of rows) out.push(a, b);
  return out;
}

/** Non-empty cells of a table joined row-major with newlines. */
export function tableText(rows: readonly Row[]): string {
  return tableCells(rows).filter((c) => !isBlank(c)).join('\n');
}
