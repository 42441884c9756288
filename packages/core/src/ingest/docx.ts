import * as unzipper from 'unzipper';
import { XMLParser } from 'fast-xml-parser';
import { DocumentFormatError, errorMessage } from '../errors';
import { ContentNode, OtherNode, ParagraphNode, TableCellNode, TableNode, TableRowNode } from './types';

const DOCUMENT_PART = 'word/document.xml';

// Run wrappers whose w:r children still belong to the paragraph text.
const RUN_CONTAINERS = new Set(['hyperlink', 'smartTag', 'ins', 'fldSimple', 'customXml']);
// Formatting elements carry no content; skipped without a trace.
const PROPERTY_TAGS = new Set(['pPr', 'tblPr', 'tblGrid', 'trPr', 'tcPr']);

type XNode = Record<string, unknown>;

function isRecord(v: unknown): v is XNode {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function asNodes(v: unknown): XNode[] {
  return Array.isArray(v) ? v.filter(isRecord) : [];
}

function tagOf(n: XNode): string | undefined {
  return Object.keys(n).find((k) => k !== ':@');
}

function childrenOf(n: XNode): XNode[] {
  const tag = tagOf(n);
  return tag === undefined ? [] : asNodes(n[tag]);
}

function findChild(nodes: XNode[], tag: string): XNode | undefined {
  return nodes.find((n) => tagOf(n) === tag);
}

function textOf(n: XNode): string {
  let out = '';
  for (const c of childrenOf(n)) {
    const v = c['#text'];
    if (typeof v === 'string' || typeof v === 'number') out += String(v);
  }
  return out;
}

function collectRuns(nodes: XNode[], out: string[]) {
  for (const n of nodes) {
    const tag = tagOf(n);
    if (tag === 'r') {
      for (const rc of childrenOf(n)) {
        if (tagOf(rc) === 't') out.push(textOf(rc));
      }
    } else if (tag !== undefined && RUN_CONTAINERS.has(tag)) {
      collectRuns(childrenOf(n), out);
    }
  }
}

function toParagraph(n: XNode): ParagraphNode {
  const runs: string[] = [];
  collectRuns(childrenOf(n), runs);
  return { kind: 'paragraph', runs };
}

function toTable(n: XNode): TableNode {
  const rows: TableRowNode[] = [];
  for (const tr of childrenOf(n)) {
    if (tagOf(tr) !== 'tr') continue;
    const cells: TableCellNode[] = [];
    for (const tc of childrenOf(tr)) {
      if (tagOf(tc) !== 'tc') continue;
      const children: TableCellNode['children'] = [];
      for (const c of childrenOf(tc)) {
        const node = toContent(c);
        if (node) children.push(node);
      }
      cells.push({ children });
    }
    rows.push({ cells });
  }
  return { kind: 'table', rows };
}

function toContent(n: XNode): ContentNode | undefined {
  const tag = tagOf(n);
  if (tag === undefined || tag === '#text' || PROPERTY_TAGS.has(tag)) return undefined;
  if (tag === 'p') return toParagraph(n);
  if (tag === 'tbl') return toTable(n);
  const other: OtherNode = { kind: 'other', tag };
  return other;
}

/** Parses the main document part into the ordered children of its body. */
export function parseDocumentXml(xml: string): ContentNode[] {
  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: true,
    removeNSPrefix: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    trimValues: false,
    parseTagValue: false,
  });
  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (e) {
    throw new DocumentFormatError(`Invalid document XML: ${errorMessage(e)}`);
  }
  const doc = findChild(asNodes(parsed), 'document');
  const body = doc && findChild(childrenOf(doc), 'body');
  if (!body) throw new DocumentFormatError('Document XML has no w:body element');

  const out: ContentNode[] = [];
  for (const child of childrenOf(body)) {
    const node = toContent(child);
    if (node) out.push(node);
  }
  return out;
}

/** Opens the .docx container and returns its main document part as text. */
export async function readDocumentXml(buf: Buffer): Promise<string> {
  let directory: unzipper.CentralDirectory;
  try {
    directory = await unzipper.Open.buffer(buf);
  } catch (e) {
    throw new DocumentFormatError(`Not a readable .docx container: ${errorMessage(e)}`);
  }
  const part = directory.files.find((f) => f.path === DOCUMENT_PART);
  if (!part) throw new DocumentFormatError(`Container has no ${DOCUMENT_PART}`);
  const content = await part.buffer();
  return content.toString('utf8');
}

export async function parseDocx(buf: Buffer): Promise<ContentNode[]> {
  return parseDocumentXml(await readDocumentXml(buf));
}
