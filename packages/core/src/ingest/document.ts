import { readFile } from 'fs/promises';
import { DocumentStateError } from '../errors';
import { ingestBuffer } from './adapter';
import { ContentNode } from './types';

type HandleState =
  | { state: 'unloaded' }
  | { state: 'loaded'; source: string; bytes: Buffer }
  | { state: 'parsed'; source: string; bytes: Buffer; nodes: ContentNode[] };

export type DocumentState = HandleState['state'];

export interface ParsedDocument {
  source: string;
  nodes: ContentNode[];
}

/**
 * A .docx file moving through unloaded -> loaded (bytes) -> parsed (content tree).
 * release() returns it to unloaded from any state.
 */
export class DocumentHandle {
  private current: HandleState = { state: 'unloaded' };

  get state(): DocumentState {
    return this.current.state;
  }

  async load(path: string): Promise<void> {
    this.expect('unloaded', 'load');
    const bytes = await readFile(path);
    this.current = { state: 'loaded', source: path, bytes };
  }

  // Uploaded bytes; `source` names the document in records and logs.
  loadBuffer(bytes: Buffer, source: string): void {
    this.expect('unloaded', 'load');
    this.current = { state: 'loaded', source, bytes };
  }

  async parse(): Promise<ParsedDocument> {
    const cur = this.current;
    if (cur.state !== 'loaded') throw new DocumentStateError(`Cannot parse a document that is ${cur.state}`);
    const nodes = await ingestBuffer(cur.bytes, { filename: cur.source });
    this.current = { state: 'parsed', source: cur.source, bytes: cur.bytes, nodes };
    return { source: cur.source, nodes };
  }

  release(): void {
    this.current = { state: 'unloaded' };
  }

  private expect(state: DocumentState, action: string) {
    if (this.current.state !== state) {
      throw new DocumentStateError(`Cannot ${action} a document that is ${this.current.state}`);
    }
  }
}

/** Opens and parses `path`, runs `fn`, and releases the document however `fn` ends. */
export async function withDocument<T>(path: string, fn: (doc: ParsedDocument) => T | Promise<T>): Promise<T> {
  const handle = new DocumentHandle();
  try {
    await handle.load(path);
    return await fn(await handle.parse());
  } finally {
    handle.release();
  }
}

export async function withDocumentBuffer<T>(
  bytes: Buffer,
  source: string,
  fn: (doc: ParsedDocument) => T | Promise<T>,
): Promise<T> {
  const handle = new DocumentHandle();
  try {
    handle.loadBuffer(bytes, source);
    return await fn(await handle.parse());
  } finally {
    handle.release();
  }
}
