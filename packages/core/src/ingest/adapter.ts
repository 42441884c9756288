import { DocumentFormatError } from '../errors';
import { getLogger } from '../logger';
import { parseDocx } from './docx';
import { ContentNode, IngestOptions } from './types';

export type Adapter = 'docx' | 'doc' | 'unsupported';

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export function guessAdapter(filename?: string, mime?: string): Adapter {
  const ext = (filename || '').toLowerCase();
  const m = (mime || '').toLowerCase();
  if (ext.endsWith('.docx') || m.includes(DOCX_MIME)) return 'docx';
  if (ext.endsWith('.doc') || m.includes('application/msword')) return 'doc';
  // Uploads without a name are assumed to be .docx; the container check catches the rest.
  if (!ext && !m) return 'docx';
  return 'unsupported';
}

export async function ingestBuffer(buf: Buffer, opts: IngestOptions = {}): Promise<ContentNode[]> {
  const log = getLogger('core').child({ file: opts.filename });
  const adapter = guessAdapter(opts.filename, opts.mime);
  switch (adapter) {
    case 'docx': {
      const nodes = await parseDocx(buf);
      log.debug('ingest.complete', { adapter, mime: opts.mime, bytes: buf.byteLength, nodes: nodes.length });
      return nodes;
    }
    case 'doc':
      throw new DocumentFormatError('Legacy .doc files are not supported; convert to .docx first');
    default:
      throw new DocumentFormatError(`Unsupported document type: ${opts.filename ?? opts.mime ?? 'unknown'}`);
  }
}
