export { guessAdapter, ingestBuffer } from './adapter';
export type { Adapter } from './adapter';
export { parseDocumentXml, parseDocx, readDocumentXml } from './docx';
export { DocumentHandle, withDocument, withDocumentBuffer } from './document';
export type { DocumentState, ParsedDocument } from './document';
export type { ContentNode, IngestOptions, OtherNode, ParagraphNode, TableCellNode, TableNode, TableRowNode } from './types';
