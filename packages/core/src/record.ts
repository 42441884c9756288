import { ExtractionConfig } from './config';
import { ExtractedRecord, HEADER_FIELDS, HeaderFields, SectionValues } from './types';

export const SOURCE_COLUMN = 'File';

export function assemble(header: HeaderFields, sections: SectionValues, source: string): ExtractedRecord {
  return Object.freeze({
    header: Object.freeze({ ...header }),
    sections: new Map(sections),
    source,
  });
}

/** Header fields, then sections in configured order, then the source file. */
export function toRow(record: ExtractedRecord, config: ExtractionConfig): string[] {
  return [
    ...HEADER_FIELDS.map((f) => record.header[f]),
    ...config.sections.map((t) => record.sections.get(t.main) ?? ''),
    record.source,
  ];
}

export function headerRow(config: ExtractionConfig): string[] {
  return [...HEADER_FIELDS, ...config.sections.map((t) => t.main), SOURCE_COLUMN];
}

/** Plain-object form for JSON responses. */
export function recordToJSON(record: ExtractedRecord) {
  return {
    header: { ...record.header },
    sections: Object.fromEntries(record.sections),
    source: record.source,
  };
}
