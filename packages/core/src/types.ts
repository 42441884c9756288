export type Row = readonly [string, string];

export type ParagraphBlock = { kind: "paragraph"; text: string };
export type TableBlock = { kind: "table"; rows: Row[] };

/** One paragraph or one table, in reading order. */
export type Block = ParagraphBlock | TableBlock;

export const HEADER_FIELDS = ["Province", "District", "School", "Subject"] as const;
export type HeaderField = (typeof HEADER_FIELDS)[number];

export type HeaderFields = Record<HeaderField, string>;

// Keyed by section label, in configured order.
export type SectionValues = ReadonlyMap<string, string>;

export interface ExtractedRecord {
  readonly header: Readonly<HeaderFields>;
  readonly sections: SectionValues;
  readonly source: string;
}

export interface TermSpec {
  label: string;
  aliases?: string[];
}

export interface HeaderFieldSpec extends TermSpec {
  field: HeaderField;
}

/** Shape of an extraction config JSON file. */
export interface ExtractionConfigSpec {
  id: string;
  title?: string;
  header: HeaderFieldSpec[];
  sections: TermSpec[];
  scan_factor?: number;
}
