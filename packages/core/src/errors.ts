export type ExtractionErrorCode =
  | "HEADER_NOT_FOUND"
  | "MALFORMED_SCAN"
  | "DOCUMENT_FORMAT"
  | "DOCUMENT_STATE"
  | "CONFIG";

/** Base class for every failure the extractor raises on purpose. */
export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class HeaderNotFoundError extends ExtractionError {
  constructor(message = "No table in the document contains any of the header terms") {
    super("HEADER_NOT_FOUND", message);
  }
}

export class MalformedScanError extends ExtractionError {
  readonly term: string;
  readonly position: number;
  readonly limit: number;

  constructor(term: string, position: number, limit: number) {
    super("MALFORMED_SCAN", `Scan for "${term}" exceeded ${limit} steps at position ${position}`);
    this.term = term;
    this.position = position;
    this.limit = limit;
  }
}

export class DocumentFormatError extends ExtractionError {
  constructor(message: string) {
    super("DOCUMENT_FORMAT", message);
  }
}

export class DocumentStateError extends ExtractionError {
  constructor(message: string) {
    super("DOCUMENT_STATE", message);
  }
}

export class ConfigError extends ExtractionError {
  readonly path: string;

  constructor(path: string, message: string) {
    super("CONFIG", `${path}: ${message}`);
    this.path = path;
  }
}

export function errorCode(e: unknown): ExtractionErrorCode | "UNKNOWN" {
  return e instanceof ExtractionError ? e.code : "UNKNOWN";
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
