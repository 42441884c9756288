import fs from "fs";
import defaultSpec from "./schemas/moderation-report.v1.json";
import { ConfigError } from "./errors";
import { Term } from "./terms";
import { HEADER_FIELDS, HeaderField } from "./types";

export interface HeaderTerm {
  field: HeaderField;
  term: Term;
}

/** Ordered, immutable label configuration handed to the locators. */
export interface ExtractionConfig {
  readonly id: string;
  readonly header: readonly HeaderTerm[];
  readonly sections: readonly Term[];
  readonly scanFactor: number;
}

const DEFAULT_SCAN_FACTOR = 4;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readLabel(v: unknown, path: string): string {
  if (typeof v !== "string" || !v.trim()) throw new ConfigError(path, "expected a non-empty string");
  return v;
}

function readAliases(v: unknown, path: string): string[] {
  if (v === undefined) return [];
  if (!Array.isArray(v)) throw new ConfigError(path, "expected an array of strings");
  return v.map((a, i) => readLabel(a, `${path}[${i}]`));
}

function isHeaderField(v: string): v is HeaderField {
  return HEADER_FIELDS.some((f) => f === v);
}

/** Validates a parsed JSON config. `source` only prefixes error paths. */
export function parseExtractionConfig(raw: unknown, source = "config"): ExtractionConfig {
  if (!isRecord(raw)) throw new ConfigError(source, "expected an object");
  const id = readLabel(raw.id, `${source}.id`);

  if (!Array.isArray(raw.header)) throw new ConfigError(`${source}.header`, "expected an array");
  const header: HeaderTerm[] = [];
  raw.header.forEach((entry: unknown, i: number) => {
    const path = `${source}.header[${i}]`;
    if (!isRecord(entry)) throw new ConfigError(path, "expected an object");
    const field = readLabel(entry.field, `${path}.field`);
    if (!isHeaderField(field)) throw new ConfigError(`${path}.field`, `unknown header field "${field}"`);
    if (header.some((h) => h.field === field)) throw new ConfigError(`${path}.field`, `duplicate header field "${field}"`);
    header.push({ field, term: Term.of(readLabel(entry.label, `${path}.label`), readAliases(entry.aliases, `${path}.aliases`)) });
  });
  const missing = HEADER_FIELDS.filter((f) => !header.some((h) => h.field === f));
  if (missing.length) throw new ConfigError(`${source}.header`, `missing fields: ${missing.join(", ")}`);
  header.sort((a, b) => HEADER_FIELDS.indexOf(a.field) - HEADER_FIELDS.indexOf(b.field));

  if (!Array.isArray(raw.sections) || raw.sections.length === 0) {
    throw new ConfigError(`${source}.sections`, "expected a non-empty array");
  }
  const sections: Term[] = raw.sections.map((entry: unknown, i: number) => {
    const path = `${source}.sections[${i}]`;
    if (!isRecord(entry)) throw new ConfigError(path, "expected an object");
    return Term.of(readLabel(entry.label, `${path}.label`), readAliases(entry.aliases, `${path}.aliases`));
  });
  const seen = new Set<string>();
  sections.forEach((t, i) => {
    if (seen.has(t.main)) throw new ConfigError(`${source}.sections[${i}].label`, `duplicate section "${t.main}"`);
    seen.add(t.main);
  });

  let scanFactor = DEFAULT_SCAN_FACTOR;
  if (raw.scan_factor !== undefined) {
    if (typeof raw.scan_factor !== "number" || !Number.isInteger(raw.scan_factor) || raw.scan_factor < 1) {
      throw new ConfigError(`${source}.scan_factor`, "expected a positive integer");
    }
    scanFactor = raw.scan_factor;
  }

  return Object.freeze({
    id,
    header: Object.freeze(header),
    sections: Object.freeze(sections),
    scanFactor,
  });
}

export const defaultConfig: ExtractionConfig = parseExtractionConfig(defaultSpec, "moderation-report.v1");

/** Reads a JSON config file, or returns the bundled moderation report config. */
export function loadExtractionConfig(file?: string): ExtractionConfig {
  if (!file) return defaultConfig;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    throw new ConfigError(file, e instanceof Error ? e.message : String(e));
  }
  return parseExtractionConfig(raw, file);
}
