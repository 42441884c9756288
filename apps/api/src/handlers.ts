import {
  BatchSummary,
  DocumentOpener,
  ExtractedRecord,
  ExtractionConfig,
  ExtractionError,
  extractRecord,
  Logger,
  MemoryRowSink,
  runBatch,
  withDocumentBuffer,
} from "@report-extract/core";
import path from "path";

export interface UploadFile {
  name: string;
  data_base64: string;
}

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function readUpload(v: unknown, path = "body"): UploadFile {
  if (!isRecord(v)) throw new BadRequestError(`${path} must be an object`);
  const { name, data_base64 } = v;
  if (typeof name !== "string" || !name.trim()) throw new BadRequestError(`${path}.name required`);
  if (typeof data_base64 !== "string" || !data_base64) throw new BadRequestError(`${path}.data_base64 required`);
  return { name: name.trim(), data_base64 };
}

export function readUploads(v: unknown): UploadFile[] {
  if (!isRecord(v) || !Array.isArray(v.files) || v.files.length === 0) {
    throw new BadRequestError("files[] required");
  }
  return v.files.map((f: unknown, i: number) => readUpload(f, `files[${i}]`));
}

export async function extractUpload(file: UploadFile, config: ExtractionConfig, log: Logger): Promise<ExtractedRecord> {
  const buf = Buffer.from(file.data_base64, "base64");
  return withDocumentBuffer(buf, file.name, (doc) => extractRecord(doc.nodes, doc.source, config, { logger: log }));
}

// Repeated names get " (2)", " (3)" inserted before the extension, skipping any
// numbered name that was uploaded as well.
export function uniqueNames(files: readonly UploadFile[]): string[] {
  const uploaded = new Set(files.map((f) => f.name));
  const used = new Set<string>();
  const counters = new Map<string, number>();
  return files.map((f) => {
    let name = f.name;
    if (used.has(name)) {
      const ext = path.extname(f.name);
      const base = f.name.slice(0, f.name.length - ext.length);
      let n = counters.get(f.name) ?? 1;
      do {
        n++;
        name = `${base} (${n})${ext}`;
      } while (used.has(name) || uploaded.has(name));
      counters.set(f.name, n);
    }
    used.add(name);
    return name;
  });
}

export async function extractCsv(
  files: readonly UploadFile[],
  config: ExtractionConfig,
  log: Logger,
): Promise<{ csv: string; summary: BatchSummary }> {
  const names = uniqueNames(files);
  const buffers = new Map(names.map((n, i) => [n, Buffer.from(files[i].data_base64, "base64")] as const));
  const open: DocumentOpener = (name, fn) => {
    const buf = buffers.get(name);
    if (!buf) throw new BadRequestError(`unknown upload ${name}`);
    return withDocumentBuffer(buf, name, fn);
  };
  const sink = new MemoryRowSink();
  const summary = await runBatch(names, { config, sink, logger: log, open });
  await sink.close();
  return { csv: sink.toCsv(), summary };
}

/** HTTP status and body for a failed extraction. */
export function errorResponse(e: unknown): { status: number; body: { error: string; message: string } } {
  if (e instanceof BadRequestError) return { status: 400, body: { error: "bad_request", message: e.message } };
  if (e instanceof ExtractionError) return { status: 422, body: { error: e.code, message: e.message } };
  return { status: 500, body: { error: "internal", message: e instanceof Error ? e.message : String(e) } };
}
