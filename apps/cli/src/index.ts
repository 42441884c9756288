import { Command, InvalidArgumentError } from "commander";
import fs from "fs/promises";
import {
  BatchSummary,
  CsvWriter,
  DocumentOpener,
  getLogger,
  loadExtractionConfig,
  Logger,
  RowSink,
  runBatch,
  SkippedDocument,
} from "@report-extract/core";
import { collectDocuments, readListFile } from "./collect";

export interface ExtractArgs {
  dataDir: string;
  outputFile: string;
  // dataDir is a text file listing document paths
  list?: boolean;
  config?: string;
  errors?: string;
  concurrency?: number;
}

export interface ExtractDeps {
  logger?: Logger;
  openSink?: (file: string) => RowSink;
  open?: DocumentOpener;
}

export class NoDocumentsError extends Error {
  constructor(where: string) {
    super(`No .docx files found in ${where}`);
    this.name = "NoDocumentsError";
  }
}

export function formatSkipped(skipped: readonly SkippedDocument[]): string {
  return skipped.map((s) => `${s.file}\t${s.code}\t${s.message.replace(/\s+/g, " ")}\n`).join("");
}

export async function runExtract(args: ExtractArgs, deps: ExtractDeps = {}): Promise<BatchSummary> {
  const log = deps.logger ?? getLogger("cli");
  const config = loadExtractionConfig(args.config);

  log.info("Parsing docx files...", { source: args.dataDir, list: !!args.list, config: config.id });
  const files = args.list ? await readListFile(args.dataDir) : await collectDocuments(args.dataDir);
  if (files.length === 0) throw new NoDocumentsError(args.dataDir);
  log.info(`Found ${files.length} docx files`);

  const sink = (deps.openSink ?? ((f: string) => new CsvWriter(f)))(args.outputFile);
  let summary: BatchSummary;
  try {
    summary = await runBatch(files, {
      config,
      sink,
      logger: log,
      concurrency: args.concurrency,
      open: deps.open,
    });
  } finally {
    await sink.close();
  }

  if (args.errors) await fs.writeFile(args.errors, formatSkipped(summary.skipped), "utf8");
  log.info("extract.done", { output: args.outputFile, processed: summary.processed, skipped: summary.skipped.length });
  return summary;
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

interface CliOptions {
  list?: boolean;
  config?: string;
  errors?: string;
  concurrency: number;
}

export function createProgram(deps: ExtractDeps = {}): Command {
  const env = process.env;
  return new Command()
    .name("report-extract")
    .description("Extracts data from word files in a directory")
    .argument("[data_dir]", "directory searched for .docx files", env.DATA_DIR ?? "./data")
    .argument("[output_file]", "CSV file to write", env.OUTPUT_FILE ?? "out.csv")
    .option("-l, --list", "the data_dir path is a file with a list of paths to process")
    .option("-c, --config <file>", "extraction config JSON (labels and sections)", env.EXTRACT_CONFIG)
    .option("-e, --errors <file>", "write skipped documents and reasons to this file", env.ERRORS_FILE)
    .option("--concurrency <n>", "documents parsed at once", positiveInt, 1)
    .action(async (dataDir: string, outputFile: string, options: CliOptions) => {
      await runExtract({ dataDir, outputFile, ...options }, deps);
    });
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const log = getLogger("cli");
  try {
    await createProgram({ logger: log }).parseAsync(argv);
  } catch (e) {
    log.error("extract.failed", { error: e instanceof Error ? e.message : String(e) });
    process.exitCode = 1;
  }
}
