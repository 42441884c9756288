import fs from "fs";
import os from "os";
import path from "path";
import { ContentNode, DocumentOpener, getLogger, HeaderNotFoundError, MemoryRowSink } from "@report-extract/core";
import { collectDocuments, readListFile } from "../collect";
import { createProgram, formatSkipped, NoDocumentsError, runExtract } from "../index";

const quiet = getLogger("test", { level: "silent" });

const headerTable = (province: string): ContentNode[] => [
  {
    kind: "table",
    rows: [
      {
        cells: [
          { children: [{ kind: "paragraph", runs: ["PROVINCE"] }] },
          { children: [{ kind: "paragraph", runs: [province] }] },
        ],
      },
    ],
  },
];

// Every path holding "bad" fails like a report without a header table.
const open: DocumentOpener = async (file, fn) => {
  if (file.includes("bad")) throw new HeaderNotFoundError();
  return fn({ source: file, nodes: headerTable(path.basename(file, ".docx")) });
};

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "extract-cli-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("collectDocuments", () => {
  it("finds .docx files recursively, without Word lock files", async () => {
    fs.mkdirSync(path.join(dir, "sub"));
    for (const f of ["b.docx", "~$b.docx", "notes.txt", path.join("sub", "a.docx")]) {
      fs.writeFileSync(path.join(dir, f), "");
    }
    expect(await collectDocuments(dir)).toEqual([path.join(dir, "b.docx"), path.join(dir, "sub", "a.docx")]);
  });
});

describe("readListFile", () => {
  it("returns trimmed non-empty lines", async () => {
    const list = path.join(dir, "list.txt");
    fs.writeFileSync(list, "one.docx\r\n\n  two.docx  \n");
    expect(await readListFile(list)).toEqual(["one.docx", "two.docx"]);
  });
});

describe("formatSkipped", () => {
  it("writes one tab-separated line per document", () => {
    expect(formatSkipped([{ file: "a.docx", code: "UNKNOWN", message: "line 1\n  line 2" }])).toBe(
      "a.docx\tUNKNOWN\tline 1 line 2\n",
    );
  });
});

describe("runExtract", () => {
  it("extracts listed documents and reports the skipped ones", async () => {
    const list = path.join(dir, "list.txt");
    const errors = path.join(dir, "errors.tsv");
    fs.writeFileSync(list, "Gauteng.docx\nbad.docx\n");
    const sink = new MemoryRowSink();

    const summary = await runExtract(
      { dataDir: list, outputFile: "out.csv", list: true, errors },
      { logger: quiet, open, openSink: () => sink },
    );

    expect(summary.processed).toBe(1);
    expect(sink.closed).toBe(true);
    expect(sink.rows.map((r) => r[0])).toEqual(["Province", "Gauteng"]);
    expect(fs.readFileSync(errors, "utf8")).toBe(
      "bad.docx\tHEADER_NOT_FOUND\tNo table in the document contains any of the header terms\n",
    );
  });

  it("fails when the directory holds no documents", async () => {
    const openSink = jest.fn(() => new MemoryRowSink());
    await expect(
      runExtract({ dataDir: dir, outputFile: "out.csv" }, { logger: quiet, open, openSink }),
    ).rejects.toThrow(NoDocumentsError);
    expect(openSink).not.toHaveBeenCalled();
  });

  it("writes a CSV file by default", async () => {
    fs.writeFileSync(path.join(dir, "Limpopo.docx"), "");
    const out = path.join(dir, "out.csv");
    await runExtract({ dataDir: dir, outputFile: out }, { logger: quiet, open });
    const lines = fs.readFileSync(out, "utf8").split("\n");
    expect(lines[1]).toBe(`Limpopo,,,,,,,,,${path.join(dir, "Limpopo.docx")}`);
  });
});

describe("runExtract output", () => {
  it("fails when the output file cannot be opened", async () => {
    fs.writeFileSync(path.join(dir, "Limpopo.docx"), "");
    const outputFile = path.join(dir, "missing", "out.csv");
    await expect(runExtract({ dataDir: dir, outputFile }, { logger: quiet, open })).rejects.toThrow(/ENOENT/);
  });
});

describe("createProgram", () => {
  it("passes arguments and options to the extractor", async () => {
    const list = path.join(dir, "list.txt");
    fs.writeFileSync(list, "a.docx\nb.docx\n");
    const sinks: string[] = [];
    const program = createProgram({
      logger: quiet,
      open,
      openSink: (file) => {
        sinks.push(file);
        return new MemoryRowSink();
      },
    });
    await program.parseAsync([list, "rows.csv", "--list", "--concurrency", "2"], { from: "user" });
    expect(sinks).toEqual(["rows.csv"]);
  });

  it("rejects a concurrency below one", async () => {
    const program = createProgram({ logger: quiet, open })
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });
    await expect(program.parseAsync(["--concurrency", "0"], { from: "user" })).rejects.toThrow(
      "expected a positive integer",
    );
  });
});
