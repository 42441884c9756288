import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { ExtractionConfig, getLogger, headerRow, Logger, recordToJSON, toRow } from "@report-extract/core";
import { errorResponse, extractCsv, extractUpload, readUpload, readUploads } from "./handlers";

export interface AppOptions {
  config: ExtractionConfig;
  logger?: Logger;
  bodyLimit?: string;
}

function requestId(req: Request, res: Response): string {
  const id = res.locals.req_id;
  return typeof id === "string" ? id : String(req.headers["x-request-id"] ?? "");
}

export function createApp({ config, logger = getLogger("api"), bodyLimit = "20mb" }: AppOptions) {
  const app = express();
  app.use(express.json({ limit: bodyLimit }));
  app.use(cors());
  app.use(helmet());
  // Only failed requests are worth a line
  app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  app.use((req: Request, res: Response, next: NextFunction) => {
    // Attach a simple request id for correlation if provided or create one
    const header = req.headers["x-request-id"];
    res.locals.req_id = typeof header === "string" && header ? header : uuidv4();
    next();
  });

  app.get("/health", (_req: Request, res: Response) => res.json({ ok: true }));

  app.get("/columns", (_req: Request, res: Response) => res.json({ config_id: config.id, columns: headerRow(config) }));

  // POST /extract { name, data_base64 } -> record of one .docx
  app.post("/extract", async (req: Request, res: Response) => {
    const request_id = requestId(req, res);
    const log = logger.child({ request_id });
    try {
      const file = readUpload(req.body);
      const record = await extractUpload(file, config, log.child({ file: file.name }));
      log.info("extract.done", { file: file.name });
      res.json({ request_id, record: recordToJSON(record), row: toRow(record, config) });
    } catch (e) {
      const { status, body } = errorResponse(e);
      log.warn("extract.error", { status, ...body });
      res.status(status).json({ request_id, ...body });
    }
  });

  // POST /extract/csv { files: [{ name, data_base64 }] } -> text/csv
  app.post("/extract/csv", async (req: Request, res: Response) => {
    const request_id = requestId(req, res);
    const log = logger.child({ request_id });
    try {
      const files = readUploads(req.body);
      const { csv, summary } = await extractCsv(files, config, log);
      log.info("extract.csv.done", { files: files.length, processed: summary.processed, skipped: summary.skipped.length });
      res
        .status(200)
        .set("x-skipped-count", String(summary.skipped.length))
        .type("text/csv")
        .send(csv);
    } catch (e) {
      const { status, body } = errorResponse(e);
      log.warn("extract.csv.error", { status, ...body });
      res.status(status).json({ request_id, ...body });
    }
  });

  return app;
}
