import dotenv from "dotenv";
import path from "path";
import fs from "fs";
import { getLogger, loadExtractionConfig } from "@report-extract/core";
import { createApp } from "./app";

// Repo root .env first (seen from src/ or from dist/), then the working directory's
(() => {
  const rootEnv = ["../../../.env", "../../../../.env"]
    .map((rel) => path.resolve(__dirname, rel))
    .find((file) => fs.existsSync(file));
  if (rootEnv) dotenv.config({ path: rootEnv });
  dotenv.config();
})();

const logger = getLogger("api");
const API_PORT = Number(process.env.API_PORT ?? 3001);

const config = loadExtractionConfig(process.env.EXTRACT_CONFIG);
const app = createApp({ config, logger, bodyLimit: process.env.BODY_LIMIT ?? "20mb" });

app.listen(API_PORT, () => {
  logger.info("api.listen", { port: API_PORT, config: config.id });
});
