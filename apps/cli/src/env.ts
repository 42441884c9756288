import dotenv from "dotenv";
import path from "path";
import fs from "fs";

// Repo root .env first (seen from src/ or from dist/), then the working directory's
export function loadEnv(): void {
  const rootEnv = ["../../../.env", "../../../../.env"]
    .map((rel) => path.resolve(__dirname, rel))
    .find((file) => fs.existsSync(file));
  if (rootEnv) dotenv.config({ path: rootEnv });
  dotenv.config();
}
