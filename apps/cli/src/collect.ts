import { glob } from "glob";
import fs from "fs/promises";
import path from "path";

/** Every .docx under `dir`, sorted; Word's "~$" lock files are left out. */
export async function collectDocuments(dir: string): Promise<string[]> {
  const found = await glob("**/*.docx", { cwd: dir, nodir: true, ignore: ["**/~$*"] });
  return found.map((f) => path.join(dir, f)).sort();
}

/** Paths listed one per line; blank lines are skipped. */
export async function readListFile(file: string): Promise<string[]> {
  const raw = await fs.readFile(file, "utf8");
  return raw
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}
