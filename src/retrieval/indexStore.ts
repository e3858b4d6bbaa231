import { promises as fs } from "node:fs";
import path from "node:path";

import { IndexUnavailableError } from "../errors.js";
import { VectorIndex } from "./vectorIndex.js";

export async function saveIndex(filePath: string, index: VectorIndex): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(index.serialize()), "utf-8");
  await fs.rename(tmpPath, filePath);
}

export async function loadIndex(filePath: string): Promise<VectorIndex> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      throw new IndexUnavailableError(
        `Index not found: ${filePath}\nRun: citeseek ingest <url...>`,
        { cause: err }
      );
    }
    throw new IndexUnavailableError(`Index unreadable: ${filePath}`, { cause: err });
  }

  let blob: unknown;
  try {
    blob = JSON.parse(raw);
  } catch (err: unknown) {
    throw new IndexUnavailableError(`Index is not valid JSON: ${filePath}`, { cause: err });
  }
  return VectorIndex.restore(blob);
}
