import { existsSync, readFileSync, renameSync, writeFileSync } from "node:fs";

export const readJsonFile = (path: string): unknown => {
  if (!existsSync(path)) {
    throw new Error(`File not found: ${path}`);
  }
  const raw = readFileSync(path, "utf8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Malformed JSON in ${path}: ${reason}`);
  }
};

export const writeJsonAtomic = (path: string, data: unknown): void => {
  const tmpPath = `${path}.tmp`;
  writeFileSync(tmpPath, `${JSON.stringify(data, null, 2)}\n`, "utf8");
  renameSync(tmpPath, path);
};
