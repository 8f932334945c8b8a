import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

// Sources run from src/utils, builds from dist/src/utils; schemas/ sits beside package.json.
const detectAssetRoot = (): string => {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const candidates = [resolve(moduleDir, "..", ".."), resolve(moduleDir, "..", "..", "..")];
  const match = candidates.find((candidate) => existsSync(resolve(candidate, "package.json")));
  return match ?? process.cwd();
};

const ASSET_ROOT = detectAssetRoot();

export const resolveAssetPath = (...segments: string[]): string => resolve(ASSET_ROOT, ...segments);
