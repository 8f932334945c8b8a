import { createHash } from "node:crypto";

import { canonicalStringify } from "./canonical-json.js";

export const sha256Hex = (data: string | Buffer): string =>
  createHash("sha256").update(data).digest("hex");

export const sha256CanonicalHex = (value: unknown): string => sha256Hex(canonicalStringify(value));
