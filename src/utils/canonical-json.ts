const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const canonicalizeValue = (value: unknown): string => {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalizeValue(item)).join(",")}]`;
  }

  if (!isPlainObject(value)) {
    return JSON.stringify(value);
  }

  const body = Object.keys(value)
    .filter((key) => value[key] !== undefined)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalizeValue(value[key])}`)
    .join(",");

  return `{${body}}`;
};

/** Key-sorted, whitespace-free JSON; equal values always produce equal strings. */
export const canonicalStringify = (value: unknown): string => canonicalizeValue(value);

export const canonicallyEqual = (a: unknown, b: unknown): boolean =>
  canonicalStringify(a) === canonicalStringify(b);
