const VERSION_LABEL_PATTERN = /^v(0|[1-9][0-9]*)$/;

export const LATEST = "latest";

export const parseVersionLabel = (label: string): number | null => {
  const match = VERSION_LABEL_PATTERN.exec(label);
  if (!match) {
    return null;
  }
  const value = Number(match[1]);
  return Number.isSafeInteger(value) ? value : null;
};

export const formatVersionLabel = (index: number): string => {
  if (!Number.isSafeInteger(index) || index < 0) {
    throw new Error(`Invalid version index: ${index}`);
  }
  return `v${index}`;
};

export const isVersionLabel = (label: string): boolean => parseVersionLabel(label) !== null;

export const compareVersionLabels = (a: string, b: string): number => {
  const left = parseVersionLabel(a);
  const right = parseVersionLabel(b);
  if (left === null || right === null) {
    throw new Error(`Invalid version label: ${left === null ? a : b}`);
  }
  return left - right;
};

/** One past the highest suffix in use, so a gap is never refilled. */
export const nextVersionLabel = (labels: readonly string[]): string => {
  let highest = -1;
  for (const label of labels) {
    const value = parseVersionLabel(label);
    if (value === null) {
      throw new Error(`Invalid version label: ${label}`);
    }
    highest = Math.max(highest, value);
  }
  return formatVersionLabel(highest + 1);
};
