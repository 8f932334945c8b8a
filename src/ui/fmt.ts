export type FormatterStream = {
  isTTY?: boolean;
  columns?: number;
};

export type FormatterOptions = {
  stream?: FormatterStream;
  env?: NodeJS.ProcessEnv;
};

export type StatusLevel = "success" | "warn" | "error" | "info";

const RESET = "\x1b[0m";

const isTruthyEnv = (value: string | undefined): boolean =>
  typeof value === "string" && value !== "0" && value.trim().length > 0;

const shouldUseColor = (stream: FormatterStream | undefined, env: NodeJS.ProcessEnv): boolean => {
  if (isTruthyEnv(env.CLICOLOR_FORCE)) {
    return true;
  }
  if (isTruthyEnv(env.NO_COLOR)) {
    return false;
  }
  if (env.CLICOLOR === "0") {
    return false;
  }
  return Boolean(stream?.isTTY);
};

type ColorKey = "brand" | "accent" | "success" | "error" | "warn" | "info" | "muted" | "bold";

const COLOR_CODES: Record<ColorKey, string> = {
  brand: "\x1b[36m",
  accent: "\x1b[33m",
  success: "\x1b[32m",
  error: "\x1b[31m",
  warn: "\x1b[33m",
  info: "\x1b[36m",
  muted: "\x1b[90m",
  bold: "\x1b[1m"
};

const PLAIN_PREFIX: Record<StatusLevel, string> = {
  success: "OK",
  warn: "WARN",
  error: "ERROR",
  info: "INFO"
};

const SYMBOLS: Record<StatusLevel, string> = {
  success: "✔",
  warn: "▲",
  error: "✖",
  info: "●"
};

const normalizeWidth = (width: number): number => Math.max(24, Math.min(width, 78));

export type Formatter = {
  isTTY: boolean;
  isColorEnabled: boolean;
  accent: (value: string) => string;
  muted: (value: string) => string;
  success: (value: string) => string;
  header: (title: string, width?: number) => string;
  kv: (key: string, value: string, keyWidth?: number) => string;
  statusChip: (label: string, level: StatusLevel, detail?: string) => string;
  warnBlock: (message: string) => string;
  errorBlock: (message: string, suggestion?: string) => string;
};

export const createFormatter = (options?: FormatterOptions): Formatter => {
  const stream = options?.stream ?? process.stdout;
  const env = options?.env ?? process.env;

  const tty = Boolean(stream.isTTY);
  const colorEnabled = shouldUseColor(stream, env);

  const color = (key: ColorKey, value: string): string =>
    colorEnabled ? `${COLOR_CODES[key]}${value}${RESET}` : value;

  const symbol = (level: StatusLevel): string => (tty ? SYMBOLS[level] : PLAIN_PREFIX[level]);

  const divider = (width?: number): string =>
    color("muted", (tty ? "─" : "-").repeat(normalizeWidth(width ?? stream.columns ?? 80)));

  return {
    isTTY: tty,
    isColorEnabled: colorEnabled,
    accent: (value) => color("accent", value),
    muted: (value) => color("muted", value),
    success: (value) => color("success", value),
    header: (title, width) => {
      if (!tty) {
        return title;
      }
      return `${color("bold", color("brand", title))}\n${divider(width)}`;
    },
    kv: (key, value, keyWidth = 18) => {
      if (!tty) {
        return `${key}: ${value}`;
      }
      return `${color("muted", key.padEnd(keyWidth))} ${value}`;
    },
    statusChip: (label, level, detail) => {
      const detailText = detail ? ` ${color("muted", detail)}` : "";
      return `${color(level, symbol(level))} ${label}${detailText}`;
    },
    warnBlock: (message) => {
      if (!tty) {
        return `warn: ${message}`;
      }
      return `${color("warn", `${symbol("warn")} warn:`)} ${message}`;
    },
    errorBlock: (message, suggestion) => {
      const head = tty ? `${color("error", `${symbol("error")} error:`)} ${message}` : `error: ${message}`;
      if (!suggestion) {
        return head;
      }
      return `${head}\n${color("muted", suggestion)}`;
    }
  };
};

export const createStdoutFormatter = (): Formatter =>
  createFormatter({ stream: process.stdout, env: process.env });

export const createStderrFormatter = (): Formatter =>
  createFormatter({ stream: process.stderr, env: process.env });
