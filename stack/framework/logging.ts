export type LogOutput = (message: string) => void;

// Diagnostics go to stderr so they never interleave with menu/table output on stdout
const defaultOutput: LogOutput = (message) => {
  console.error(message);
};

const colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

type LogLevel = "info" | "success" | "warn" | "error";

const levelStyles: Record<LogLevel, { icon: string; color: string }> = {
  info: { icon: "→", color: colors.cyan },
  success: { icon: "✓", color: colors.green },
  warn: { icon: "⚠", color: colors.yellow },
  error: { icon: "✗", color: colors.red },
};

export const ANSI_PATTERN = /\x1b\[[0-9;]*m/gu;

function formatData(data?: Record<string, unknown>): string {
  if (!data || Object.keys(data).length === 0) {
    return "";
  }
  const values = Object.values(data);
  if (values.length === 1) {
    return ` → ${String(values[0])}`;
  }
  const pairs = Object.entries(data).map(([key, val]) => `${key}=${String(val)}`);
  return ` → ${pairs.join(", ")}`;
}

export interface PrefixLogger {
  log: (msg: string, data?: Record<string, unknown>) => void;
  success: (msg: string, data?: Record<string, unknown>) => void;
  warn: (msg: string, data?: Record<string, unknown>) => void;
  error: (msg: string, data?: Record<string, unknown>) => void;
  child: (prefix: string) => PrefixLogger;
}

export interface LoggerOptions {
  color?: boolean;
}

export function createPrefixLogger(
  prefix: string,
  output: LogOutput = defaultOutput,
  options: LoggerOptions = {},
): PrefixLogger {
  const color = options.color ?? true;

  const logAt =
    (level: LogLevel) =>
    (msg: string, data?: Record<string, unknown>): void => {
      const style = levelStyles[level];
      const icon = color ? `${style.color}${style.icon}${colors.reset}` : style.icon;
      const tag = color ? `${colors.dim}[${prefix}]${colors.reset}` : `[${prefix}]`;
      output(`${icon} ${tag} ${msg}${formatData(data)}`);
    };

  return {
    log: logAt("info"),
    success: logAt("success"),
    warn: logAt("warn"),
    error: logAt("error"),
    child: (sub) => createPrefixLogger(`${prefix}:${sub}`, output, options),
  };
}
