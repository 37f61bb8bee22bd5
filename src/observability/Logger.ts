export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

/** Receives every formatted line the logger lets through. */
export type LogWriter = (level: Exclude<LogLevel, "silent">, line: string) => void;

export interface LoggerOptions {
  enabled?: boolean;
  level?: LogLevel;
  /** Log prompts and raw model output (can be large) */
  includePrompts?: boolean;
  /** Log dispatch results */
  includeResults?: boolean;
  prefix?: string;
  /** Defaults to the console method matching the level */
  write?: LogWriter;
}

export interface ResolvedLoggerOptions {
  enabled: boolean;
  level: LogLevel;
  includePrompts: boolean;
  includeResults: boolean;
  prefix: string;
  write: LogWriter;
}

export interface Logger {
  options: ResolvedLoggerOptions;
  isEnabled(level: LogLevel): boolean;
  child(prefix: string): Logger;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  trace(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export const consoleWriter: LogWriter = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "info":
      console.info(line);
      break;
    default:
      console.log(line);
      break;
  }
};

/** Every level to stderr, so stdout carries only command output. */
export const stderrWriter: LogWriter = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const resolved = resolveLoggerOptions(options);

  const log = (level: Exclude<LogLevel, "silent">, message: string, meta?: Record<string, unknown>) => {
    if (!resolved.enabled) return;
    if (LEVEL_ORDER[level] > LEVEL_ORDER[resolved.level]) return;

    const metaText = meta ? ` ${sanitizeForLog(meta, 1000)}` : "";
    resolved.write(level, `[${resolved.prefix}] [${level.toUpperCase()}] ${message}${metaText}`);
  };

  return {
    options: resolved,
    isEnabled: (level) => resolved.enabled && LEVEL_ORDER[level] <= LEVEL_ORDER[resolved.level],
    child: (prefix) => createLogger({ ...resolved, prefix: `${resolved.prefix}:${prefix}` }),
    error: (message, meta) => log("error", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    info: (message, meta) => log("info", message, meta),
    debug: (message, meta) => log("debug", message, meta),
    trace: (message, meta) => log("trace", message, meta),
  };
}

export function resolveLoggerOptions(options: LoggerOptions = {}): ResolvedLoggerOptions {
  const envLevel = parseEnvLogLevel();
  const enabledFromEnv = envLevel !== undefined && envLevel !== "silent";
  const enabled = options.enabled ?? enabledFromEnv;
  const level = options.level ?? envLevel ?? (enabled ? "info" : "silent");

  return {
    enabled,
    level,
    includePrompts: options.includePrompts ?? false,
    includeResults: options.includeResults ?? false,
    prefix: options.prefix ?? "agent-tick",
    write: options.write ?? consoleWriter,
  };
}

export function sanitizeForLog(value: unknown, maxLen = 500): string {
  const str = safeStringify(value, maxLen);
  return str.replace(
    /"(password|token|secret|key|auth|apiKey|api_key)":\s*"[^"]*"/gi,
    "\"$1\":\"[REDACTED]\"",
  );
}

export function summarizeForLog(value: unknown, maxLen = 200): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    return value.length > maxLen ? `${value.slice(0, maxLen)}...` : value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `Array(${value.length})`;
  }
  if (typeof value === "object") {
    const keys = Object.keys(value);
    const shown = keys.slice(0, 5).join(", ");
    return `Object(keys: ${shown}${keys.length > 5 ? ", ..." : ""})`;
  }
  return String(value);
}

function safeStringify(value: unknown, maxLen: number): string {
  try {
    const json = JSON.stringify(value);
    if (!json) return String(value);
    return json.length > maxLen ? `${json.slice(0, maxLen)}...` : json;
  } catch {
    const fallback = String(value);
    return fallback.length > maxLen ? `${fallback.slice(0, maxLen)}...` : fallback;
  }
}

function parseEnvLogLevel(): LogLevel | undefined {
  const raw = process.env.AGENT_LOG_LEVEL ?? process.env.DEBUG;

  if (!raw) return undefined;
  const value = raw.trim().toLowerCase();
  if (!value || value === "0" || value === "false" || value === "off") {
    return "silent";
  }
  if (value.includes("trace")) return "trace";
  if (value.includes("debug") || value === "1" || value === "true" || value === "yes") {
    return "debug";
  }
  if (value.includes("info")) return "info";
  if (value.includes("warn")) return "warn";
  if (value.includes("error")) return "error";
  if (value.includes("silent")) return "silent";
  return "debug";
}
