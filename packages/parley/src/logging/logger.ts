import { type ILogObj, Logger } from "tslog";

const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export type LogFormat = "pretty" | "json" | "hidden";

/**
 * Keys whose values never reach a log line. Compared case-insensitively.
 */
export const SENSITIVE_LOG_KEYS = [
  "password",
  "token",
  "apikey",
  "api_key",
  "secret",
  "authorization",
  "supabase_key",
  "tavily_api_key",
  "jwt_secret",
];

const SENSITIVE_VALUE_PATTERNS = [
  /Bearer\s+[^\s"']+/gi,
  /(api[_-]?key|token|password|secret)\s*[:=]\s*[^\s,}"']+/gi,
];

export const REDACTED_PLACEHOLDER = "***REDACTED***";

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

/**
 * Level name ("debug") or number (0..6, clamped) to a tslog level id.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LEVEL_NAME_TO_ID[normalized];
}

export function parseLogFormat(value?: string): LogFormat | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "pretty" || normalized === "json" || normalized === "hidden") {
    return normalized;
  }
  return undefined;
}

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default PARLEY_LOG_LEVEL, else 4 (warn)
   */
  minLevel?: number;

  /**
   * 'pretty' for terminals, 'json' for log collectors
   * @default PARLEY_LOG_FORMAT, else 'pretty'
   */
  type?: LogFormat;

  /** @default "parley" */
  name?: string;
}

/**
 * Create a new logger instance.
 *
 * Values under {@link SENSITIVE_LOG_KEYS} and bearer tokens inside strings are
 * replaced with {@link REDACTED_PLACEHOLDER} before any transport sees them.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ type: 'json', minLevel: 3 });
 * const silent = createLogger({ type: 'hidden' });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const type = options.type ?? parseLogFormat(process.env.PARLEY_LOG_FORMAT) ?? "pretty";

  return new Logger<ILogObj>({
    name: options.name ?? "parley",
    minLevel: options.minLevel ?? parseLogLevel(process.env.PARLEY_LOG_LEVEL) ?? 4,
    type,
    hideLogPositionForProduction: type !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    maskPlaceholder: REDACTED_PLACEHOLDER,
    maskValuesOfKeys: SENSITIVE_LOG_KEYS,
    maskValuesOfKeysCaseInsensitive: true,
    maskValuesRegEx: SENSITIVE_VALUE_PATTERNS,
  });
}
