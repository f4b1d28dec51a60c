/* eslint-disable no-console */
// Console output mirrors structured logs locally; Better Stack shipping is opt-in.
import { parseBooleanFlag, resolveEnvironment, type RuntimeEnv } from "./env.ts";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type LoggerMetadata = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "fatal"];

type LoggerOptions = {
  module: string;
};

type LogtailAdapter = {
  log: (level: LogLevel, message: string, metadata: LoggerMetadata) => Promise<void>;
  flush: () => Promise<void>;
};

type LoggingSettings = {
  environment: string;
  minLevel: LogLevel;
  logtailToken: string;
  logtailEnabled: boolean;
};

const SENSITIVE_KEYS = ["password", "token", "secret", "authorization", "auth"];

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);

const resolveSettings = (env: RuntimeEnv): LoggingSettings => {
  const environment = resolveEnvironment(env);
  const isProductionLike = environment === "production" || environment === "staging";
  const logtailToken = env.BETTER_STACK_TOKEN ?? "";
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  return {
    environment,
    minLevel: isLogLevel(level) ? level : "info",
    logtailToken,
    logtailEnabled:
      Boolean(logtailToken) &&
      (isProductionLike || parseBooleanFlag(env.ENABLE_BETTER_STACK_IN_DEV, false)),
  };
};

let settings: LoggingSettings = resolveSettings(process.env);

let logtailInstance: Promise<LogtailAdapter | null> | null = null;

/** Re-reads logging settings, e.g. after `.env` has been loaded. */
export const configureLogging = (env: RuntimeEnv, overrides: { level?: LogLevel } = {}): void => {
  settings = resolveSettings(env);
  if (overrides.level) {
    settings.minLevel = overrides.level;
  }
  logtailInstance = null;
};

const consoleWriters: Record<LogLevel, (message: string, metadata: LoggerMetadata) => void> = {
  debug: (message, metadata) => console.debug(message, metadata),
  info: (message, metadata) => console.info(message, metadata),
  warn: (message, metadata) => console.warn(message, metadata),
  error: (message, metadata) => console.error(message, metadata),
  fatal: (message, metadata) => console.error(message, metadata),
};

export const redactMetadata = (value: unknown): unknown => {
  if (value == null) {
    return value;
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactMetadata(item));
  }
  if (typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, nestedValue] of Object.entries(value)) {
      const lowerKey = key.toLowerCase();
      result[key] = SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey))
        ? "[redacted]"
        : redactMetadata(nestedValue);
    }
    return result;
  }
  return value;
};

const loadLogtail = (): Promise<LogtailAdapter | null> => {
  if (!settings.logtailEnabled) {
    return Promise.resolve(null);
  }
  if (logtailInstance) {
    return logtailInstance;
  }

  const token = settings.logtailToken;
  logtailInstance = (async () => {
    try {
      const { Logtail } = await import("@logtail/node");
      const client = new Logtail(token);
      const adapter: LogtailAdapter = {
        log: async (level, message, metadata) => {
          switch (level) {
            case "debug":
              await client.debug(message, metadata);
              break;
            case "info":
              await client.info(message, metadata);
              break;
            case "warn":
              await client.warn(message, metadata);
              break;
            default:
              await client.error(message, metadata);
          }
        },
        flush: async () => {
          await client.flush();
        },
      };
      return adapter;
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();
  return logtailInstance;
};

const emitLogtail = async (level: LogLevel, message: string, metadata: LoggerMetadata) => {
  try {
    const instance = await loadLogtail();
    await instance?.log(level, message, metadata);
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const createEmitter =
  ({ module }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(settings.minLevel)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const redacted = redactMetadata(metadata);
    const enrichedMetadata: LoggerMetadata = {
      ...(typeof redacted === "object" && redacted !== null ? redacted : {}),
      module,
      environment: settings.environment,
      timestamp,
      level,
    };

    consoleWriters[level](`[${timestamp}] [${level.toUpperCase()}] ${message}`, enrichedMetadata);

    if (settings.logtailEnabled) {
      void emitLogtail(level, message, enrichedMetadata);
    }
  };

export const createLogger = (options: LoggerOptions) => {
  const flush = async () => {
    try {
      const instance = await loadLogtail();
      await instance?.flush();
    } catch (error) {
      console.error("Failed to flush logs to Better Stack", error);
    }
  };

  return {
    debug: createEmitter(options, "debug"),
    info: createEmitter(options, "info"),
    warn: createEmitter(options, "warn"),
    error: createEmitter(options, "error"),
    fatal: createEmitter(options, "fatal"),
    flush,
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (module: string): Logger => {
  const cached = loggerCache.get(module);
  if (cached) {
    return cached;
  }
  const logger = createLogger({ module });
  loggerCache.set(module, logger);
  return logger;
};
