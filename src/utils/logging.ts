import {
  pino,
  type DestinationStream,
  type Logger as PinoLogger,
  type LoggerOptions,
} from "pino";
import type { Logger } from "../types/logger.js";

type LogContext = Record<string, unknown>;

const SECRET_FIELDS = ["clientSecret", "password", "certificatePassword"];

// Top-level context fields and one level of nesting, e.g. `settings.password`.
export const REDACTED_PATHS = SECRET_FIELDS.flatMap((field) => [
  field,
  `*.${field}`,
]);

/** Wraps a pino instance in the message-first `Logger` shape. */
export function fromPino(pinoLogger: PinoLogger): Logger {
  const write =
    (level: "debug" | "info" | "warn" | "error") =>
    (message: string, context?: LogContext) =>
      pinoLogger[level](context, message);

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    child: (context: LogContext) => fromPino(pinoLogger.child(context)),
  };
}

/**
 * Builds the default pino logger. Level comes from `LOG_LEVEL`; output is
 * pretty-printed under `NODE_ENV=development` unless a destination is given.
 */
export function createLogger(destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    name: "azure-authorizer",
    level: process.env.LOG_LEVEL || "info",
    redact: REDACTED_PATHS,
  };

  if (destination) {
    return fromPino(pino(options, destination));
  }

  return fromPino(
    pino({
      ...options,
      ...(process.env.NODE_ENV === "development" && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      }),
    }),
  );
}

let rootLogger: Logger | undefined;

export function getLogger(component?: string): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return component ? childLogger(rootLogger, { component }) : rootLogger;
}

export function childLogger(logger: Logger, context: LogContext): Logger {
  return logger.child?.(context) || logger;
}

export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
