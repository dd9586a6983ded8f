import pino from "pino";

export type Logger = pino.Logger;

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function defaultLevel(): string {
  return (
    process.env.LOG_LEVEL ??
    (process.env.NODE_ENV === "test" ? "silent" : "info")
  );
}

// stderr, so CLI output on stdout stays machine-readable.
export const logger: Logger = pino(
  { name: "decision-vault", level: defaultLevel() },
  pino.destination(2)
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
