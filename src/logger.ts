import pino from "pino";

export type LoggerOptions = {
  /** Explicit level; wins over `verbose` and `LOG_LEVEL`. */
  readonly level?: string;
  /** Shorthand for the `debug` level, used by the `--verbose` flag. */
  readonly verbose?: boolean;
};

/**
 * Structured JSON logger on stdout with string level labels and ISO
 * timestamps. The level comes from the options, then `LOG_LEVEL`, then
 * defaults to `info`.
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const level =
    options.level ?? (options.verbose ? "debug" : process.env["LOG_LEVEL"] || "info");

  return pino({
    name: "feedmill",
    level,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
