export type Logger = {
  debug(message: string, ...context: unknown[]): void;
  info(message: string, ...context: unknown[]): void;
  warn(message: string, ...context: unknown[]): void;
  error(message: string, ...context: unknown[]): void;
};

export type LogSink = Pick<Console, "log" | "info" | "warn" | "error">;

/**
 * Tagged console logger. `debug` output is dropped unless `verbose` is set,
 * so callers can log every store query without checking a flag first.
 */
export function createLogger(opts: { verbose?: boolean; tag?: string; sink?: LogSink } = {}): Logger {
  const sink = opts.sink ?? console;
  const prefix = opts.tag ? `[${opts.tag}]` : "";
  const format = (message: string) => (prefix ? `${prefix} ${message}` : message);

  return {
    debug(message, ...context) {
      if (opts.verbose) sink.log(format(message), ...context);
    },
    info(message, ...context) {
      sink.info(format(message), ...context);
    },
    warn(message, ...context) {
      sink.warn(format(message), ...context);
    },
    error(message, ...context) {
      sink.error(format(message), ...context);
    },
  };
}
