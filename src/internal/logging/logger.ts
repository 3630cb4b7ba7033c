export interface Logger {
  debug?(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function stamp(): string {
  return new Date().toISOString().slice(11, 23);
}

/** Console logger that prefixes every line with a time and the pipeline phase. */
export function createConsoleLogger(phase: string, options: { debug?: boolean } = {}): Logger {
  const prefix = () => `[${stamp()}] [${phase}]`;
  return {
    debug: options.debug
      ? (...args: unknown[]) => console.debug(prefix(), ...args)
      : undefined,
    info: (...args: unknown[]) => console.log(prefix(), ...args),
    warn: (...args: unknown[]) => console.warn(prefix(), "WARN:", ...args),
    error: (...args: unknown[]) => console.error(prefix(), "ERROR:", ...args),
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};
