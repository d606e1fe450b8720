// Component-scoped console logging.
// Lines look like: [INFO] [SegmentPipeline] message

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export function createLogger(component: string): Logger {
  const prefix = (level: string) => `[${level}] [${component}]`;
  return {
    info: (msg, ...args) => console.log(`${prefix("INFO")} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix("WARN")} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix("ERROR")} ${msg}`, ...args),
    debug: (msg, ...args) => {
      if (process.env.DEBUG) console.debug(`${prefix("DEBUG")} ${msg}`, ...args);
    },
  };
}
