export interface Logger {
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    info(message, meta) {
      if (meta) {
        console.log(`${prefix} ${message}`, meta);
        return;
      }
      console.log(`${prefix} ${message}`);
    },
    warn(message, meta) {
      if (meta) {
        console.warn(`${prefix} ${message}`, meta);
        return;
      }
      console.warn(`${prefix} ${message}`);
    },
    error(message, meta) {
      if (meta) {
        console.error(`${prefix} ${message}`, meta);
        return;
      }
      console.error(`${prefix} ${message}`);
    }
  };
}
