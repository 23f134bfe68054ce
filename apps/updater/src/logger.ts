export interface LoggerOptions {
  /** Send progress lines to stderr, leaving stdout for the rendered README. */
  infoToStderr: boolean;
}

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
}

export function createLogger(opts: LoggerOptions): Logger {
  return {
    info(msg: string): void {
      if (opts.infoToStderr) {
        console.error(msg);
      } else {
        console.log(msg);
      }
    },

    warn(msg: string): void {
      console.warn(msg);
    },
  };
}

export const defaultLogger: Logger = createLogger({ infoToStderr: false });
