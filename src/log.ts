export const DEBUG_ENV = "transcode-bench";

export interface Logger {
  info(message: string): void;
  debug(message: string): void;
  error(message: string, err?: unknown): void;
}

export function debugFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.DEBUG === DEBUG_ENV;
}

export function createLogger(
  stream: NodeJS.WritableStream = process.stderr,
  debug = false,
): Logger {
  return {
    info(message) {
      stream.write(message + "\n");
    },
    debug(message) {
      if (debug) stream.write(message + "\n");
    },
    error(message, err) {
      stream.write(`error: ${message}\n`);
      if (debug && err instanceof Error && err.stack) {
        stream.write(err.stack + "\n");
      }
    },
  };
}

/** Discards everything; handy for library callers that want silence. */
export const silentLogger: Logger = {
  info() {},
  debug() {},
  error() {},
};
