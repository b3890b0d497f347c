export interface Logger {
  debug(message: string, ...params: unknown[]): void;
  info(message: string, ...params: unknown[]): void;
  warn(message: string, ...params: unknown[]): void;
  error(message: string, ...params: unknown[]): void;
}

let verbose = /^true$/i.test(process.env.HUE_VERBOSE || "false");

export function setVerbose(value: boolean) {
  verbose = value;
}

// Everything goes to stderr: stdout belongs to the MCP stdio transport and to CLI output.
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...params) => {
      if (verbose) console.error(prefix, message, ...params);
    },
    info: (message, ...params) => console.error(prefix, message, ...params),
    warn: (message, ...params) => console.error(prefix, "WARN", message, ...params),
    error: (message, ...params) => console.error(prefix, "ERROR", message, ...params),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
