/**
 * Logger interface shared by the engine, the HTTP service and the CLI.
 * Decouples categorization logic from where the output ends up.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Simple console-based logger for local runs.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(`[info] ${message}`),
  warning: (message: string) => console.warn(`[warning] ${message}`),
  error: (message: string) => console.error(`[error] ${message}`),
  debug: (message: string) => console.debug(`[debug] ${message}`),
};

/**
 * Structured JSON logger for container log aggregation.
 * Writes to stderr so stdout stays clean.
 */
export function createJsonLogger(service: string, write: (line: string) => void = line => {
  process.stderr.write(line);
}): Logger {
  const log = (level: string, message: string): void => {
    const entry = JSON.stringify({
      level,
      message,
      timestamp: new Date().toISOString(),
      service,
    });
    write(entry + '\n');
  };

  return {
    info: (message: string) => log('info', message),
    warning: (message: string) => log('warn', message),
    error: (message: string) => log('error', message),
    debug: (message: string) => log('debug', message),
  };
}

/**
 * Logger that discards everything. Default for library callers that pass none.
 */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};
