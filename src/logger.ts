/**
 * Diagnostics go to stderr so that stdout carries only results
 * (dry-run previews, the final summary).
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.error(message),
  warn: (message) => console.error(`Warning: ${message}`),
  error: (message) => console.error(`Error: ${message}`),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
