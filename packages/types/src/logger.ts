/**
 * Sink for progress and diagnostic messages. The CLI supplies one writing tagged
 * lines to stderr; library code defaults to silence.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const ignore = (_message: string): void => undefined;

export const silentLogger: Logger = {
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
};
