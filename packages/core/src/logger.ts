/**
 * Minimal logging contract used by library code.
 * The CLI supplies a coloured console implementation.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
}
