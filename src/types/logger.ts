/**
 * Minimal logger accepted by the file workflows; `console` satisfies it.
 */
export interface Logger {
  log: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}
