/**
 * Minimal logging surface. `console` satisfies it; tests pass spies.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = console;
