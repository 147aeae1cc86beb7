/**
 * Minimal logger contract accepted by the boundary, the executor and the CLI
 */

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export const noopLogger: Logger = {
  debug() { /* no-op */ },
  info() { /* no-op */ },
  warn() { /* no-op */ },
  error() { /* no-op */ },
};
