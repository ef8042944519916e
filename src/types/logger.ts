/**
 * Logger port used by every stage and collaborator.
 *
 * Mirrors the subset of Pino's API the regulator needs, so stages can be
 * exercised with a mock and wired to pino in production.
 */
export interface Logger {
  trace(obj: object, msg?: string): void;
  trace(msg: string): void;
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;

  /** Create a child logger bound to a stage or component */
  child(bindings: Record<string, unknown>): Logger;
}
