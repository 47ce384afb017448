/**
 * Type declarations for @jitsi/logger module
 * Custom type definitions since no official @types package exists
 */
declare module '@jitsi/logger' {
  export interface Logger {
    trace(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    log(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
  }

  export function getLogger(id?: string): Logger;
  export function setLogLevel(level: string): void;

}
