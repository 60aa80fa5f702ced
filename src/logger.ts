/* eslint-disable no-console */
/**
 * Console logger. Everything but `error` is silent unless STEGO_DEBUG=1.
 * Callers never pass payload bytes.
 */

function isDebug(): boolean {
  return process.env.STEGO_DEBUG === "1";
}

export function log(...args: unknown[]): void {
  if (isDebug()) console.log(...args);
}

export const info = log;

export const debug = log;

export function warn(...args: unknown[]): void {
  if (isDebug()) console.warn(...args);
}

/**
 * Always printed, debug flag or not.
 */
export function error(...args: unknown[]): void {
  console.error(...args);
}
