/**
 * Check if quiet mode is enabled
 */
export function isQuiet(): boolean {
  return process.env.QUIET === 'true';
}

/**
 * Print message unless quiet mode is on
 */
export function normalLog(...args: unknown[]): void {
  if (!isQuiet()) {
    console.log(...args);
  }
}

/**
 * Print minimal output for scripts (always shown, even in quiet mode)
 */
export function outputResult(data: unknown): void {
  console.log(typeof data === 'string' ? data : JSON.stringify(data));
}
