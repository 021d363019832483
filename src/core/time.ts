/**
 * Get current Unix timestamp in milliseconds
 */
export function nowMs(): number {
  return Date.now();
}

/**
 * Milliseconds elapsed since `startMs`
 */
export function elapsedMs(startMs: number): number {
  return Date.now() - startMs;
}
