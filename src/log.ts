const warned = new Set<string>();

/**
 * Log a warning the first time `key` is seen. Per-frame clamps would
 * otherwise repeat the same line sixty times a second.
 */
export function warnOnce(key: string, message: string): void {
  if (warned.has(key)) return;
  warned.add(key);
  console.warn(message);
}

/** Forget every key passed to warnOnce (tests) */
export function resetWarnings(): void {
  warned.clear();
}
