/** Trace output for layout internals, enabled by setting LAYERWISE_DEBUG. */
export function debugEnabled(): boolean {
  return !!process.env.LAYERWISE_DEBUG;
}

export function debugLog(scope: string, ...args: unknown[]): void {
  if (!debugEnabled()) return;
  console.error(`[layerwise:${scope}]`, ...args);
}
