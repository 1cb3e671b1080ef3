/** Shortens text for log lines, marking the cut with `...`. */
export function preview(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** Seconds elapsed since `startedAt` (a `performance.now()` reading), two decimals. */
export function elapsedSeconds(startedAt: number): string {
  return (Math.max(0, performance.now() - startedAt) / 1000).toFixed(2);
}
