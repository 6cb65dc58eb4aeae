/**
 * Number formatting shared by both report formats, so the JSON and Markdown
 * renderings of one result always carry the same values.
 */

/** Latencies are reported at 0.1 ms resolution */
export function roundMs(value: number): number {
  return Math.round(value * 10) / 10;
}

export function formatMs(value: number): string {
  return `${roundMs(value).toFixed(1)}ms`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return formatMs(ms);
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function formatBytes(bytes: number | null | undefined): string {
  if (bytes === null || bytes === undefined) return '-';
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

export function formatPercent(part: number, total: number): string {
  if (total === 0) return '-';
  return `${((part / total) * 100).toFixed(1)}%`;
}
