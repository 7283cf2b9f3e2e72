import path from 'node:path';

/** `0.8333 (83.33%)`, or `n/a` for the no-data marker. */
export function formatRatio(value: number | null): string {
  if (value === null) {
    return 'n/a';
  }
  return `${value.toFixed(4)} (${(value * 100).toFixed(2)}%)`;
}

export function formatDelta(value: number | null): string {
  if (value === null) {
    return 'n/a';
  }
  return `${value > 0 ? '+' : ''}${value.toFixed(4)}`;
}

export function formatPercent(count: number, total: number): string {
  return total > 0 ? `${((count / total) * 100).toFixed(1)}%` : '0.0%';
}

export function formatMs(value: number): string {
  return value >= 1000 ? `${(value / 1000).toFixed(2)} s` : `${value.toFixed(1)} ms`;
}

/** Keeps a value on one Markdown table row. */
export function escapeTableCell(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function imageName(imagePath: string): string {
  return path.posix.basename(imagePath);
}
