/**
 * Terminal display helpers shared by the formatters
 *
 * @module utils
 */

export const StatusSymbols = {
  started: '▶',
  running: '●',
  success: '✔',
  failure: '✖',
  warning: '⚠',
  skipped: '⊘',
  info: 'ℹ',
  arrow: '→',
} as const;

/**
 * 850 -> "850ms", 1530 -> "1.53s", 95000 -> "1m 35s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function divider(width = 60, char = '─'): string {
  return char.repeat(width);
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
