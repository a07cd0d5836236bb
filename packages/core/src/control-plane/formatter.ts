import { isTerminalJobStatus } from '@bridgeline/shared';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

export function gray(text: string): string {
  return colorize(text, 'gray');
}

/**
 * Color a job or run status: green for success, red for failure,
 * yellow while still in flight.
 */
export function formatStatus(status: string): string {
  const normalized = status.toLowerCase();
  if (normalized.includes('succeed') || normalized === 'success') {
    return green(status);
  }
  if (normalized.includes('fail') || normalized.includes('cancel')) {
    return red(status);
  }
  if (isTerminalJobStatus(status)) {
    return gray(status);
  }
  return yellow(status);
}

/**
 * Human-readable byte count (1.5 KB, 3.2 MB).
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  const units = ['KB', 'MB', 'GB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 3) + '...';
}

export function padRight(text: string, width: number): string {
  return text.length >= width ? text : text + ' '.repeat(width - text.length);
}

interface TableColumn<T> {
  header: string;
  width: number;
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: readonly T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];
  lines.push(columns.map((col) => bold(padRight(col.header, col.width))).join('  '));
  lines.push(dim(columns.map((col) => '-'.repeat(col.width)).join('  ')));

  for (const item of items) {
    lines.push(
      columns.map((col) => padRight(truncate(col.value(item), col.width), col.width)).join('  ')
    );
  }
  return lines.join('\n');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Standard `--json` envelope for command results.
 */
export function formatJsonResult(data: unknown, success = true): string {
  return formatJson({ success, data });
}

/**
 * Print to stdout.
 */
export function print(message: string): void {
  console.log(message);
}

/**
 * Print to stderr.
 */
export function printError(message: string): void {
  console.error(message);
}

/**
 * Write raw text (log content) without adding a newline.
 */
export function write(text: string): void {
  process.stdout.write(text);
}
