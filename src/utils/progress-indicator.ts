/**
 * Transfer Progress Bar (no external dependencies)
 *
 * Features:
 * - ASCII-only bar (cross-platform compatible)
 * - Byte or item units
 * - Indeterminate mode when the total is unknown (0)
 * - TTY detection (single start/finish lines in pipes/logs)
 * - Elapsed time, rate and ETA display
 */

export type ProgressUnit = 'bytes' | 'items';

type ProgressStream = NodeJS.WritableStream & { isTTY?: boolean };

interface ProgressOptions {
  unit?: ProgressUnit;
  width?: number;
  /** Minimum ms between redraws */
  interval?: number;
  stream?: ProgressStream;
}

/** Format a byte count as B / KiB / MiB / GiB */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KiB', 'MiB', 'GiB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[0]}` : `${value.toFixed(2)} ${units[unit]}`;
}

/** Format seconds as HH:MM:SS */
export function formatDuration(seconds: number): string {
  const s = Math.max(0, Math.floor(seconds));
  const hh = String(Math.floor(s / 3600)).padStart(2, '0');
  const mm = String(Math.floor((s % 3600) / 60)).padStart(2, '0');
  const ss = String(s % 60).padStart(2, '0');
  return `${hh}:${mm}:${ss}`;
}

/**
 * Render the bar body. total <= 0 renders a bouncing marker at `tick`.
 */
export function renderBar(current: number, total: number, width: number, tick = 0): string {
  if (total <= 0) {
    const span = Math.max(1, width - 3);
    const cycle = span * 2;
    const step = tick % cycle;
    const pos = step < span ? step : cycle - step;
    return ' '.repeat(pos) + '<=>' + ' '.repeat(Math.max(0, width - pos - 3));
  }

  const ratio = Math.min(1, current / total);
  const filled = Math.floor(ratio * width);
  if (filled >= width) return '#'.repeat(width);
  return '#'.repeat(filled) + '>' + '-'.repeat(width - filled - 1);
}

export class TransferProgress {
  private readonly message: string;
  private readonly unit: ProgressUnit;
  private readonly width: number;
  private readonly interval: number;
  private readonly stream: ProgressStream;
  private readonly isTTY: boolean;
  private total = 0;
  private current = 0;
  private tick = 0;
  private startTime = Date.now();
  private lastDraw = 0;
  private started = false;

  constructor(message: string, options: ProgressOptions = {}) {
    this.message = message;
    this.unit = options.unit ?? 'bytes';
    this.width = options.width ?? 30;
    this.interval = options.interval ?? 100;
    this.stream = options.stream ?? process.stderr;

    // Only animate if the stream is a TTY and not in CI
    this.isTTY = this.stream.isTTY === true && !process.env.CI && !process.env.NO_COLOR;
  }

  start(total = 0): void {
    this.total = total;
    this.current = 0;
    this.startTime = Date.now();
    this.started = true;

    if (!this.isTTY) {
      this.stream.write(`[i] ${this.message}...\n`);
      return;
    }
    this.draw(true);
  }

  /** Set the absolute position */
  update(current: number, total?: number): void {
    if (!this.started) this.start(total ?? 0);
    if (total !== undefined) this.total = total;
    this.current = current;
    this.draw(false);
  }

  finish(message?: string): void {
    const finalMessage = message || this.message;
    const elapsed = formatDuration((Date.now() - this.startTime) / 1000);

    if (this.isTTY) {
      const amount = this.formatAmount(this.current);
      this.stream.write(`\r\x1b[K[OK] ${finalMessage} (${amount}, ${elapsed})\n`);
    } else {
      this.stream.write(`[OK] ${finalMessage} (${this.formatAmount(this.current)})\n`);
    }
    this.started = false;
  }

  fail(message?: string): void {
    const finalMessage = message || this.message;
    this.stream.write(this.isTTY ? `\r\x1b[K[X] ${finalMessage}\n` : `[X] ${finalMessage}\n`);
    this.started = false;
  }

  /** Current line as it would be drawn (without control codes) */
  line(now = Date.now()): string {
    const elapsedSec = (now - this.startTime) / 1000;
    const bar = renderBar(this.current, this.total, this.width, this.tick);
    const amount =
      this.total > 0
        ? `${this.formatAmount(this.current)}/${this.formatAmount(this.total)}`
        : this.formatAmount(this.current);

    let stats = '';
    if (this.unit === 'bytes' && elapsedSec > 0) {
      const rate = this.current / elapsedSec;
      stats = ` (${formatBytes(Math.round(rate))}/s`;
      if (this.total > 0 && rate > 0) {
        stats += `, ${formatDuration((this.total - this.current) / rate)}`;
      }
      stats += ')';
    }

    return `[${formatDuration(elapsedSec)}] [${bar}] ${amount}${stats} - ${this.message}`;
  }

  private formatAmount(value: number): string {
    return this.unit === 'bytes' ? formatBytes(value) : String(value);
  }

  private draw(force: boolean): void {
    if (!this.isTTY) return;
    const now = Date.now();
    if (!force && now - this.lastDraw < this.interval) return;
    this.lastDraw = now;
    this.tick++;
    this.stream.write(`\r\x1b[K${this.line(now)}`);
  }
}

