/**
 * In-place progress line for the revisions of one batch
 */

export interface BatchProgressOptions {
  total: number;
  label?: string;
  enabled?: boolean;
  showBar?: boolean;
  showETA?: boolean;
  stream?: NodeJS.WritableStream;
}

export interface BatchProgressStats {
  done: number;
  total: number;
  percent: number;
  elapsedSeconds: number;
  etaSeconds: number;
  isComplete: boolean;
}

const BAR_WIDTH = 20;
const LINE_WIDTH = 120;
const REDRAW_INTERVAL_MS = 100;

function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
  return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;
}

export class BatchProgress {
  private done = 0;
  private readonly total: number;
  private readonly label: string;
  private readonly enabled: boolean;
  private readonly showBar: boolean;
  private readonly showETA: boolean;
  private readonly stream: NodeJS.WritableStream;
  private readonly startedAt = Date.now();
  private drawnAt = 0;

  constructor(options: BatchProgressOptions) {
    this.total = Math.max(options.total, 0);
    this.label = options.label ?? 'Progress';
    this.enabled = options.enabled ?? true;
    this.showBar = options.showBar ?? true;
    this.showETA = options.showETA ?? true;
    this.stream = options.stream ?? process.stderr;
  }

  increment(count = 1): void {
    this.done = Math.min(this.done + count, this.total);
    this.draw(this.done === this.total);
  }

  /** Draws the final state, then blanks the line */
  complete(): void {
    this.done = this.total;
    this.draw(true);
    if (this.enabled) {
      this.stream.write(`\r${' '.repeat(LINE_WIDTH)}\r`);
    }
  }

  getStats(): BatchProgressStats {
    const elapsed = (Date.now() - this.startedAt) / 1000;
    const perSecond = elapsed > 0 ? this.done / elapsed : 0;

    return {
      done: this.done,
      total: this.total,
      percent: this.total > 0 ? (this.done / this.total) * 100 : 100,
      elapsedSeconds: Math.round(elapsed),
      etaSeconds: perSecond > 0 ? Math.round((this.total - this.done) / perSecond) : 0,
      isComplete: this.done >= this.total,
    };
  }

  render(): string {
    const stats = this.getStats();
    const parts = [`${this.label}:`];

    if (this.showBar) {
      const filled = Math.round((stats.percent / 100) * BAR_WIDTH);
      parts.push(`[${'█'.repeat(filled)}${'░'.repeat(BAR_WIDTH - filled)}]`);
    }
    parts.push(`${stats.done}/${stats.total} files`, `${Math.round(stats.percent)}%`, formatDuration(stats.elapsedSeconds));

    if (this.showETA && !stats.isComplete && stats.done > 0) {
      parts.push(`ETA ${formatDuration(stats.etaSeconds)}`);
    }
    return parts.join(' ');
  }

  private draw(force: boolean): void {
    if (!this.enabled) return;

    const now = Date.now();
    if (!force && now - this.drawnAt < REDRAW_INTERVAL_MS) return;
    this.drawnAt = now;

    this.stream.write(`\r${' '.repeat(LINE_WIDTH)}\r${this.render()}`);
  }
}
