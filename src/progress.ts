/**
 * Progress line for long-running CLI operations
 */

export interface ProgressOptions {
  total: number;
  label?: string;
  showBar?: boolean;
  stream?: NodeJS.WritableStream;
}

export interface ProgressStats {
  current: number;
  total: number;
  percent: number;
  elapsed: number;
  rate: number;
  isComplete: boolean;
}

export class ProgressTracker {
  private current = 0;
  private total: number;
  private label: string;
  private showBar: boolean;
  private stream: NodeJS.WritableStream;
  private startTime = Date.now();
  private lastUpdate = 0;
  private updateIntervalMs = 100;

  constructor(options: ProgressOptions) {
    this.total = Math.max(0, options.total);
    this.label = options.label || 'Progress';
    this.showBar = options.showBar !== false;
    this.stream = options.stream ?? process.stdout;
  }

  /**
   * Set progress to specific value
   */
  set(value: number): void {
    this.current = Math.min(Math.max(value, 0), this.total);
    this.updateDisplay();
  }

  increment(amount: number = 1): void {
    this.set(this.current + amount);
  }

  complete(): void {
    this.current = this.total;
    this.lastUpdate = 0;
    this.updateDisplay();
    this.stream.write('\n');
  }

  getStats(): ProgressStats {
    const elapsed = (Date.now() - this.startTime) / 1000;
    const rate = elapsed > 0 ? this.current / elapsed : 0;

    return {
      current: this.current,
      total: this.total,
      percent: this.total > 0 ? (this.current / this.total) * 100 : 100,
      elapsed: Math.round(elapsed),
      rate: Math.round(rate * 10) / 10,
      isComplete: this.current >= this.total
    };
  }

  /**
   * The line as it is drawn, without the carriage return
   */
  render(): string {
    const stats = this.getStats();
    const parts = [`${this.label}:`];

    if (this.showBar) {
      const width = 20;
      const filled = Math.round((stats.percent / 100) * width);
      parts.push('[' + '█'.repeat(filled) + '░'.repeat(width - filled) + ']');
    }

    parts.push(`${this.current}/${this.total}`);
    parts.push(`${Math.round(stats.percent)}%`);
    return parts.join(' ');
  }

  private updateDisplay(): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.updateIntervalMs && this.current < this.total) {
      return;
    }
    this.lastUpdate = now;
    this.stream.write('\r' + this.render());
  }
}
