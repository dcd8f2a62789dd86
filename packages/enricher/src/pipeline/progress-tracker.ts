import type { Logger } from '@workspace/logger';

type ProgressSnapshot = {
  done: number;
  total: number;
  percent: number;
};

type ProgressLogger = Pick<Logger, 'info'>;

/**
 * Logs `<label>: <done>/<total> (<pct>%)` each time progress crosses the next
 * `step` percent boundary, and once more on completion.
 */
export class ProgressTracker {
  private readonly label: string;
  private readonly total: number;
  private readonly step: number;
  private readonly logger: ProgressLogger;
  private done: number;
  private nextThreshold: number;

  constructor(label: string, total: number, step: number, logger: ProgressLogger) {
    this.label = label;
    this.total = Math.max(0, total);
    this.step = Math.min(100, Math.max(1, step));
    this.logger = logger;
    this.done = 0;
    this.nextThreshold = this.step;

    if (this.total === 0) {
      this.report();
    }
  }

  advance(): void {
    if (this.done >= this.total) {
      return;
    }

    this.done += 1;
    const percent = this.percent();

    if (this.done === this.total) {
      this.report();
      return;
    }

    if (percent >= this.nextThreshold) {
      this.report();
      while (this.nextThreshold <= percent) {
        this.nextThreshold += this.step;
      }
    }
  }

  snapshot(): ProgressSnapshot {
    return { done: this.done, total: this.total, percent: this.percent() };
  }

  private percent(): number {
    return this.total === 0 ? 100 : Math.floor((this.done / this.total) * 100);
  }

  private report(): void {
    this.logger.info(
      `${this.label}: ${this.done}/${this.total} (${this.percent()}%)`,
    );
  }
}

export type { ProgressSnapshot };
