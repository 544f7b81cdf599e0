import type { Logger } from 'pino';
import { describeError } from '../logger';

export interface RunFailure {
  key: string;
  error: string;
}

export interface RunSummaryData {
  stage: string;
  succeeded: number;
  skipped: number;
  failed: number;
  failures: RunFailure[];
  elapsedMs: number;
}

/** Counts per-item outcomes of one stage run. */
export class RunSummary {
  private readonly startTime = Date.now();
  private succeededCount = 0;
  private skippedCount = 0;
  private readonly failures: RunFailure[] = [];

  constructor(readonly stage: string) {}

  succeed(count = 1): void {
    this.succeededCount += count;
  }

  skip(count = 1): void {
    this.skippedCount += count;
  }

  fail(key: string, err: unknown): void {
    this.failures.push({ key, error: describeError(err) });
  }

  get succeeded(): number {
    return this.succeededCount;
  }

  get skipped(): number {
    return this.skippedCount;
  }

  get failed(): number {
    return this.failures.length;
  }

  toJSON(): RunSummaryData {
    return {
      stage: this.stage,
      succeeded: this.succeededCount,
      skipped: this.skippedCount,
      failed: this.failures.length,
      failures: [...this.failures],
      elapsedMs: Date.now() - this.startTime,
    };
  }

  log(logger: Logger): void {
    const data = this.toJSON();
    const message = `${data.stage} finished: ${data.succeeded} succeeded, ${data.skipped} skipped, ${data.failed} failed`;
    if (data.failed > 0) {
      logger.warn(data, message);
    } else {
      logger.info(data, message);
    }
  }
}
