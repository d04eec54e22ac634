import type { JudgeProgress } from '../runner/judge-runner.js';

export interface ProgressWriter {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

/**
 * Renders judge progress. On a TTY the line is rewritten in place after every
 * example; otherwise a line is printed every `every` examples and at the end.
 */
export class ProgressPrinter {
  private startTime = Date.now();
  private lastLength = 0;

  constructor(
    private readonly out: ProgressWriter = process.stdout,
    private readonly every: number = 10
  ) {}

  format(progress: JudgeProgress, now: number = Date.now()): string {
    const { processed, total, skipped, failed, missing } = progress;
    const percent = Math.floor((processed * 100) / Math.max(1, total));
    const elapsed = (now - this.startTime) / 1000;
    const rate = elapsed > 0 ? processed / elapsed : 0;
    return `Judging progress: ${processed}/${total} (${percent}%), ~${rate.toFixed(2)} ex/s (skipped ${skipped}, failed ${failed + missing})`;
  }

  update(progress: JudgeProgress): void {
    const line = this.format(progress);
    if (this.out.isTTY) {
      const padding = ' '.repeat(Math.max(0, this.lastLength - line.length));
      this.out.write(`\r${line}${padding}`);
      this.lastLength = line.length;
      return;
    }

    const { processed, total } = progress;
    if (processed === 1 || processed % this.every === 0 || processed === total) {
      this.out.write(`${line}\n`);
    }
  }

  done(): void {
    if (this.out.isTTY && this.lastLength > 0) {
      this.out.write('\n');
    }
  }
}
