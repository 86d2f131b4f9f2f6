export type ProgressListener = (percent: number) => void;

/** Clamps to [0, 100], floors to whole percents and never reports a lower value. */
export class ProgressTracker {
  private last = -1;

  constructor(private listener: ProgressListener) {}

  get value(): number {
    return Math.max(0, this.last);
  }

  report(percent: number): void {
    const bounded = Math.floor(Math.min(100, Math.max(0, percent)));
    if (!Number.isFinite(bounded) || bounded <= this.last) return;
    this.last = bounded;
    this.listener(bounded);
  }

  /** Maps a stage-local fraction in [0, 1] onto `base .. base + span`. */
  window(base: number, span: number): (fraction: number) => void {
    return (fraction) => this.report(base + Math.min(1, Math.max(0, fraction)) * span);
  }
}
