/**
 * Debounced sweep for fire-and-forget queries.
 * Every arm() restarts the quiet period; the sweep runs once it elapses.
 */

export const DEFAULT_TEMPORARY_QUERY_TIMEOUT = 5 * 60 * 1000;

export class TemporaryQueryReaper {
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly onExpire: () => void,
    readonly quietPeriod: number = DEFAULT_TEMPORARY_QUERY_TIMEOUT
  ) {}

  arm(): void {
    this.cancel();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.onExpire();
    }, this.quietPeriod);
    // Never keep the process alive just to sweep
    this.timer.unref();
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get isArmed(): boolean {
    return this.timer !== null;
  }
}
