type WarningWindow = {
  lastEmittedAtMs: number;
  suppressed: number;
};

/** Lets a repeated warning through at most once per cooldown and counts what was held back. */
export class RateLimitedWarningEmitter {
  private readonly windows: Map<string, WarningWindow> = new Map<string, WarningWindow>();

  public constructor(private readonly cooldownMs: number) {}

  /** Returns the number of suppressed repeats when the warning may be logged, otherwise null. */
  public tryEmit(key: string): number | null {
    const nowMs: number = Date.now();
    const window: WarningWindow | undefined = this.windows.get(key);

    if (window !== undefined && nowMs - window.lastEmittedAtMs < this.cooldownMs) {
      window.suppressed += 1;
      return null;
    }

    const suppressed: number = window?.suppressed ?? 0;
    this.windows.set(key, { lastEmittedAtMs: nowMs, suppressed: 0 });
    return suppressed;
  }
}
