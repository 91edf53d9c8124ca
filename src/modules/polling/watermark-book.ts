/**
 * Per-entity watermarks in unix seconds. Watermarks only move forward, and the
 * lookback window only bounds an entity's first fetch.
 */
export class WatermarkBook {
  private readonly watermarks: Map<string, number> = new Map<string, number>();

  public constructor(private readonly lookbackSec: number) {}

  /** Lower bound for the next fetch: the watermark, or the lookback window before the first fetch. */
  public resolveSince(entity: string, tickStartSec: number): number {
    return this.watermarks.get(entity) ?? tickStartSec - this.lookbackSec;
  }

  public advance(entity: string, observedTimestamp: number): void {
    const current: number | undefined = this.watermarks.get(entity);

    if (current === undefined || observedTimestamp > current) {
      this.watermarks.set(entity, observedTimestamp);
    }
  }

  public get(entity: string): number | null {
    return this.watermarks.get(entity) ?? null;
  }

  /** Forgets entities that are no longer polled. */
  public retain(entities: ReadonlySet<string>): void {
    for (const entity of this.watermarks.keys()) {
      if (!entities.has(entity)) {
        this.watermarks.delete(entity);
      }
    }
  }
}
