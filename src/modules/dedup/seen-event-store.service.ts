import { Injectable, Logger } from '@nestjs/common';

import { RateLimitedWarningEmitter } from '../../common/utils/logging/rate-limited-warning-emitter';
import { AppConfigService } from '../../config/app-config.service';

const CAPACITY_WARNING_COOLDOWN_MS = 60_000;

/**
 * Dedup ledger of event ids with their first-seen time.
 * markAndCheck is synchronous so concurrent ticks cannot both observe an id as new.
 */
@Injectable()
export class SeenEventStoreService {
  private readonly logger: Logger = new Logger(SeenEventStoreService.name);
  // Map iteration follows insertion, i.e. first-seen order.
  private readonly firstSeenAtMs: Map<string, number> = new Map<string, number>();
  private readonly maxEntries: number;
  private readonly capacityWarnings: RateLimitedWarningEmitter = new RateLimitedWarningEmitter(
    CAPACITY_WARNING_COOLDOWN_MS,
  );

  public constructor(appConfigService: AppConfigService) {
    this.maxEntries = appConfigService.dedupMaxEntries;
  }

  public markAndCheck(eventId: string): boolean {
    if (this.firstSeenAtMs.has(eventId)) {
      return false;
    }

    this.firstSeenAtMs.set(eventId, Date.now());
    this.enforceCapacity();
    return true;
  }

  public has(eventId: string): boolean {
    return this.firstSeenAtMs.has(eventId);
  }

  /** Drops ids first seen before `olderThan`; returns how many were removed. */
  public evict(olderThan: Date): number {
    const cutoffMs: number = olderThan.getTime();
    let evicted: number = 0;

    for (const [eventId, seenAtMs] of this.firstSeenAtMs) {
      if (seenAtMs < cutoffMs) {
        this.firstSeenAtMs.delete(eventId);
        evicted += 1;
      }
    }

    return evicted;
  }

  public size(): number {
    return this.firstSeenAtMs.size;
  }

  private enforceCapacity(): void {
    if (this.firstSeenAtMs.size <= this.maxEntries) {
      return;
    }

    const oldest: string | undefined = this.firstSeenAtMs.keys().next().value;

    if (oldest === undefined) {
      return;
    }

    this.firstSeenAtMs.delete(oldest);
    const suppressed: number | null = this.capacityWarnings.tryEmit('capacity');

    if (suppressed !== null) {
      this.logger.warn(
        `seen store at capacity max=${String(this.maxEntries)} dropped=${oldest} suppressed=${String(suppressed)}`,
      );
    }
  }
}
