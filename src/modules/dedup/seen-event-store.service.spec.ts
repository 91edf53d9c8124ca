import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SeenEventEvictionService } from './seen-event-eviction.service';
import { SeenEventStoreService } from './seen-event-store.service';
import type { AppConfigService } from '../../config/app-config.service';

const createConfigStub = (overrides: Partial<Record<string, number>> = {}): AppConfigService =>
  ({
    dedupMaxEntries: 1000,
    dedupRetentionSec: 86_400,
    dedupEvictionIntervalSec: 3600,
    ...overrides,
  }) as unknown as AppConfigService;

describe('SeenEventStoreService', (): void => {
  beforeEach((): void => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T00:00:00.000Z'));
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  it('reports an id as new exactly once', (): void => {
    const store: SeenEventStoreService = new SeenEventStoreService(createConfigStub());

    expect(store.markAndCheck('sig-1:in:wallet')).toBe(true);
    expect(store.markAndCheck('sig-1:in:wallet')).toBe(false);
    expect(store.markAndCheck('sig-1:out:wallet')).toBe(true);
    expect(store.size()).toBe(2);
  });

  it('evicts only entries first seen before the cutoff', (): void => {
    const store: SeenEventStoreService = new SeenEventStoreService(createConfigStub());
    store.markAndCheck('old');
    vi.advanceTimersByTime(10_000);
    store.markAndCheck('recent');

    const evicted: number = store.evict(new Date('2024-05-01T00:00:05.000Z'));

    expect(evicted).toBe(1);
    expect(store.has('old')).toBe(false);
    expect(store.has('recent')).toBe(true);
    expect(store.markAndCheck('old')).toBe(true);
  });

  it('does not refresh first-seen time on repeated checks', (): void => {
    const store: SeenEventStoreService = new SeenEventStoreService(createConfigStub());
    store.markAndCheck('e1');
    vi.advanceTimersByTime(10_000);
    store.markAndCheck('e1');

    expect(store.evict(new Date('2024-05-01T00:00:05.000Z'))).toBe(1);
  });

  it('drops the oldest id when the cap is exceeded', (): void => {
    const store: SeenEventStoreService = new SeenEventStoreService(
      createConfigStub({ dedupMaxEntries: 2 }),
    );

    store.markAndCheck('a');
    store.markAndCheck('b');
    store.markAndCheck('c');

    expect(store.size()).toBe(2);
    expect(store.has('a')).toBe(false);
    expect(store.has('c')).toBe(true);
  });
});

describe('SeenEventEvictionService', (): void => {
  beforeEach((): void => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T00:00:00.000Z'));
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  it('evicts past the retention horizon on its interval', (): void => {
    const config: AppConfigService = createConfigStub({
      dedupRetentionSec: 7200,
      dedupEvictionIntervalSec: 3600,
    });
    const store: SeenEventStoreService = new SeenEventStoreService(config);
    const eviction: SeenEventEvictionService = new SeenEventEvictionService(store, config);
    store.markAndCheck('e1');
    eviction.onModuleInit();

    vi.advanceTimersByTime(3_600_000);
    expect(store.has('e1')).toBe(true);

    vi.advanceTimersByTime(3_600_000);
    expect(store.has('e1')).toBe(true);

    vi.advanceTimersByTime(3_600_000);
    expect(store.has('e1')).toBe(false);

    eviction.onModuleDestroy();
  });
});
