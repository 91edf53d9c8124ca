import { describe, expect, it, vi } from 'vitest';

import { HealthService } from './health.service';
import type { AppConfigService } from '../config/app-config.service';
import type { DatabaseService } from '../database/kysely/database.service';
import type { SeenEventStoreService } from '../modules/dedup/seen-event-store.service';
import type { PollSchedulerService } from '../modules/polling/poll-scheduler.service';

const createService = (databaseConfigured: boolean, databaseReachable: boolean): HealthService =>
  new HealthService(
    { telegramEnabled: false, appVersion: '1.2.3' } as unknown as AppConfigService,
    {
      isConfigured: (): boolean => databaseConfigured,
      healthCheck: vi.fn().mockResolvedValue(databaseReachable),
    } as unknown as DatabaseService,
    { getStatus: (): readonly unknown[] => [] } as unknown as PollSchedulerService,
    { size: (): number => 3 } as unknown as SeenEventStoreService,
  );

describe('HealthService', (): void => {
  it('is healthy without a database', async (): Promise<void> => {
    const status = await createService(false, false).getHealthStatus();

    expect(status).toMatchObject({
      status: 'ok',
      version: '1.2.3',
      database: { ok: true },
      pollCycles: [],
      seenEvents: 3,
    });
  });

  it('degrades when the configured database is unreachable', async (): Promise<void> => {
    const status = await createService(true, false).getHealthStatus();

    expect(status.status).toBe('degraded');
    expect(status.database).toEqual({ ok: false, details: 'unreachable' });
  });
});
