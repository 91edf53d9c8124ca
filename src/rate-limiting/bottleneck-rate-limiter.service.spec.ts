import { describe, expect, it } from 'vitest';

import { LimiterKey, RequestPriority } from './bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from './bottleneck-rate-limiter.service';
import type { AppConfigService } from '../config/app-config.service';

const createConfigStub = (pollMaxConcurrency: number = 2): AppConfigService =>
  ({
    rateLimitVybeMinTimeMs: 0,
    rateLimitVybeMaxConcurrent: 1,
    pollMaxConcurrency,
  }) as unknown as AppConfigService;

const delay = async (ms: number): Promise<void> =>
  new Promise<void>((resolve: () => void): void => {
    setTimeout(resolve, ms);
  });

describe('BottleneckRateLimiterService', (): void => {
  it('schedules and executes an operation successfully', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(),
    );

    const result: string = await service.schedule(LimiterKey.VYBE, async (): Promise<string> => 'ok');

    expect(result).toBe('ok');
    await service.onModuleDestroy();
  });

  it('propagates operation errors', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(),
    );

    await expect(
      service.schedule(LimiterKey.VYBE, async (): Promise<string> => {
        throw new Error('test error');
      }),
    ).rejects.toThrow('test error');

    await service.onModuleDestroy();
  });

  it('bounds poll fan-out by configured concurrency', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(2),
    );
    let active: number = 0;
    let maxActive: number = 0;

    const task = async (): Promise<void> => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await delay(5);
      active -= 1;
    };

    await Promise.all(
      [1, 2, 3, 4, 5].map(
        async (): Promise<void> => service.schedule(LimiterKey.WALLET_POLL, task, RequestPriority.HIGH),
      ),
    );

    expect(maxActive).toBe(2);
    await service.onModuleDestroy();
  });

  it('reports queued and running work per limiter', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(1),
    );
    let release: () => void = (): void => undefined;
    const blocker: Promise<void> = new Promise<void>((resolve: () => void): void => {
      release = resolve;
    });

    const first: Promise<void> = service.schedule(LimiterKey.WHALE_POLL, async () => blocker);
    const second: Promise<void> = service.schedule(LimiterKey.WHALE_POLL, async () => undefined);
    await delay(20);

    expect(service.getMetrics(LimiterKey.WHALE_POLL)).toEqual({ queueSize: 1, running: 1 });
    expect(service.getMetrics(LimiterKey.WALLET_POLL)).toEqual({ queueSize: 0, running: 0 });

    release();
    await Promise.all([first, second]);
    await service.onModuleDestroy();
  });

  it('lists every configured limiter', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(),
    );

    expect(service.getAllKeys()).toEqual([
      LimiterKey.VYBE,
      LimiterKey.WALLET_POLL,
      LimiterKey.WHALE_POLL,
    ]);

    await service.onModuleDestroy();
  });

  it('rejects work scheduled after shutdown', async (): Promise<void> => {
    const service: BottleneckRateLimiterService = new BottleneckRateLimiterService(
      createConfigStub(),
    );
    await service.onModuleDestroy();

    await expect(
      service.schedule(LimiterKey.VYBE, async (): Promise<string> => 'ok'),
    ).rejects.toThrow('Rate limiter is stopped key=vybe');
  });
});
