import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import Bottleneck from 'bottleneck';

import {
  type IBottleneckConfig,
  type ILimiterMetrics,
  LimiterKey,
  RequestPriority,
} from './bottleneck-rate-limiter.interfaces';
import { buildLimiterConfigs } from './rate-limiter-config.factory';
import { AppConfigService } from '../config/app-config.service';

/**
 * Owns one Bottleneck instance per limiter key: the provider limiter spaces
 * Vybe requests, the poll gates bound per-tick fan-out.
 */
@Injectable()
export class BottleneckRateLimiterService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(BottleneckRateLimiterService.name);
  private readonly limiters: ReadonlyMap<LimiterKey, Bottleneck>;
  private stopped: boolean = false;

  public constructor(appConfigService: AppConfigService) {
    const limiters: Map<LimiterKey, Bottleneck> = new Map<LimiterKey, Bottleneck>();

    for (const [key, config] of buildLimiterConfigs(appConfigService)) {
      limiters.set(key, this.createLimiter(key, config));
    }

    this.limiters = limiters;
  }

  public async schedule<T>(
    key: LimiterKey,
    operation: () => Promise<T>,
    priority: RequestPriority = RequestPriority.NORMAL,
  ): Promise<T> {
    if (this.stopped) {
      throw new Error(`Rate limiter is stopped key=${key}`);
    }

    return this.requireLimiter(key).schedule({ priority }, operation);
  }

  public getMetrics(key: LimiterKey): ILimiterMetrics {
    const counts: Bottleneck.Counts | undefined = this.limiters.get(key)?.counts();

    return {
      queueSize: counts === undefined ? 0 : counts.RECEIVED + counts.QUEUED,
      running: counts === undefined ? 0 : counts.RUNNING + counts.EXECUTING,
    };
  }

  public getAllKeys(): readonly LimiterKey[] {
    return [...this.limiters.keys()];
  }

  public async onModuleDestroy(): Promise<void> {
    this.stopped = true;

    const results: PromiseSettledResult<void>[] = await Promise.allSettled(
      [...this.limiters.values()].map(
        async (limiter: Bottleneck): Promise<void> => limiter.stop({ dropWaitingJobs: true }),
      ),
    );
    const failures: number = results.filter(
      (result: PromiseSettledResult<void>): boolean => result.status === 'rejected',
    ).length;

    if (failures > 0) {
      this.logger.error(`rate limiters stopped with failures count=${String(failures)}`);
      return;
    }

    this.logger.log(`rate limiters stopped count=${String(results.length)}`);
  }

  private createLimiter(key: LimiterKey, config: IBottleneckConfig): Bottleneck {
    const limiter: Bottleneck = new Bottleneck({
      minTime: config.minTime,
      maxConcurrent: config.maxConcurrent,
    });

    limiter.on('error', (error: unknown): void => {
      const message: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`limiter error key=${key} reason=${message}`);
    });
    limiter.on('dropped', (): void => {
      this.logger.warn(`limiter dropped queued job key=${key}`);
    });

    return limiter;
  }

  private requireLimiter(key: LimiterKey): Bottleneck {
    const limiter: Bottleneck | undefined = this.limiters.get(key);

    if (limiter === undefined) {
      throw new Error(`No rate limiter configured for key=${key}`);
    }

    return limiter;
  }
}
