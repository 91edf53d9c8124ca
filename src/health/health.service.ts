import { Injectable } from '@nestjs/common';

import type { AppHealthStatus, ComponentHealth } from './health.types';
import { AppConfigService } from '../config/app-config.service';
import { DatabaseService } from '../database/kysely/database.service';
import { SeenEventStoreService } from '../modules/dedup/seen-event-store.service';
import { PollSchedulerService } from '../modules/polling/poll-scheduler.service';

@Injectable()
export class HealthService {
  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly databaseService: DatabaseService,
    private readonly pollSchedulerService: PollSchedulerService,
    private readonly seenEventStoreService: SeenEventStoreService,
  ) {}

  public async getHealthStatus(): Promise<AppHealthStatus> {
    const database: ComponentHealth = await this.checkDatabase();
    const telegram: ComponentHealth = {
      ok: true,
      details: this.appConfigService.telegramEnabled
        ? 'enabled'
        : 'disabled by TELEGRAM_ENABLED=false, notifications are logged',
    };

    return {
      status: database.ok ? 'ok' : 'degraded',
      version: this.appConfigService.appVersion,
      database,
      telegram,
      pollCycles: this.pollSchedulerService.getStatus(),
      seenEvents: this.seenEventStoreService.size(),
    };
  }

  private async checkDatabase(): Promise<ComponentHealth> {
    if (!this.databaseService.isConfigured()) {
      return { ok: true, details: 'not configured, settings kept in memory' };
    }

    const reachable: boolean = await this.databaseService.healthCheck();
    return { ok: reachable, details: reachable ? 'reachable' : 'unreachable' };
  }
}
