import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import { Kysely, PostgresDialect, sql } from 'kysely';
import { Pool } from 'pg';

import { ConfigurationError } from '../../common/errors/whale-watch.errors';
import { AppConfigService } from '../../config/app-config.service';
import type { IDatabase } from '../types/database.types';

/** Kysely over a pg pool; inert when DATABASE_URL is not set. */
@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(DatabaseService.name);
  private readonly db: Kysely<IDatabase> | null = null;

  public constructor(private readonly appConfigService: AppConfigService) {
    const databaseUrl: string | null = this.appConfigService.databaseUrl;

    if (databaseUrl === null) {
      return;
    }

    this.db = new Kysely<IDatabase>({
      dialect: new PostgresDialect({ pool: new Pool({ connectionString: databaseUrl }) }),
    });
  }

  public isConfigured(): boolean {
    return this.db !== null;
  }

  public getDb(): Kysely<IDatabase> {
    if (this.db === null) {
      throw new ConfigurationError('DATABASE_URL is not configured');
    }

    return this.db;
  }

  public async healthCheck(): Promise<boolean> {
    if (this.db === null) {
      return true;
    }

    try {
      await sql`select 1`.execute(this.db);
      return true;
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`database health check failed reason=${errorMessage}`);
      return false;
    }
  }

  public async onModuleDestroy(): Promise<void> {
    if (this.db !== null) {
      await this.db.destroy();
    }
  }
}
