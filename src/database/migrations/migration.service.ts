import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { resolve } from 'node:path';
import { Pool, type QueryResultRow } from 'pg';
import Postgrator from 'postgrator';

import { AppConfigService } from '../../config/app-config.service';

type ExecQueryResult = {
  rows: QueryResultRow[];
};

@Injectable()
export class MigrationService implements OnModuleInit {
  private readonly logger: Logger = new Logger(MigrationService.name);

  public constructor(private readonly appConfigService: AppConfigService) {}

  public async onModuleInit(): Promise<void> {
    const databaseUrl: string | null = this.appConfigService.databaseUrl;

    if (databaseUrl === null) {
      this.logger.log('migrations skipped, DATABASE_URL not set');
      return;
    }

    const pool: Pool = new Pool({ connectionString: databaseUrl });

    try {
      const runner: Postgrator = new Postgrator({
        driver: 'pg',
        migrationPattern: resolve(process.cwd(), 'database/migrations/*.sql'),
        schemaTable: 'schemaversion',
        validateChecksums: true,
        currentSchema: 'public',
        execQuery: async (query: string): Promise<ExecQueryResult> => {
          const result = await pool.query(query);
          return { rows: result.rows };
        },
        execSqlScript: async (sqlScript: string): Promise<void> => {
          await pool.query(sqlScript);
        },
      });

      const maxVersion: number = await runner.getMaxVersion();
      const migrations = await runner.migrate(String(maxVersion));

      this.logger.log(
        `migrations applied=${String(migrations.length)} version=${String(maxVersion)}`,
      );
    } finally {
      await pool.end();
    }
  }
}
