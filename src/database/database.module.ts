import { Logger, Module } from '@nestjs/common';

import { DatabaseService } from './kysely/database.service';
import { MigrationService } from './migrations/migration.service';
import { InMemoryUserSettingsStore } from './repositories/in-memory-user-settings.store';
import { UserSettingsRepository } from './repositories/user-settings.repository';
import { USER_SETTINGS_STORE } from '../common/interfaces/storage/storage-port.tokens';
import type { IUserSettingsStore } from '../common/interfaces/storage/user-settings-store.interfaces';

@Module({
  providers: [
    MigrationService,
    DatabaseService,
    UserSettingsRepository,
    {
      provide: USER_SETTINGS_STORE,
      inject: [DatabaseService, UserSettingsRepository],
      useFactory: (
        databaseService: DatabaseService,
        userSettingsRepository: UserSettingsRepository,
      ): IUserSettingsStore => {
        if (databaseService.isConfigured()) {
          return userSettingsRepository;
        }

        new Logger(DatabaseModule.name).warn(
          'DATABASE_URL not set, user settings are kept in memory only',
        );
        return new InMemoryUserSettingsStore();
      },
    },
  ],
  exports: [DatabaseService, USER_SETTINGS_STORE],
})
export class DatabaseModule {}
