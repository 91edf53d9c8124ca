import { Injectable } from '@nestjs/common';

import { storedUserProfileSchema } from './user-settings.schemas';
import { RegistryInvariantViolationError } from '../../common/errors/whale-watch.errors';
import type {
  IUserSettingsStore,
  UserProfileRecord,
} from '../../common/interfaces/storage/user-settings-store.interfaces';
import { DatabaseService } from '../kysely/database.service';
import type { NewUserSettingsRow, UserSettingsRow } from '../types/database.types';

/** One jsonb profile row per user in `user_settings`. */
@Injectable()
export class UserSettingsRepository implements IUserSettingsStore {
  public constructor(private readonly databaseService: DatabaseService) {}

  public async loadAll(): Promise<readonly UserProfileRecord[]> {
    const rows: Pick<UserSettingsRow, 'user_id' | 'profile'>[] = await this.databaseService
      .getDb()
      .selectFrom('user_settings')
      .select(['user_id', 'profile'])
      .orderBy('user_id')
      .execute();

    return rows.map((row): UserProfileRecord => {
      const parsed = storedUserProfileSchema.safeParse(row.profile);

      if (!parsed.success || parsed.data.userId !== row.user_id) {
        throw new RegistryInvariantViolationError(
          `Stored profile is malformed userId=${row.user_id}`,
        );
      }

      return parsed.data;
    });
  }

  public async save(profile: UserProfileRecord): Promise<void> {
    const serializedProfile: string = JSON.stringify(profile);
    const updatedAt: Date = new Date();
    const row: NewUserSettingsRow = {
      user_id: profile.userId,
      profile: serializedProfile,
      updated_at: updatedAt,
    };

    await this.databaseService
      .getDb()
      .insertInto('user_settings')
      .values(row)
      .onConflict((oc) =>
        oc.column('user_id').doUpdateSet({
          profile: serializedProfile,
          updated_at: updatedAt,
        }),
      )
      .execute();
  }

  public async delete(userId: string): Promise<void> {
    await this.databaseService
      .getDb()
      .deleteFrom('user_settings')
      .where('user_id', '=', userId)
      .execute();
  }
}
