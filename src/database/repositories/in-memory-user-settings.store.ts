import type {
  IUserSettingsStore,
  UserProfileRecord,
} from '../../common/interfaces/storage/user-settings-store.interfaces';

/** Process-local store used when no database is configured; profiles live until restart. */
export class InMemoryUserSettingsStore implements IUserSettingsStore {
  private readonly profiles: Map<string, UserProfileRecord> = new Map<string, UserProfileRecord>();

  public async loadAll(): Promise<readonly UserProfileRecord[]> {
    return [...this.profiles.values()];
  }

  public async save(profile: UserProfileRecord): Promise<void> {
    this.profiles.set(profile.userId, structuredClone(profile));
  }

  public async delete(userId: string): Promise<void> {
    this.profiles.delete(userId);
  }
}
