import type { ColumnType, Insertable, Selectable } from 'kysely';

type UpdatableTimestampColumn = ColumnType<
  Date,
  Date | string | undefined,
  Date | string | undefined
>;

// jsonb comes back parsed; writes go in as serialized JSON.
type JsonColumn = ColumnType<unknown, string, string>;

export interface IUserSettingsTable {
  user_id: string;
  profile: JsonColumn;
  updated_at: UpdatableTimestampColumn;
}

export interface IDatabase {
  user_settings: IUserSettingsTable;
}

export type UserSettingsRow = Selectable<IUserSettingsTable>;
export type NewUserSettingsRow = Insertable<IUserSettingsTable>;
