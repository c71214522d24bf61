import type { Logger } from '../config/logger';
import { isRecord, JsonFileStore } from './jsonStore';

export type UserPreferences = {
  userId: string;
  name: string;
  preferredRoles: string;
  updatedAt: string;
};

const isUserPreferences = (entry: unknown): entry is UserPreferences =>
  isRecord(entry)
  && typeof entry.userId === 'string'
  && typeof entry.name === 'string'
  && typeof entry.preferredRoles === 'string';

export class PreferenceStore {
  private readonly store: JsonFileStore<UserPreferences>;

  constructor(
    dataDir: string,
    logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.store = new JsonFileStore<UserPreferences>({
      dataDir,
      name: 'preferences',
      logger,
      getId: (entry) => entry.userId,
      isValid: isUserPreferences,
    });
  }

  save(userId: string, name: string, preferredRoles: string): UserPreferences {
    return this.store.set({
      userId,
      name,
      preferredRoles,
      updatedAt: this.now().toISOString(),
    });
  }

  get(userId: string): UserPreferences | undefined {
    return this.store.get(userId);
  }
}
