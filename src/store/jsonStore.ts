import fs from 'node:fs';
import path from 'node:path';

import { describeError, type Logger } from '../config/logger';

type JsonStoreOptions<T> = {
  dataDir: string;
  name: string;
  logger: Logger;
  getId: (entry: T) => string;
  isValid: (entry: unknown) => entry is T;
};

/**
 * In-memory map mirrored to `<dataDir>/<name>.json` as an array.
 * The file is rewritten after every change; write failures are logged and the
 * in-memory copy stays authoritative.
 */
export class JsonFileStore<T> {
  private readonly entries = new Map<string, T>();

  private readonly dataDir: string;

  private readonly storePath: string;

  private readonly logger: Logger;

  private readonly getId: (entry: T) => string;

  private readonly isValid: (entry: unknown) => entry is T;

  constructor({ dataDir, name, logger, getId, isValid }: JsonStoreOptions<T>) {
    this.dataDir = path.resolve(dataDir);
    this.storePath = path.join(this.dataDir, `${name}.json`);
    this.logger = logger;
    this.getId = getId;
    this.isValid = isValid;

    this.loadFromDisk();
  }

  private loadFromDisk(): void {
    if (!fs.existsSync(this.storePath)) {
      return;
    }

    try {
      const raw = fs.readFileSync(this.storePath, 'utf-8');
      if (!raw.trim()) {
        return;
      }

      const parsed: unknown = JSON.parse(raw);
      const entriesArray: unknown[] = Array.isArray(parsed)
        ? parsed
        : Object.values(parsed && typeof parsed === 'object' ? parsed : {});

      entriesArray.forEach((entry) => {
        if (this.isValid(entry)) {
          this.entries.set(this.getId(entry), entry);
        }
      });
    } catch (error) {
      this.logger.error('store.load.failed', { path: this.storePath, error: describeError(error) });
    }
  }

  private persist(): void {
    try {
      fs.mkdirSync(this.dataDir, { recursive: true });
      const payload = JSON.stringify(Array.from(this.entries.values()), null, 2);
      fs.writeFileSync(this.storePath, payload);
    } catch (error) {
      this.logger.error('store.persist.failed', { path: this.storePath, error: describeError(error) });
    }
  }

  get(id: string): T | undefined {
    return this.entries.get(id);
  }

  set(entry: T): T {
    this.entries.set(this.getId(entry), entry);
    this.persist();
    return entry;
  }

  update(id: string, patch: Partial<T>): T | undefined {
    const existing = this.entries.get(id);
    if (!existing) {
      return undefined;
    }

    return this.set({ ...existing, ...patch });
  }

  values(): T[] {
    return Array.from(this.entries.values());
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);
