import { v4 as uuidv4 } from 'uuid';

import type { Logger } from '../config/logger';
import type { ScreeningResult } from '../types';
import { isRecord, JsonFileStore } from './jsonStore';

export type JobStatus = 'queued' | 'processing' | 'completed' | 'failed';

const JOB_STATUSES: ReadonlySet<unknown> = new Set<JobStatus>(['queued', 'processing', 'completed', 'failed']);

export type JobRecord = {
  id: string;
  status: JobStatus;
  createdAt: string;
  updatedAt: string;
  result?: ScreeningResult;
  error?: string;
};

const isJobRecord = (entry: unknown): entry is JobRecord =>
  isRecord(entry) && typeof entry.id === 'string' && JOB_STATUSES.has(entry.status);

export class JobStore {
  private readonly store: JsonFileStore<JobRecord>;

  constructor(
    dataDir: string,
    logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.store = new JsonFileStore<JobRecord>({
      dataDir,
      name: 'jobs',
      logger,
      getId: (entry) => entry.id,
      isValid: isJobRecord,
    });
  }

  create(): JobRecord {
    const timestamp = this.now().toISOString();

    return this.store.set({
      id: uuidv4(),
      status: 'queued',
      createdAt: timestamp,
      updatedAt: timestamp,
    });
  }

  update(id: string, patch: Partial<Omit<JobRecord, 'id' | 'createdAt'>>): JobRecord | undefined {
    return this.store.update(id, { ...patch, updatedAt: this.now().toISOString() });
  }

  get(id: string): JobRecord | undefined {
    return this.store.get(id);
  }
}
