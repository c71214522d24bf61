import type { Logger } from '../config/logger';
import { isRecord, JsonFileStore } from './jsonStore';

export type FileKind = 'resume' | 'job_description';

export type FileMetadata = {
  id: string;
  kind: FileKind;
  name: string;
  path: string;
  size: number;
  uploadedAt: string;
};

const ID_PREFIX: Record<FileKind, string> = {
  resume: 'res_',
  job_description: 'jd_',
};

export const fileIdPrefix = (kind: FileKind): string => ID_PREFIX[kind];

const isFileMetadata = (entry: unknown): entry is FileMetadata =>
  isRecord(entry)
  && typeof entry.id === 'string'
  && typeof entry.path === 'string'
  && (entry.kind === 'resume' || entry.kind === 'job_description');

export class FileStore {
  private readonly store: JsonFileStore<FileMetadata>;

  constructor(dataDir: string, logger: Logger) {
    this.store = new JsonFileStore<FileMetadata>({
      dataDir,
      name: 'files',
      logger,
      getId: (entry) => entry.id,
      isValid: isFileMetadata,
    });
  }

  save(meta: FileMetadata): FileMetadata {
    return this.store.set(meta);
  }

  get(id: string, kind?: FileKind): FileMetadata | undefined {
    const entry = this.store.get(id);
    if (!entry || (kind && entry.kind !== kind)) {
      return undefined;
    }
    return entry;
  }
}
