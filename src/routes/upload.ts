import { Router, type Request } from 'express';
import multer from 'multer';
import path from 'node:path';
import fs from 'node:fs';
import { v4 as uuidv4 } from 'uuid';

import type { Logger } from '../config/logger';
import { detectFormat } from '../pipeline/extractText';
import { fileIdPrefix, type FileKind, type FileMetadata, type FileStore } from '../store/files';
import type { UploadResponse } from '../types';
import { UnsupportedDocumentError, ValidationError } from '../util/errors';

type UploadRouterDeps = {
  dataDir: string;
  maxUploadBytes: number;
  files: FileStore;
  logger: Logger;
};

type UploadedFields = Partial<Record<string, Express.Multer.File[]>>;

const uploadedFields = (req: Request): UploadedFields =>
  req.files && !Array.isArray(req.files) ? req.files : {};

// Files multer already wrote for a rejected request have no record pointing at them.
const discardUploads = (req: Request): void => {
  Object.values(uploadedFields(req)).forEach((list) => {
    list?.forEach((file) => {
      fs.rmSync(file.path, { force: true });
    });
  });
};

const FIELD_KINDS: Record<string, FileKind> = {
  resume: 'resume',
  job_description: 'job_description',
};

export const createUploadRouter = ({ dataDir, maxUploadBytes, files, logger }: UploadRouterDeps): Router => {
  const router = Router();

  const filesDir = path.resolve(dataDir, 'files');
  fs.mkdirSync(filesDir, { recursive: true });

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, filesDir);
    },
    filename: (_req, file, cb) => {
      const uniqueName = `${Date.now()}-${path.basename(file.originalname)}`;
      cb(null, uniqueName);
    },
  });

  const upload = multer({
    storage,
    limits: { fileSize: maxUploadBytes },
    fileFilter: (_req, file, cb) => {
      if (!detectFormat(file.originalname)) {
        cb(new UnsupportedDocumentError(file.originalname));
        return;
      }
      cb(null, true);
    },
  });

  const receiveFields = upload.fields([
    { name: 'resume', maxCount: 1 },
    { name: 'job_description', maxCount: 1 },
  ]);

  router.post(
    '/',
    (req, res, next) => {
      receiveFields(req, res, (error?: unknown) => {
        if (error) {
          discardUploads(req);
        }
        next(error);
      });
    },
    (req, res) => {
      const uploaded = uploadedFields(req);
      const resumeFile = uploaded.resume?.[0];

      if (!resumeFile) {
        discardUploads(req);
        throw new ValidationError('A resume file is required.', [
          { path: 'resume', message: 'Required' },
        ]);
      }

      const saved: FileMetadata[] = Object.entries(FIELD_KINDS).flatMap(([field, kind]) => {
        const file = uploaded[field]?.[0];
        if (!file) {
          return [];
        }

        return [files.save({
          id: `${fileIdPrefix(kind)}${uuidv4()}`,
          kind,
          name: file.originalname,
          path: path.resolve(file.path),
          size: file.size,
          uploadedAt: new Date().toISOString(),
        })];
      });

      logger.info('upload.completed', { files: saved.map((entry) => ({ id: entry.id, kind: entry.kind, size: entry.size })) });

      const body: UploadResponse = {
        files: saved.map((entry) => ({ id: entry.id, name: entry.name, kind: entry.kind })),
      };

      res.json(body);
    },
  );

  return router;
};
