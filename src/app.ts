import express, { type Express } from 'express';

import type { AppConfig } from './config/env';
import type { Logger } from './config/logger';
import type { ScreeningLlm } from './llm/client';
import { createErrorHandler } from './routes/errorHandler';
import { createPreferencesRouter } from './routes/preferences';
import { createResultRouter } from './routes/result';
import { createScreenRouter, runInBackground, type ScheduleTask } from './routes/screen';
import { createUploadRouter } from './routes/upload';
import { FileStore } from './store/files';
import { JobStore } from './store/jobs';
import { PreferenceStore } from './store/preferences';
import { NotFoundError } from './util/errors';

export type AppDeps = {
  config: Pick<AppConfig, 'dataDir' | 'maxUploadBytes'>;
  logger: Logger;
  llm: ScreeningLlm;
  schedule?: ScheduleTask;
};

export const createApp = ({ config, logger, llm, schedule = runInBackground }: AppDeps): Express => {
  const files = new FileStore(config.dataDir, logger);
  const jobs = new JobStore(config.dataDir, logger);
  const preferences = new PreferenceStore(config.dataDir, logger);

  const app = express();
  app.use(express.json({ limit: '2mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/upload', createUploadRouter({
    dataDir: config.dataDir,
    maxUploadBytes: config.maxUploadBytes,
    files,
    logger,
  }));
  app.use('/screen', createScreenRouter({ llm, logger, files, jobs, preferences, schedule }));
  app.use('/result', createResultRouter(jobs));
  app.use('/users', createPreferencesRouter(preferences, logger));

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });
  app.use(createErrorHandler(logger));

  return app;
};
