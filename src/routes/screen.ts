import { Router } from 'express';
import { z } from 'zod';

import { describeError, type Logger } from '../config/logger';
import type { ScreeningLlm } from '../llm/client';
import { extractText } from '../pipeline/extractText';
import type { ReviewerPreferences } from '../pipeline/recommend';
import { formatReport } from '../pipeline/report';
import { screenResume } from '../pipeline/screen';
import type { FileStore } from '../store/files';
import type { JobStore } from '../store/jobs';
import type { PreferenceStore } from '../store/preferences';
import type { ScreenQueued, ScreeningResult } from '../types';
import { NotFoundError } from '../util/errors';
import { validationFailed } from './validation';

export type ScheduleTask = (task: () => Promise<void>) => void;

type ScreenRouterDeps = {
  llm: ScreeningLlm;
  logger: Logger;
  files: FileStore;
  jobs: JobStore;
  preferences: PreferenceStore;
  schedule: ScheduleTask;
};

const screenSchema = z
  .object({
    resume_file_id: z.string().min(1, 'resume_file_id is required'),
    job_description: z.string().trim().min(1).optional(),
    job_description_file_id: z.string().min(1).optional(),
    user_id: z.string().min(1).optional(),
  })
  .refine(
    (body) => (body.job_description === undefined) !== (body.job_description_file_id === undefined),
    {
      message: 'Provide exactly one of job_description or job_description_file_id',
      path: ['job_description'],
    },
  );

type ScreenPayload = z.infer<typeof screenSchema>;

export const runInBackground: ScheduleTask = (task) => {
  setImmediate(() => {
    void task();
  });
};

export const createScreenRouter = ({ llm, logger, files, jobs, preferences, schedule }: ScreenRouterDeps): Router => {
  const router = Router();

  const readFileText = async (id: string, kind: 'resume' | 'job_description'): Promise<string> => {
    const meta = files.get(id, kind);

    if (!meta) {
      throw new NotFoundError(`No ${kind.replace('_', ' ')} file found with id "${id}".`);
    }

    const document = await extractText(meta.path);
    return document.text;
  };

  const resolvePreferences = (userId: string | undefined): ReviewerPreferences | undefined => {
    const saved = userId ? preferences.get(userId) : undefined;
    return saved && { name: saved.name, preferredRoles: saved.preferredRoles };
  };

  const processJob = async (jobId: string, payload: ScreenPayload): Promise<void> => {
    jobs.update(jobId, { status: 'processing' });

    try {
      const resumeText = await readFileText(payload.resume_file_id, 'resume');
      const jobDescription = payload.job_description
        ?? await readFileText(payload.job_description_file_id ?? '', 'job_description');

      const report = await screenResume(
        { llm, logger },
        { resumeText, jobDescription, preferences: resolvePreferences(payload.user_id) },
      );

      const result: ScreeningResult = {
        report,
        report_text: formatReport(report),
      };

      jobs.update(jobId, { status: 'completed', result });
      logger.info('screening.job.completed', { jobId, score: report.score.score, decision: report.recommendation.decision });
    } catch (error) {
      const message = describeError(error);
      jobs.update(jobId, { status: 'failed', error: message });
      logger.error('screening.job.failed', { jobId, error: message });
    }
  };

  router.post('/', (req, res) => {
    const validation = screenSchema.safeParse(req.body);

    if (!validation.success) {
      throw validationFailed(validation.error);
    }

    const job = jobs.create();

    schedule(() => processJob(job.id, validation.data));

    const body: ScreenQueued = { id: job.id, status: 'queued' };

    res.status(202).json(body);
  });

  return router;
};
