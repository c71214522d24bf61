import { Router } from 'express';

import type { JobStore } from '../store/jobs';
import type { ResultResponse } from '../types';
import { NotFoundError } from '../util/errors';

export const createResultRouter = (jobs: JobStore): Router => {
  const router = Router();

  router.get('/:id', (req, res) => {
    const { id } = req.params;
    const job = jobs.get(id);

    if (!job) {
      throw new NotFoundError('Job not found');
    }

    let body: ResultResponse;

    if (job.status === 'completed' && job.result) {
      body = { id: job.id, status: job.status, result: job.result };
    } else if (job.status === 'failed') {
      body = { id: job.id, status: job.status, error: job.error ?? 'Unknown error' };
    } else if (job.status === 'queued' || job.status === 'processing') {
      body = { id: job.id, status: job.status };
    } else {
      // A completed record without its result cannot be served.
      body = { id: job.id, status: 'failed', error: 'Result is missing for completed job' };
    }

    res.json(body);
  });

  return router;
};
