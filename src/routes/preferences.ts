import { Router } from 'express';
import { z } from 'zod';

import type { Logger } from '../config/logger';
import type { PreferenceStore } from '../store/preferences';
import type { PreferencesResponse } from '../types';
import { validationFailed } from './validation';

const preferencesSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  preferred_roles: z.string().trim().min(1, 'preferred_roles is required'),
});

export const createPreferencesRouter = (preferences: PreferenceStore, logger: Logger): Router => {
  const router = Router();

  router.put('/:id/preferences', (req, res) => {
    const validation = preferencesSchema.safeParse(req.body);

    if (!validation.success) {
      throw validationFailed(validation.error);
    }

    const saved = preferences.save(req.params.id, validation.data.name, validation.data.preferred_roles);
    logger.info('preferences.saved', { userId: saved.userId });

    const body: PreferencesResponse = {
      user_id: saved.userId,
      name: saved.name,
      preferred_roles: saved.preferredRoles,
    };

    res.json(body);
  });

  router.get('/:id/preferences', (req, res) => {
    const saved = preferences.get(req.params.id);

    const body: PreferencesResponse = {
      user_id: req.params.id,
      name: saved?.name ?? 'Not provided',
      preferred_roles: saved?.preferredRoles ?? 'Not specified',
    };

    res.json(body);
  });

  return router;
};
