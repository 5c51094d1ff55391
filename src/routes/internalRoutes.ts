import { Router } from 'express';
import { createError } from '../middleware/errorHandler';
import { requireInternalApiKey } from '../middleware/auth';
import { getSchedulerStatus, runJob } from '../jobs/scheduler';
import type { SchedulerDeps } from '../jobs/scheduler';
import type { RunJobResponse } from '../types/api';
import { toString } from '../utils/express-utils';
import { successResponse } from '../utils/response';

// Mounted at /api/internal, guarded by X-Internal-API-Key
export function createInternalRoutes(deps: SchedulerDeps): Router {
  const router = Router();

  router.use(requireInternalApiKey);

  router.get('/jobs', (_req, res) => {
    successResponse(res, getSchedulerStatus());
  });

  router.post('/jobs/:jobName', async (req, res, next) => {
    try {
      const jobName = toString(req.params.jobName);
      const outcome = await runJob(jobName, deps);
      if (!outcome.success) {
        throw createError(outcome.error ?? 'Job failed', 404, 'UNKNOWN_JOB');
      }
      const body: RunJobResponse = { job: jobName, result: outcome.result };
      successResponse(res, body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
