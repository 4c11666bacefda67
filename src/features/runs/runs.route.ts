import { Router } from 'express';
import { authenticate } from '@/shared/middlewares/auth.middleware';
import { validate } from '@/shared/middlewares/validation.middleware';
import { listRunsSchema } from './runs.schema';
import { listRunsHandler } from './runs.controller';

const router = Router();

router.get('/', authenticate, validate(listRunsSchema), listRunsHandler);

export default router;
