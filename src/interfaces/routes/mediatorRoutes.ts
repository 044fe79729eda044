import { Router } from 'express';
import { MediatorController } from '../controllers/MediatorController';
import { authenticate } from '../middleware/authMiddleware';
import { validate } from '../middleware/validationMiddleware';
import { contractCallRateLimiter } from '../middleware/rateLimitMiddleware';
import { asyncHandler } from '../middleware/errorMiddleware';
import { addressParamSchema, createMediatorSchema } from '../validation/schemas';

export function createMediatorRoutes(): Router {
  const router = Router();
  const controller = new MediatorController();

  router.post('/',
    authenticate(),
    contractCallRateLimiter,
    validate(createMediatorSchema),
    asyncHandler((req, res) => controller.create(req, res))
  );

  router.get('/:address',
    validate(addressParamSchema),
    asyncHandler((req, res) => controller.get(req, res))
  );

  // Any authenticated caller may trigger resolution
  router.post('/:address/resolve',
    authenticate(),
    contractCallRateLimiter,
    validate(addressParamSchema),
    asyncHandler((req, res) => controller.resolve(req, res))
  );

  return router;
}
