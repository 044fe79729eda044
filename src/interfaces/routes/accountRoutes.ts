import { Router } from 'express';
import { AccountController } from '../controllers/AccountController';
import { authenticate, authorize } from '../middleware/authMiddleware';
import { validate } from '../middleware/validationMiddleware';
import { contractCallRateLimiter } from '../middleware/rateLimitMiddleware';
import { asyncHandler } from '../middleware/errorMiddleware';
import { addressParamSchema, faucetSchema, setFeedPriceSchema, transferSchema } from '../validation/schemas';
import { UserRole } from '../../domain/entities/User';

export function createAccountRoutes(): Router {
  const router = Router();
  const controller = new AccountController();

  router.post('/transfer',
    authenticate(),
    contractCallRateLimiter,
    validate(transferSchema),
    asyncHandler((req, res) => controller.transfer(req, res))
  );

  router.get('/:address',
    validate(addressParamSchema),
    asyncHandler((req, res) => controller.get(req, res))
  );

  router.post('/:address/faucet',
    authenticate(),
    authorize(UserRole.ADMIN),
    validate(faucetSchema),
    asyncHandler((req, res) => controller.faucet(req, res))
  );

  return router;
}

export function createFeedRoutes(): Router {
  const router = Router();
  const controller = new AccountController();

  router.put('/:address',
    authenticate(),
    authorize(UserRole.ADMIN),
    validate(setFeedPriceSchema),
    asyncHandler((req, res) => controller.setFeedPrice(req, res))
  );

  return router;
}
