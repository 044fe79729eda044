import { Router } from 'express';
import { EscrowController } from '../controllers/EscrowController';
import { authenticate } from '../middleware/authMiddleware';
import { validate } from '../middleware/validationMiddleware';
import { contractCallRateLimiter } from '../middleware/rateLimitMiddleware';
import { asyncHandler } from '../middleware/errorMiddleware';
import {
  addressParamSchema,
  createEscrowSchema,
  depositSchema,
  selectWinnerSchema
} from '../validation/schemas';

export function createEscrowRoutes(): Router {
  const router = Router();
  const controller = new EscrowController();

  router.post('/',
    authenticate(),
    contractCallRateLimiter,
    validate(createEscrowSchema),
    asyncHandler((req, res) => controller.create(req, res))
  );

  router.get('/:address',
    validate(addressParamSchema),
    asyncHandler((req, res) => controller.get(req, res))
  );

  router.get('/:address/events',
    validate(addressParamSchema),
    asyncHandler((req, res) => controller.events(req, res))
  );

  router.post('/:address/deposit',
    authenticate(),
    contractCallRateLimiter,
    validate(depositSchema),
    asyncHandler((req, res) => controller.deposit(req, res))
  );

  router.post('/:address/winner',
    authenticate(),
    contractCallRateLimiter,
    validate(selectWinnerSchema),
    asyncHandler((req, res) => controller.selectWinner(req, res))
  );

  router.post('/:address/withdraw',
    authenticate(),
    contractCallRateLimiter,
    validate(addressParamSchema),
    asyncHandler((req, res) => controller.withdraw(req, res))
  );

  return router;
}
