import { Router } from 'express';
import { AuthController } from '../controllers/AuthController';
import { validate } from '../middleware/validationMiddleware';
import { challengeSchema, loginSchema, refreshSchema } from '../validation/schemas';
import { authRateLimiter } from '../middleware/rateLimitMiddleware';
import { asyncHandler } from '../middleware/errorMiddleware';

export function createAuthRoutes(): Router {
  const router = Router();
  const controller = new AuthController();

  router.post('/challenge',
    authRateLimiter,
    validate(challengeSchema),
    asyncHandler((req, res) => controller.challenge(req, res))
  );

  router.post('/login',
    authRateLimiter,
    validate(loginSchema),
    asyncHandler((req, res) => controller.login(req, res))
  );

  router.post('/refresh',
    authRateLimiter,
    validate(refreshSchema),
    asyncHandler((req, res) => controller.refreshToken(req, res))
  );

  return router;
}
