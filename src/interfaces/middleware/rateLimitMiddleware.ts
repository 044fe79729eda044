import rateLimit from 'express-rate-limit';
import { Request, Response } from 'express';
import { logger } from '../../infrastructure/logging/Logger';

export const createRateLimiter = (
  windowMs: number = 15 * 60 * 1000,
  max: number = 100,
  message: string = 'Too many requests from this IP, please try again later'
) => {
  return rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req: Request) => {
      if (process.env.NODE_ENV === 'test') return true;
      if (req.method === 'OPTIONS') return true;
      return req.path === '/health' || req.path === '/';
    },
    handler: (req: Request, res: Response) => {
      logger.warn('Rate limit exceeded', {
        ip: req.ip,
        path: req.path,
        method: req.method
      });

      res.status(429).json({
        success: false,
        error: message,
        code: 'RATE_LIMIT_EXCEEDED'
      });
    }
  });
};

const isDevelopment = process.env.NODE_ENV === 'development';

export const apiRateLimiter = createRateLimiter(
  15 * 60 * 1000,
  isDevelopment ? 1000 : 300
);

export const authRateLimiter = createRateLimiter(
  isDevelopment ? 60 * 1000 : 15 * 60 * 1000,
  isDevelopment ? 100 : 20,
  'Too many authentication attempts, please try again later'
);

/** Contract calls that mutate state. */
export const contractCallRateLimiter = createRateLimiter(
  60 * 1000,
  isDevelopment ? 200 : 30
);
