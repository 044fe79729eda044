import express from 'express';
import helmet from 'helmet';
import cors, { CorsOptions } from 'cors';
import dotenv from 'dotenv';
import { createAuthRoutes } from './interfaces/routes/authRoutes';
import { createEscrowRoutes } from './interfaces/routes/escrowRoutes';
import { createMediatorRoutes } from './interfaces/routes/mediatorRoutes';
import { createAccountRoutes, createFeedRoutes } from './interfaces/routes/accountRoutes';
import { createDiagnosticsRoutes } from './interfaces/routes/diagnosticsRoutes';
import { errorHandler, notFoundHandler } from './interfaces/middleware/errorMiddleware';
import { apiRateLimiter } from './interfaces/middleware/rateLimitMiddleware';
import { logger } from './infrastructure/logging/Logger';

dotenv.config();

const DEFAULT_DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
  'http://127.0.0.1:5173'
];

function trustProxySetting(raw: string): boolean | number | string {
  const lower = raw.toLowerCase();
  if (lower === 'true' || lower === 'false') return lower === 'true';
  if (!isNaN(Number(raw))) return Number(raw);
  return raw;
}

export function createApp() {
  const app = express();

  // TRUST_PROXY: hop count, true/false, or a subnet list
  const trustProxyEnv = process.env.TRUST_PROXY;
  if (typeof trustProxyEnv !== 'undefined') {
    app.set('trust proxy', trustProxySetting(trustProxyEnv));
    logger.info('Express trust proxy configured', { value: trustProxyEnv });
  }

  app.use(helmet());

  const envOrigins = (process.env.ALLOWED_ORIGINS || '')
    .split(',')
    .map(o => o.trim().replace(/\/$/, ''))
    .filter(o => o.length > 0);
  const allowedOrigins = envOrigins.length > 0 ? envOrigins : DEFAULT_DEV_ORIGINS;

  const corsOptions: CorsOptions = {
    origin: (origin, callback) => {
      // same-origin and non-browser requests carry no Origin header
      if (!origin || allowedOrigins.includes(origin.replace(/\/$/, ''))) {
        return callback(null, true);
      }
      logger.warn('CORS blocked origin', { origin });
      callback(null, false);
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    maxAge: 86400
  };
  app.use(cors(corsOptions));

  app.use(express.json({ limit: '100kb' }));

  app.use(apiRateLimiter);

  app.use((req, _res, next) => {
    logger.debug('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip
    });
    next();
  });

  app.get('/', (_req, res) => {
    res.json({ status: 'ok', service: 'betme-escrow', path: '/' });
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development'
    });
  });

  app.use('/api/auth', createAuthRoutes());
  app.use('/api/escrows', createEscrowRoutes());
  app.use('/api/mediators', createMediatorRoutes());
  app.use('/api/accounts', createAccountRoutes());
  app.use('/api/feeds', createFeedRoutes());
  app.use('/api/diagnostics', createDiagnosticsRoutes());

  app.use(notFoundHandler);

  // must be last
  app.use(errorHandler);

  return app;
}
