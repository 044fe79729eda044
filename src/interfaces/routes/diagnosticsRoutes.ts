import { Router } from 'express';
import { DiagnosticsController } from '../controllers/DiagnosticsController';
import { asyncHandler } from '../middleware/errorMiddleware';

export function createDiagnosticsRoutes(): Router {
  const router = Router();
  const controller = new DiagnosticsController();

  router.get('/', asyncHandler((req, res) => controller.getDiagnostics(req, res)));

  return router;
}
