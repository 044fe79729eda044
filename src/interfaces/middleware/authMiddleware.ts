import { Request, Response, NextFunction } from 'express';
import { container } from '../../container';
import { JwtService, JwtPayload } from '../../infrastructure/auth/JwtService';
import { AppError } from '../../domain/errors/AppError';
import { UserRole } from '../../domain/entities/User';

declare global {
  namespace Express {
    interface Request {
      user?: JwtPayload;
    }
  }
}

export function authenticate() {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      const authHeader = req.headers.authorization;
      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        throw AppError.unauthorized('No token provided');
      }

      const jwtService = container.get<JwtService>('JwtService');
      req.user = jwtService.verifyAccessToken(authHeader.substring(7));
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function authorize(...roles: UserRole[]) {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.user) {
      return next(AppError.unauthorized('Not authenticated'));
    }
    if (!roles.includes(req.user.role)) {
      return next(AppError.forbidden('Insufficient permissions'));
    }
    next();
  };
}

/**
 * The authenticated address; every contract call uses it as the caller.
 */
export function callerOf(req: Request): string {
  if (!req.user) {
    throw AppError.unauthorized('Not authenticated');
  }
  return req.user.address;
}
