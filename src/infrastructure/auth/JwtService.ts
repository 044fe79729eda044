import jwt from 'jsonwebtoken';
import { injectable } from 'inversify';
import { AppError } from '../../domain/errors/AppError';
import { User, UserRole, isUserRole } from '../../domain/entities/User';
import { logger } from '../logging/Logger';

export interface JwtPayload {
  address: string;
  role: UserRole;
}

export interface AuthTokens {
  accessToken: string;
  refreshToken: string;
  expiresIn: number;
}

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/**
 * Accepts plain seconds ("900") or a number with an s/m/h/d suffix ("15m").
 */
export function parseExpiry(value: string): number {
  const match = /^(\d+)([smhd]?)$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid token expiry: ${value}`);
  }
  return parseInt(match[1], 10) * UNIT_SECONDS[match[2] || 's'];
}

@injectable()
export class JwtService {
  private readonly accessTokenSecret: string;
  private readonly refreshTokenSecret: string;
  private readonly accessTokenExpiry: number;
  private readonly refreshTokenExpiry: number;

  constructor() {
    this.accessTokenSecret = process.env.JWT_ACCESS_SECRET || '';
    this.refreshTokenSecret = process.env.JWT_REFRESH_SECRET || '';
    this.accessTokenExpiry = parseExpiry(process.env.JWT_ACCESS_EXPIRY || '15m');
    this.refreshTokenExpiry = parseExpiry(process.env.JWT_REFRESH_EXPIRY || '7d');

    if (!this.accessTokenSecret || !this.refreshTokenSecret) {
      throw new Error('JWT secrets must be configured');
    }
  }

  generateTokens(user: User): AuthTokens {
    const payload: JwtPayload = {
      address: user.address,
      role: user.role
    };

    const accessToken = jwt.sign(payload, this.accessTokenSecret, {
      expiresIn: this.accessTokenExpiry,
      subject: user.address
    });

    const refreshToken = jwt.sign(payload, this.refreshTokenSecret, {
      expiresIn: this.refreshTokenExpiry,
      subject: user.address
    });

    logger.info('Generated tokens', { address: user.address, role: user.role });

    return { accessToken, refreshToken, expiresIn: this.accessTokenExpiry };
  }

  verifyAccessToken(token: string): JwtPayload {
    return this.verify(token, this.accessTokenSecret, 'Invalid access token');
  }

  verifyRefreshToken(token: string): JwtPayload {
    return this.verify(token, this.refreshTokenSecret, 'Invalid refresh token');
  }

  private verify(token: string, secret: string, failure: string): JwtPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, secret);
    } catch (error) {
      logger.warn(failure, { error: error instanceof Error ? error.message : 'Unknown error' });
      throw AppError.unauthorized(failure);
    }

    if (typeof decoded === 'string' || typeof decoded.address !== 'string' || !isUserRole(decoded.role)) {
      logger.warn(failure, { error: 'Unexpected token payload' });
      throw AppError.unauthorized(failure);
    }
    return { address: decoded.address, role: decoded.role };
  }
}
