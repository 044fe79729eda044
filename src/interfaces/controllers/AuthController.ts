import { Request, Response } from 'express';
import { container } from '../../container';
import { JwtService } from '../../infrastructure/auth/JwtService';
import { SignatureAuthService, adminAddresses } from '../../infrastructure/auth/SignatureAuthService';
import { User } from '../../domain/entities/User';
import { logger } from '../../infrastructure/logging/Logger';
import { bodyString } from './requestValues';

export class AuthController {
  async challenge(req: Request, res: Response): Promise<void> {
    const authService = container.get<SignatureAuthService>('SignatureAuthService');
    const challenge = authService.issueChallenge(bodyString(req, 'address'));

    res.json({
      success: true,
      data: challenge
    });
  }

  async login(req: Request, res: Response): Promise<void> {
    const authService = container.get<SignatureAuthService>('SignatureAuthService');
    const jwtService = container.get<JwtService>('JwtService');

    const user = authService.verifyChallenge(bodyString(req, 'address'), bodyString(req, 'signature'));
    const tokens = jwtService.generateTokens(user);

    logger.info('User logged in', { address: user.address, role: user.role });

    res.json({
      success: true,
      data: {
        ...tokens,
        user: {
          address: user.address,
          role: user.role
        }
      }
    });
  }

  async refreshToken(req: Request, res: Response): Promise<void> {
    const jwtService = container.get<JwtService>('JwtService');
    const payload = jwtService.verifyRefreshToken(bodyString(req, 'refreshToken'));

    // role is recomputed so that admin list changes apply on refresh
    const user = User.forAddress(payload.address, adminAddresses());
    const tokens = jwtService.generateTokens(user);

    logger.info('Token refreshed', { address: user.address });

    res.json({
      success: true,
      data: tokens
    });
  }
}
