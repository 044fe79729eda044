import { isAddress } from 'ethers';
import { logger } from '../infrastructure/logging/Logger';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

function checkInterval(name: string, minimum: number, warnings: string[]): void {
  const raw = process.env[name];
  if (!raw) return;
  const value = parseInt(raw, 10);
  if (isNaN(value) || value < minimum) {
    warnings.push(`Invalid ${name}: ${raw}. Should be >= ${minimum}ms.`);
  }
}

function checkExpiry(name: string, errors: string[]): void {
  const raw = process.env[name];
  if (raw && !/^\d+[smhd]?$/.test(raw.trim())) {
    errors.push(`${name} must be seconds or a number with an s/m/h/d suffix, got ${raw}`);
  }
}

/**
 * Validates the environment. Errors block startup, warnings fall back to
 * defaults.
 */
export function validateEnvironment(): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!process.env.JWT_ACCESS_SECRET) {
    errors.push('Missing critical environment variable: JWT_ACCESS_SECRET');
  }
  if (!process.env.JWT_REFRESH_SECRET) {
    errors.push('Missing critical environment variable: JWT_REFRESH_SECRET');
  }
  if (
    process.env.JWT_ACCESS_SECRET &&
    process.env.JWT_ACCESS_SECRET === process.env.JWT_REFRESH_SECRET
  ) {
    warnings.push('JWT_ACCESS_SECRET and JWT_REFRESH_SECRET are identical');
  }
  checkExpiry('JWT_ACCESS_EXPIRY', errors);
  checkExpiry('JWT_REFRESH_EXPIRY', errors);

  if (process.env.USE_MONGODB === 'true' && !process.env.MONGODB_URI) {
    errors.push('MONGODB_URI is required when USE_MONGODB is true');
  }

  if (process.env.USE_REAL_ORACLE === 'true' && !process.env.ETHEREUM_RPC_URL) {
    errors.push('ETHEREUM_RPC_URL is required when USE_REAL_ORACLE is true');
  }

  const admins = (process.env.ADMIN_ADDRESSES || '')
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
  for (const admin of admins) {
    if (!isAddress(admin)) {
      errors.push(`ADMIN_ADDRESSES contains an invalid address: ${admin}`);
    }
  }
  if (admins.length === 0) {
    warnings.push('ADMIN_ADDRESSES is empty; admin endpoints are unreachable');
  }

  if (process.env.PORT) {
    const port = parseInt(process.env.PORT, 10);
    if (isNaN(port) || port < 1 || port > 65535) {
      warnings.push(`Invalid PORT value: ${process.env.PORT}. Using default 3000.`);
    }
  }

  checkInterval('MONITORING_INTERVAL', 1000, warnings);
  checkInterval('DECISION_COOLDOWN_MS', 0, warnings);
  checkInterval('ORACLE_TIMEOUT_MS', 1, warnings);

  if (process.env.NODE_ENV === 'production' && process.env.LEDGER_FAUCET_ENABLED === 'true') {
    warnings.push('LEDGER_FAUCET_ENABLED is on in production');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Logs validation results and exits if critical errors are found.
 */
export function validateAndExitOnErrors(): void {
  logger.info('Validating environment configuration...');

  const result = validateEnvironment();

  result.warnings.forEach(warning => {
    logger.warn(`Environment warning: ${warning}`);
  });
  result.errors.forEach(error => {
    logger.error(`Environment error: ${error}`);
  });

  if (!result.isValid) {
    logger.error('Environment validation failed. Cannot start server.');
    process.exit(1);
  }

  logger.info('Environment validation passed.');
  logger.info('Current configuration:', getEnvDefaults());
}

/**
 * Effective configuration with defaults applied. Contains no secrets.
 */
export function getEnvDefaults() {
  return {
    PORT: parseInt(process.env.PORT || '3000', 10),
    HOST: process.env.HOST || '0.0.0.0',
    NODE_ENV: process.env.NODE_ENV || 'development',
    MONITORING_INTERVAL: parseInt(process.env.MONITORING_INTERVAL || '60000', 10),
    DECISION_COOLDOWN_MS: parseInt(process.env.DECISION_COOLDOWN_MS || '15000', 10),
    USE_MONGODB: process.env.USE_MONGODB === 'true',
    USE_REAL_ORACLE: process.env.USE_REAL_ORACLE === 'true',
    LEDGER_FAUCET_ENABLED: process.env.LEDGER_FAUCET_ENABLED === 'true'
  };
}
