import { Request } from 'express';
import { AppError } from '../../domain/errors/AppError';

/**
 * Typed access to request fields that the joi schemas have already
 * validated and converted.
 */
function field(source: unknown, name: string): unknown {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  return Object.entries(source).find(([key]) => key === name)?.[1];
}

export function bodyString(req: Request, name: string): string {
  const value = field(req.body, name);
  if (typeof value !== 'string') {
    throw AppError.validationError(`"${name}" is required`);
  }
  return value;
}

export function bodyWei(req: Request, name: string): bigint {
  const value = field(req.body, name);
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return BigInt(value);
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  throw AppError.validationError(`"${name}" must be an amount in wei`);
}

export function optionalBodyWei(req: Request, name: string): bigint | undefined {
  return field(req.body, name) === undefined ? undefined : bodyWei(req, name);
}

export function optionalBodyInteger(req: Request, name: string): number | undefined {
  const value = field(req.body, name);
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw AppError.validationError(`"${name}" must be an integer`);
  }
  return value;
}

export function bodyInteger(req: Request, name: string): number {
  const value = optionalBodyInteger(req, name);
  if (value === undefined) {
    throw AppError.validationError(`"${name}" is required`);
  }
  return value;
}
