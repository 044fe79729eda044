import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { logger } from '../../infrastructure/logging/Logger';

interface RequestParts {
  body?: unknown;
  params?: unknown;
  query?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Validates the request parts the schema names and replaces them with the
 * converted values, so handlers see checksummed addresses. Wei amounts stay
 * decimal strings until `bodyWei` converts them.
 */
export function validate(schema: Joi.ObjectSchema) {
  const description: Joi.Description = schema.describe();
  const keys: unknown = description.keys;
  const covers = (part: keyof RequestParts): boolean => isRecord(keys) && part in keys;

  return (req: Request, res: Response, next: NextFunction) => {
    const target: RequestParts = {};
    if (covers('body')) target.body = req.body ?? {};
    if (covers('params')) target.params = req.params;
    if (covers('query')) target.query = req.query;

    const { error, value } = schema.validate(target, {
      abortEarly: false,
      stripUnknown: true
    });

    if (error) {
      const details = error.details.map(detail => ({
        field: detail.path.join('.'),
        message: detail.message
      }));

      logger.warn('Validation failed', {
        path: req.path,
        errors: details
      });

      res.status(400).json({
        success: false,
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details
      });
      return;
    }

    if (isRecord(value)) {
      if (covers('body')) req.body = value.body;
      if (covers('params') && isRecord(value.params)) {
        for (const [name, param] of Object.entries(value.params)) {
          if (typeof param === 'string') req.params[name] = param;
        }
      }
    }
    next();
  };
}
