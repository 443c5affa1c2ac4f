import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ErrorResponse } from '../types/interview';
import logger from '../utils/logger';
import { formatValidationErrors } from '../utils/validators';

/**
 * Rejects bodies that do not match the schema with 422 and replaces
 * `req.body` with the parsed (trimmed) value otherwise.
 */
export function inputValidatorMiddleware<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    return (req: Request, res: Response, next: NextFunction) => {
        const result = schema.safeParse(req.body);
        if (!result.success) {
            const validationErrors = formatValidationErrors(result.error);
            logger.info('Validation error', {
                endpoint: req.path,
                status: 'failed',
                validationErrors,
            });
            const errorResponse: ErrorResponse = { detail: validationErrors };
            return res.status(422).json(errorResponse);
        }
        req.body = result.data;
        return next();
    };
}
