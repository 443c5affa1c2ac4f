import { Request, Response, NextFunction } from 'express';
import type Redis from 'ioredis';
import {
    RateLimiterAbstract,
    RateLimiterMemory,
    RateLimiterRedis,
    RateLimiterRes,
} from 'rate-limiter-flexible';
import { ErrorResponse } from '../types/interview';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export const RATE_LIMIT_POINTS = 5;
export const RATE_LIMIT_DURATION = 60;

const RATE_LIMIT_MESSAGE = `Rate limit exceeded: ${RATE_LIMIT_POINTS} per 1 minute`;

/**
 * Fixed-window limiter for one endpoint. Backed by Redis when a client is
 * given, with an in-memory insurance limiter that takes over while Redis is down.
 */
export function createRateLimiter(keyPrefix: string, redis?: Redis): RateLimiterAbstract {
    const memoryLimiter = new RateLimiterMemory({
        keyPrefix,
        points: RATE_LIMIT_POINTS,
        duration: RATE_LIMIT_DURATION,
    });

    if (!redis) {
        return memoryLimiter;
    }

    return new RateLimiterRedis({
        storeClient: redis,
        keyPrefix,
        points: RATE_LIMIT_POINTS,
        duration: RATE_LIMIT_DURATION,
        blockDuration: 0,
        insuranceLimiter: memoryLimiter,
    });
}

export function rateLimitMiddleware(rateLimiter: RateLimiterAbstract) {
    return async (req: Request, res: Response, next: NextFunction) => {
        const ip = req.ip || 'unknown';

        try {
            await rateLimiter.consume(ip);
        } catch (rejection: unknown) {
            if (!(rejection instanceof RateLimiterRes)) {
                logger.error('Rate limiter store failure', {
                    ip,
                    endpoint: req.path,
                    error: errorMessage(rejection),
                    stack: rejection instanceof Error ? rejection.stack : undefined,
                });
                const errorResponse: ErrorResponse = { detail: errorMessage(rejection) };
                return res.status(500).json(errorResponse);
            }

            const retryAfter = Math.ceil(rejection.msBeforeNext / 1000) || 1;
            res.set('Retry-After', String(retryAfter));

            logger.warn('Rate limit exceeded', {
                ip,
                retryAfter,
                endpoint: req.path,
            });

            const errorResponse: ErrorResponse = { detail: RATE_LIMIT_MESSAGE };
            return res.status(429).json(errorResponse);
        }

        return next();
    };
}
