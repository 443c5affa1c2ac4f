import crypto from 'crypto';
import type Redis from 'ioredis';
import { ZodError } from 'zod';
import { JobDescription, QuestionSet } from '../types/interview';
import { CacheError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import { validateQuestionSet } from '../utils/validators';

export const QUESTION_CACHE_TTL_SECONDS = 60 * 60; // 1 hour in seconds

export interface CacheStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

export class RedisCacheStore implements CacheStore {
    constructor(private readonly redis: Pick<Redis, 'get' | 'setex'>) {}

    async get(key: string): Promise<string | null> {
        try {
            return await this.redis.get(key);
        } catch (error) {
            throw new CacheError(`Cache read failed: ${errorMessage(error)}`, 'get');
        }
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        try {
            await this.redis.setex(key, ttlSeconds, value);
        } catch (error) {
            throw new CacheError(`Cache write failed: ${errorMessage(error)}`, 'set');
        }
    }
}

export function getCacheKey(jobDesc: JobDescription): string {
    const content = `${jobDesc.title}|${jobDesc.description}`;
    return `questions:${crypto.createHash('sha256').update(content).digest('hex')}`;
}

/**
 * Strict decode of a cached question set. Returns null for anything that is
 * not a JSON array of exactly five non-empty strings.
 */
export function decodeQuestionSet(raw: string): QuestionSet | null {
    try {
        return validateQuestionSet(JSON.parse(raw));
    } catch (error) {
        if (error instanceof SyntaxError || error instanceof ZodError) {
            return null;
        }
        throw error;
    }
}

export async function readCachedQuestions(cache: CacheStore, key: string): Promise<QuestionSet | null> {
    const raw = await cache.get(key);
    if (raw === null) {
        return null;
    }
    const questions = decodeQuestionSet(raw);
    if (!questions) {
        logger.warn('Discarding malformed cached question set', {
            cacheKeyHash: key.substring(10, 18),
            length: raw.length,
        });
    }
    return questions;
}

export async function writeCachedQuestions(cache: CacheStore, key: string, questions: QuestionSet): Promise<void> {
    await cache.set(key, JSON.stringify(questions), QUESTION_CACHE_TTL_SECONDS);
}
