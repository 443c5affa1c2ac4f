/**
 * Question Service - Generates interview questions for a job, reading through the question cache
 */

import {
    COMPLETION_MAX_TOKENS,
    COMPLETION_TEMPERATURE,
    INTERVIEWER_SYSTEM_PROMPT,
    buildQuestionPrompt,
} from '../prompts/interviewer';
import { JobDescription, QuestionSet } from '../types/interview';
import { QuestionCountError, errorMessage } from '../utils/errors';
import logger, { logAICall, logCache } from '../utils/logger';
import { QUESTION_COUNT } from '../utils/validators';
import { CompletionClient } from './completionClient';
import { CacheStore, getCacheKey, readCachedQuestions, writeCachedQuestions } from './questionCache';

export interface QuestionServiceDeps {
    completionClient: CompletionClient;
    cache: CacheStore;
}

// One or two digits, a period, one space, then the question text
const NUMBERED_LINE = /^\d{1,2}\. \S/;

/**
 * Keep only the numbered lines of a model response, trimmed.
 * "1) ...", "**1. ...**" and bullet lines do not count as questions.
 */
export function extractQuestions(content: string): string[] {
    return content
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => NUMBERED_LINE.test(line));
}

export async function generateQuestions(
    jobDesc: JobDescription,
    deps: QuestionServiceDeps,
    requestId = 'unknown'
): Promise<QuestionSet> {
    const { completionClient, cache } = deps;
    const cacheKey = getCacheKey(jobDesc);
    const cacheKeyHash = cacheKey.substring(10, 18);

    const cached = await readCachedQuestions(cache, cacheKey);
    if (cached) {
        logCache('hit', { requestId, cacheKeyHash });
        return cached;
    }
    logCache('miss', { requestId, cacheKeyHash });

    logAICall(completionClient.model, 'start', { requestId, promptName: 'generate_questions' });
    let content: string;
    try {
        content = await completionClient.complete({
            system: INTERVIEWER_SYSTEM_PROMPT,
            user: buildQuestionPrompt(jobDesc),
            temperature: COMPLETION_TEMPERATURE,
            maxTokens: COMPLETION_MAX_TOKENS,
        });
    } catch (error) {
        logAICall(completionClient.model, 'error', {
            requestId,
            promptName: 'generate_questions',
            error: errorMessage(error),
        });
        throw error;
    }
    logAICall(completionClient.model, 'success', { requestId, promptName: 'generate_questions' });

    const questions = extractQuestions(content);
    if (questions.length !== QUESTION_COUNT) {
        logger.error(`Generated ${questions.length} questions instead of ${QUESTION_COUNT}`, {
            requestId,
            preview: content.substring(0, 200),
        });
        throw new QuestionCountError(
            'Failed to generate the correct number of questions',
            QUESTION_COUNT,
            questions.length
        );
    }

    await writeCachedQuestions(cache, cacheKey, questions);
    logCache('write', { requestId, cacheKeyHash });

    return questions;
}
