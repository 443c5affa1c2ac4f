/**
 * Feedback Service - Scores a transcript of interview answers into a FeedbackReport
 */

import { ZodError } from 'zod';
import {
    COMPLETION_MAX_TOKENS,
    COMPLETION_TEMPERATURE,
    INTERVIEWER_SYSTEM_PROMPT,
    buildAnalysisPrompt,
} from '../prompts/interviewer';
import { FeedbackReport, InterviewAnswer } from '../types/interview';
import { ParseError, ValidationError, errorMessage } from '../utils/errors';
import { logAICall } from '../utils/logger';
import { formatValidationErrors, validateFeedbackReport } from '../utils/validators';
import { CompletionClient } from './completionClient';

export interface FeedbackServiceDeps {
    completionClient: CompletionClient;
}

const FENCE = '```';

/**
 * Drop the first and last line when the content opens with a Markdown fence.
 */
export function stripCodeFence(content: string): string {
    if (!content.startsWith(FENCE)) {
        return content;
    }
    const lines = content.split('\n');
    if (lines.length < 2) {
        throw new ParseError('Code fence has no content', content.substring(0, 200));
    }
    return lines.slice(1, -1).join('\n');
}

export function parseFeedback(content: string): FeedbackReport {
    const body = stripCodeFence(content);

    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch (error) {
        const reason = error instanceof SyntaxError ? error.message : String(error);
        throw new ParseError(`Failed to parse JSON: ${reason}`, body.substring(0, 200));
    }

    try {
        return validateFeedbackReport(parsed);
    } catch (error) {
        if (error instanceof ZodError) {
            const details = formatValidationErrors(error);
            throw new ValidationError(`Invalid feedback structure: ${details.join('; ')}`, details);
        }
        throw error;
    }
}

export async function analyzeResponses(
    answers: InterviewAnswer[],
    deps: FeedbackServiceDeps,
    requestId = 'unknown'
): Promise<FeedbackReport> {
    const { completionClient } = deps;

    logAICall(completionClient.model, 'start', { requestId, promptName: 'analyze_responses', answers: answers.length });
    let content: string;
    try {
        content = await completionClient.complete({
            system: INTERVIEWER_SYSTEM_PROMPT,
            user: buildAnalysisPrompt(answers),
            temperature: COMPLETION_TEMPERATURE,
            maxTokens: COMPLETION_MAX_TOKENS,
        });
    } catch (error) {
        logAICall(completionClient.model, 'error', {
            requestId,
            promptName: 'analyze_responses',
            error: errorMessage(error),
        });
        throw error;
    }
    logAICall(completionClient.model, 'success', { requestId, promptName: 'analyze_responses' });

    return parseFeedback(content);
}
