import { z } from 'zod';
import { FeedbackReport, QuestionSet } from '../types/interview';

// Maximum length constraints, well above any real posting or transcript
export const MAX_TITLE_LENGTH = 1000;
export const MAX_DESCRIPTION_LENGTH = 100000;
export const MAX_QUESTION_LENGTH = 10000;
export const MAX_ANSWER_LENGTH = 50000;
export const MAX_ANSWERS = 100;

export const QUESTION_COUNT = 5;

// Prompt text is passed to the model verbatim, so only surrounding whitespace is removed
function promptText(field: string, maxLength: number) {
    return z.string()
        .max(maxLength, `${field} exceeds maximum length of ${maxLength.toLocaleString('en-US')} characters`)
        .trim()
        .refine((val) => val.length > 0, `${field} must contain actual content, not just whitespace`);
}

export const generateQuestionsRequestSchema = z.object({
    job_desc: z.object({
        title: promptText('Title', MAX_TITLE_LENGTH),
        description: promptText('Description', MAX_DESCRIPTION_LENGTH),
    }),
});

export const analyzeResponsesRequestSchema = z.object({
    answers: z.array(
        z.object({
            question: promptText('Question', MAX_QUESTION_LENGTH),
            answer: promptText('Answer', MAX_ANSWER_LENGTH),
        })
    )
        .min(1, 'At least one answer is required')
        .max(MAX_ANSWERS, `No more than ${MAX_ANSWERS} answers can be analyzed at once`),
});

const questionSetSchema = z.array(z.string().min(1)).length(QUESTION_COUNT);

// The model sometimes answers a list field with a single sentence
const stringList = z.union([
    z.string().transform((value) => [value]),
    z.array(z.string()),
]);

const score = z.number().int().min(0).max(10);

const feedbackReportSchema = z.object({
    technical_score: score,
    communication_score: score,
    overall_score: score,
    strengths: stringList,
    improvements: stringList,
    recommendations: stringList,
});

export function validateQuestionSet(payload: unknown): QuestionSet {
    return questionSetSchema.parse(payload);
}

export function validateFeedbackReport(payload: unknown): FeedbackReport {
    return feedbackReportSchema.parse(payload);
}

export function formatValidationErrors(error: z.ZodError): string[] {
    return error.issues.map((issue: z.ZodIssue) => `${issue.path.join('.')}: ${issue.message}`);
}
