export interface JobDescription {
    title: string;
    description: string;
}

export interface GenerateQuestionsRequest {
    job_desc: JobDescription;
}

export interface InterviewAnswer {
    question: string;
    answer: string;
}

export interface AnalyzeResponsesRequest {
    answers: InterviewAnswer[];
}

/** Exactly five entries, each prefixed "1. " through "5. ". */
export type QuestionSet = string[];

export interface FeedbackReport {
    technical_score: number;
    communication_score: number;
    overall_score: number;
    strengths: string[];
    improvements: string[];
    recommendations: string[];
}

export interface GenerateQuestionsResponse {
    questions: QuestionSet;
}

export interface AnalyzeResponsesResponse {
    /** JSON-encoded FeedbackReport */
    feedback: string;
}

export interface ErrorResponse {
    detail: string | string[];
}
