import { InterviewAnswer, JobDescription } from '../types/interview';

export const INTERVIEWER_SYSTEM_PROMPT = `You are an experienced technical interviewer conducting interviews for various tech positions.
Your goal is to assess candidates' technical knowledge, problem-solving abilities, and communication skills.
Ask relevant technical questions based on the job title and description provided. Focus on both technical depth and soft skills.
Provide constructive feedback that helps candidates improve.`;

export const COMPLETION_TEMPERATURE = 0.7;
export const COMPLETION_MAX_TOKENS = 1000;

export function buildQuestionPrompt(jobDesc: JobDescription): string {
    return `Generate exactly 5 relevant interview questions for:
Job Title: ${jobDesc.title}
Job Description: ${jobDesc.description}

Focus on both technical skills and soft skills. Make the questions specific to the role.

Format each question on a new line, numbered from 1-5.`;
}

export function renderTranscript(answers: InterviewAnswer[]): string {
    return answers
        .map(({ question, answer }) => `Q: ${question}\nA: ${answer}\n`)
        .join('\n');
}

export function buildAnalysisPrompt(answers: InterviewAnswer[]): string {
    return `Analyze these interview responses:

${renderTranscript(answers)}

Provide comprehensive feedback including:
1. Technical Depth (Score out of 10)
2. Communication Clarity (Score out of 10)
3. Overall Performance (Score out of 10)
4. Strengths
5. Areas for Improvement
6. Specific Recommendations

Format the response as JSON with these keys:
technical_score, communication_score, overall_score, strengths, improvements, recommendations

Scores must be whole numbers from 0 to 10. Return ONLY valid JSON. No conversational text.`;
}
