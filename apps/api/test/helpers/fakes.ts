import { CompletionClient, CompletionRequest } from '../../src/services/completionClient';
import { CacheStore } from '../../src/services/questionCache';

export const FIVE_QUESTIONS = [
    'Here are five questions for the role:',
    '',
    '1. How would you design a rate limiter for a public API?',
    '2. Describe a time you resolved a production incident under pressure.',
    '3. How do you keep data consistent across services in a distributed system?',
    '4. How do you explain a technical trade-off to a non-technical stakeholder?',
    '5. What is your approach to versioning a public API?',
    '',
    'Good luck!',
].join('\n');

export const FEEDBACK_JSON = JSON.stringify({
    technical_score: 7,
    communication_score: 8,
    overall_score: 7,
    strengths: ['Clear structure', 'Concrete examples'],
    improvements: ['Go deeper on failure modes'],
    recommendations: ['Practice system design questions'],
});

export interface FakeCompletionClient extends CompletionClient {
    complete: jest.Mock<Promise<string>, [CompletionRequest]>;
}

export function createCompletionClient(...responses: string[]): FakeCompletionClient {
    const complete = jest.fn<Promise<string>, [CompletionRequest]>();
    for (const response of responses) {
        complete.mockResolvedValueOnce(response);
    }
    return { model: 'test-model', complete };
}

/** In-memory CacheStore with an injectable clock so tests can step past a TTL. */
export class MemoryCacheStore implements CacheStore {
    readonly entries = new Map<string, { value: string; expiresAt: number }>();

    constructor(private readonly now: () => number = Date.now) {}

    async get(key: string): Promise<string | null> {
        const entry = this.entries.get(key);
        if (!entry) {
            return null;
        }
        if (this.now() >= entry.expiresAt) {
            this.entries.delete(key);
            return null;
        }
        return entry.value;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
    }
}
