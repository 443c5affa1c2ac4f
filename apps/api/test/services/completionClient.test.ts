import { OpenAICompletionClient, pingCompletionService } from '../../src/services/completionClient';
import { AIServiceError, TimeoutError } from '../../src/utils/errors';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

function createClient(timeoutMs = 1000) {
    return new OpenAICompletionClient({
        apiKey: 'test-secret',
        model: 'gpt-4o-mini-2024-07-18',
        baseUrl: 'https://llm.example.test/v1',
        timeoutMs,
    });
}

describe('OpenAICompletionClient', () => {
    let fetchMock: jest.SpyInstance;

    beforeEach(() => {
        fetchMock = jest.spyOn(global, 'fetch');
    });

    afterEach(() => {
        fetchMock.mockRestore();
    });

    it('posts system and user messages with temperature and token cap', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: '  1. Question?\n' } }] }));

        const content = await createClient().complete({
            system: 'You are an interviewer.',
            user: 'Ask something.',
            temperature: 0.7,
            maxTokens: 1000,
        });

        expect(content).toBe('1. Question?');
        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('https://llm.example.test/v1/chat/completions');
        expect(init.method).toBe('POST');
        expect(init.headers).toEqual({
            'Authorization': 'Bearer test-secret',
            'Content-Type': 'application/json',
        });
        expect(JSON.parse(init.body)).toEqual({
            model: 'gpt-4o-mini-2024-07-18',
            messages: [
                { role: 'system', content: 'You are an interviewer.' },
                { role: 'user', content: 'Ask something.' },
            ],
            temperature: 0.7,
            max_tokens: 1000,
        });
    });

    it('raises AIServiceError with the upstream status on a non-2xx reply', async () => {
        fetchMock.mockResolvedValue(new Response('invalid api key', { status: 401, statusText: 'Unauthorized' }));

        await expect(createClient().complete({ user: 'hi', maxTokens: 5 })).rejects.toMatchObject({
            name: 'AIServiceError',
            code: 'AI_SERVICE_ERROR',
            statusCode: 401,
            details: 'invalid api key',
            message: 'AI service returned 401: Unauthorized',
        });
    });

    it('raises AIServiceError on empty content', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: '   ' } }] }));

        await expect(createClient().complete({ user: 'hi', maxTokens: 5 })).rejects.toMatchObject({
            code: 'EMPTY_RESPONSE',
        });
    });

    it('raises AIServiceError on an unexpected payload', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ error: 'nope' }));

        await expect(createClient().complete({ user: 'hi', maxTokens: 5 })).rejects.toMatchObject({
            code: 'INVALID_RESPONSE',
        });
    });

    it('wraps network failures', async () => {
        fetchMock.mockRejectedValue(new TypeError('fetch failed'));

        const result = createClient().complete({ user: 'hi', maxTokens: 5 });

        await expect(result).rejects.toBeInstanceOf(AIServiceError);
        await expect(result).rejects.toThrow('AI service request failed: fetch failed');
    });

    it('aborts and raises TimeoutError when the request outlives the timeout', async () => {
        fetchMock.mockImplementation(
            (_url: string, init: RequestInit) =>
                new Promise((_resolve, reject) => {
                    init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
                })
        );

        const result = createClient(20).complete({ user: 'hi', maxTokens: 5 });

        await expect(result).rejects.toBeInstanceOf(TimeoutError);
        await expect(result).rejects.toThrow('Request timed out after 20ms');
    });

    it('keeps the timeout armed while the response body is read', async () => {
        fetchMock.mockImplementation(async (_url: string, init: RequestInit) => ({
            ok: true,
            status: 200,
            json: () =>
                new Promise((_resolve, reject) => {
                    init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
                }),
        }));

        const result = createClient(20).complete({ user: 'hi', maxTokens: 5 });

        await expect(result).rejects.toBeInstanceOf(TimeoutError);
        await expect(result).rejects.toThrow('Request timed out after 20ms');
    });

    it('pings with a short user-only prompt', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: 'Hello!' } }] }));

        await pingCompletionService(createClient());

        const body = JSON.parse(fetchMock.mock.calls[0][1].body);
        expect(body.messages).toEqual([{ role: 'user', content: 'Hello' }]);
        expect(body.max_tokens).toBe(5);
    });
});
