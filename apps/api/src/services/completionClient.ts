/**
 * Completion Client - Sends role-tagged prompts to an OpenAI-compatible
 * chat-completions endpoint and returns the generated text
 */

import { z } from 'zod';
import { AIServiceError, TimeoutError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export interface CompletionRequest {
    system?: string;
    user: string;
    temperature?: number;
    maxTokens: number;
}

export interface CompletionClient {
    readonly model: string;
    complete(request: CompletionRequest): Promise<string>;
}

export interface CompletionClientOptions {
    apiKey: string;
    model: string;
    baseUrl: string;
    timeoutMs: number;
}

interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

const chatCompletionSchema = z.object({
    choices: z.array(
        z.object({
            message: z.object({
                content: z.string().nullish(),
            }),
        })
    ),
});

export class OpenAICompletionClient implements CompletionClient {
    readonly model: string;

    constructor(private readonly options: CompletionClientOptions) {
        this.model = options.model;
    }

    async complete(request: CompletionRequest): Promise<string> {
        const messages: ChatMessage[] = [];
        if (request.system) {
            messages.push({ role: 'system', content: request.system });
        }
        messages.push({ role: 'user', content: request.user });

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

        // The timer stays armed until the body has been read
        try {
            return await this.send(messages, request, controller.signal);
        } catch (error) {
            if (controller.signal.aborted) {
                throw new TimeoutError(
                    `Request timed out after ${this.options.timeoutMs}ms`,
                    this.options.timeoutMs
                );
            }
            if (error instanceof AIServiceError) {
                throw error;
            }
            throw new AIServiceError(`AI service request failed: ${errorMessage(error)}`, 'NETWORK_ERROR');
        } finally {
            clearTimeout(timer);
        }
    }

    private async send(messages: ChatMessage[], request: CompletionRequest, signal: AbortSignal): Promise<string> {
        const response = await fetch(`${this.options.baseUrl}/chat/completions`, {
            method: 'POST',
            headers: {
                'Authorization': `Bearer ${this.options.apiKey}`,
                'Content-Type': 'application/json',
            },
            body: JSON.stringify({
                model: this.model,
                messages,
                temperature: request.temperature,
                max_tokens: request.maxTokens,
            }),
            signal,
        });

        if (!response.ok) {
            const errorText = await response.text().catch(() => 'Unable to read error response');
            logger.error('[AI Service] Upstream error', {
                model: this.model,
                status: response.status,
                error: errorText,
            });
            throw new AIServiceError(
                `AI service returned ${response.status}: ${response.statusText}`,
                'AI_SERVICE_ERROR',
                response.status,
                errorText
            );
        }

        const body: unknown = await response.json().catch((error: unknown) => {
            if (signal.aborted) {
                throw error;
            }
            return null;
        });
        const parsed = chatCompletionSchema.safeParse(body);
        if (!parsed.success) {
            throw new AIServiceError('AI service returned an unexpected payload', 'INVALID_RESPONSE');
        }

        const content = parsed.data.choices[0]?.message.content?.trim();
        if (!content) {
            throw new AIServiceError('AI service returned empty response', 'EMPTY_RESPONSE');
        }
        return content;
    }
}

/** Minimal request used at startup to confirm the credential and model work. */
export async function pingCompletionService(client: CompletionClient): Promise<void> {
    await client.complete({ user: 'Hello', maxTokens: 5 });
}
