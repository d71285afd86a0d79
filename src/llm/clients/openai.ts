/**
 * @file OpenAI Client Wrapper
 *
 * Handles communication with the OpenAI Chat Completions API.
 *
 * @module llm/clients/openai
 */

import { z } from 'zod';
import { GenerationError } from '../types.js';
import type { GenerationClient, GenerationClientConfig, GenerationRequest } from '../types.js';
import type { TelemetryHooks } from '../../telemetry/types.js';
import { json_post } from './http.js';

const OpenAIErrorSchema = z.object({
    error: z.object({ message: z.string() }).optional()
});

const OpenAIChatResponseSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable() })
    }))
});

/**
 * Client for the OpenAI Chat Completions API.
 */
export class OpenAIClient implements GenerationClient {
    public readonly provider = 'openai' as const;
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(config: GenerationClientConfig, private readonly hooks: TelemetryHooks = {}) {
        this.apiKey = config.apiKey;
        this.baseUrl = config.baseUrl ?? 'https://api.openai.com';
    }

    /**
     * Send a system + user exchange and return the first choice's content.
     */
    async generate(request: GenerationRequest): Promise<string> {
        try {
            const data: unknown = await json_post(
                `${this.baseUrl}/v1/chat/completions`,
                { 'Authorization': `Bearer ${this.apiKey}` },
                {
                    model: request.model,
                    temperature: request.temperature,
                    max_tokens: request.maxTokens,
                    messages: [
                        { role: 'system', content: request.system },
                        { role: 'user', content: request.user }
                    ]
                },
                request.timeoutMs,
                (payload: unknown): string | undefined => {
                    const parsed = OpenAIErrorSchema.safeParse(payload);
                    return parsed.success ? parsed.data.error?.message : undefined;
                }
            );

            const parsed = OpenAIChatResponseSchema.safeParse(data);
            if (!parsed.success) {
                throw new GenerationError('service_error', 'unexpected OpenAI response shape');
            }
            return parsed.data.choices[0]?.message.content ?? '';
        } catch (error: unknown) {
            const reason: string = error instanceof Error ? error.message : String(error);
            this.hooks.log_emit?.(`OpenAI API error: ${reason}`);
            throw error;
        }
    }
}
