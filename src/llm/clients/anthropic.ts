/**
 * @file Anthropic Client Wrapper
 *
 * Handles communication with the Anthropic Messages API.
 *
 * @module llm/clients/anthropic
 */

import { z } from 'zod';
import { GenerationError } from '../types.js';
import type { GenerationClient, GenerationClientConfig, GenerationRequest } from '../types.js';
import type { TelemetryHooks } from '../../telemetry/types.js';
import { json_post } from './http.js';

const ANTHROPIC_VERSION: string = '2023-06-01';

const AnthropicErrorSchema = z.object({
    error: z.object({ message: z.string() }).optional()
});

const AnthropicMessageSchema = z.object({
    content: z.array(z.object({
        type: z.string(),
        text: z.string().optional()
    }))
});

/**
 * Client for the Anthropic Messages API.
 */
export class AnthropicClient implements GenerationClient {
    public readonly provider = 'anthropic' as const;
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(config: GenerationClientConfig, private readonly hooks: TelemetryHooks = {}) {
        this.apiKey = config.apiKey;
        this.baseUrl = config.baseUrl ?? 'https://api.anthropic.com';
    }

    /**
     * Send one message and return the concatenated text blocks.
     */
    async generate(request: GenerationRequest): Promise<string> {
        try {
            const data: unknown = await json_post(
                `${this.baseUrl}/v1/messages`,
                {
                    'x-api-key': this.apiKey,
                    'anthropic-version': ANTHROPIC_VERSION
                },
                {
                    model: request.model,
                    max_tokens: request.maxTokens,
                    temperature: request.temperature,
                    system: request.system,
                    messages: [{ role: 'user', content: request.user }]
                },
                request.timeoutMs,
                (payload: unknown): string | undefined => {
                    const parsed = AnthropicErrorSchema.safeParse(payload);
                    return parsed.success ? parsed.data.error?.message : undefined;
                }
            );

            const parsed = AnthropicMessageSchema.safeParse(data);
            if (!parsed.success) {
                throw new GenerationError('service_error', 'unexpected Anthropic response shape');
            }
            return parsed.data.content
                .filter((block): boolean => block.type === 'text')
                .map((block): string => block.text ?? '')
                .join('');
        } catch (error: unknown) {
            const reason: string = error instanceof Error ? error.message : String(error);
            this.hooks.log_emit?.(`Anthropic API error: ${reason}`);
            throw error;
        }
    }
}
