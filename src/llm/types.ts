/**
 * @file Generation Types
 *
 * Contracts between the generative parser and the text-generation service.
 *
 * @module llm/types
 */

export type GenerationProvider = 'anthropic' | 'openai';

/**
 * Configuration for a text-generation client.
 */
export interface GenerationClientConfig {
    provider: GenerationProvider;
    apiKey: string;
    /** Override of the provider's API origin (proxies, gateways). */
    baseUrl?: string;
}

/**
 * One blocking round trip to the generation service.
 */
export interface GenerationRequest {
    model: string;
    temperature: number;
    maxTokens: number;
    system: string;
    user: string;
    timeoutMs: number;
}

/**
 * Minimal text-generation client. Injected into the generative parser.
 */
export interface GenerationClient {
    readonly provider: GenerationProvider;
    generate(request: GenerationRequest): Promise<string>;
}

export type GenerationErrorKind = 'timeout' | 'service_error';

/**
 * Raised by clients for transport and service failures.
 */
export class GenerationError extends Error {
    constructor(
        public readonly kind: GenerationErrorKind,
        message: string
    ) {
        super(message);
        this.name = 'GenerationError';
    }
}
