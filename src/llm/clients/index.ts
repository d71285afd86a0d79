/**
 * @file Generation client factory.
 *
 * @module llm/clients
 */

import type { TelemetryHooks } from '../../telemetry/types.js';
import type { GenerationClient, GenerationClientConfig } from '../types.js';
import { AnthropicClient } from './anthropic.js';
import { OpenAIClient } from './openai.js';

export { AnthropicClient } from './anthropic.js';
export { OpenAIClient } from './openai.js';

/**
 * Failures are reported through `hooks.log_emit`, never written to the terminal.
 */
export function generationClient_create(config: GenerationClientConfig, hooks: TelemetryHooks = {}): GenerationClient {
    return config.provider === 'openai'
        ? new OpenAIClient(config, hooks)
        : new AnthropicClient(config, hooks);
}
