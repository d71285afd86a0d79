/**
 * @file Generative Parser
 *
 * Probabilistic translation of an utterance into a validated Intent or
 * Plan through the injected generation client.
 *
 * Every attempt is rebuilt from scratch: assemble the prompt, call the
 * service, extract the JSON payload, decode it. A payload that fails to
 * parse or decode switches later attempts to the corrective prompt;
 * timeouts and service errors retry with the original prompt. Failures
 * are returned as values. Nothing here throws and nothing here falls back
 * to the rule matcher.
 *
 * @module llm/GenerativeParser
 */

import { command_decode } from '../command/schemas.js';
import type { DecodeResult, Intent, Plan } from '../command/types.js';
import type { TelemetryHooks } from '../telemetry/types.js';
import { payload_parseFromModelText, type PayloadParseResult } from './payload.js';
import type { AssembledPrompt, PromptAssembler } from './PromptAssembler.js';
import { GenerationError, type GenerationClient } from './types.js';

export type GenerationFailureKind = 'timeout' | 'service_error' | 'parse_error' | 'validation_error';

export interface GenerationFailure {
    kind: GenerationFailureKind;
    message: string;
}

export type GenerationResult =
    | { ok: true; command: Intent | Plan; attempts: number }
    | { ok: false; failure: GenerationFailure; attempts: number };

/**
 * Configuration for the GenerativeParser.
 */
export interface GenerativeParserConfig {
    model: string;
    temperature: number;
    maxTokens: number;
    /** Total attempts, including the first. */
    maxRetries: number;
    requestTimeoutMs: number;
}

type AttemptOutcome =
    | { ok: true; command: Intent | Plan }
    | { ok: false; failure: GenerationFailure };

export class GenerativeParser {
    constructor(
        private readonly client: GenerationClient,
        private readonly prompts: PromptAssembler,
        private readonly config: GenerativeParserConfig,
        private readonly hooks: TelemetryHooks = {}
    ) {}

    /**
     * Resolve an utterance within the configured attempt budget.
     */
    public async resolve(text: string): Promise<GenerationResult> {
        const attemptLimit: number = Math.max(1, Math.floor(this.config.maxRetries));
        let corrective: boolean = false;
        let lastFailure: GenerationFailure = { kind: 'service_error', message: 'no attempt made' };

        for (let attempt: number = 1; attempt <= attemptLimit; attempt++) {
            this.hooks.status_emit?.(`GENERATIVE PARSE: ATTEMPT ${attempt}/${attemptLimit}`);
            const prompt: AssembledPrompt = corrective
                ? this.prompts.prompt_correct(text)
                : this.prompts.prompt_assemble(text);

            const outcome: AttemptOutcome = await this.attempt_run(prompt);
            if (outcome.ok) {
                this.hooks.log_emit?.(`Generative parse succeeded on attempt ${attempt}`);
                return { ok: true, command: outcome.command, attempts: attempt };
            }

            lastFailure = outcome.failure;
            this.hooks.log_emit?.(`Attempt ${attempt} failed (${lastFailure.kind}): ${lastFailure.message}`);
            if (lastFailure.kind === 'parse_error' || lastFailure.kind === 'validation_error') {
                corrective = true;
            }
        }

        return { ok: false, failure: lastFailure, attempts: attemptLimit };
    }

    private async attempt_run(prompt: AssembledPrompt): Promise<AttemptOutcome> {
        let responseText: string;
        try {
            responseText = await this.client.generate({
                model: this.config.model,
                temperature: this.config.temperature,
                maxTokens: this.config.maxTokens,
                system: prompt.system,
                user: prompt.user,
                timeoutMs: this.config.requestTimeoutMs
            });
        } catch (error: unknown) {
            return { ok: false, failure: this.failure_fromError(error) };
        }

        const payload: PayloadParseResult = payload_parseFromModelText(responseText);
        if (!payload.ok) {
            return { ok: false, failure: { kind: 'parse_error', message: payload.error } };
        }

        const decoded: DecodeResult<Intent | Plan> = command_decode(payload.value);
        if (!decoded.ok) {
            return { ok: false, failure: { kind: 'validation_error', message: decoded.error } };
        }
        return { ok: true, command: decoded.value };
    }

    private failure_fromError(error: unknown): GenerationFailure {
        if (error instanceof GenerationError) {
            return { kind: error.kind, message: error.message };
        }
        return {
            kind: 'service_error',
            message: error instanceof Error ? error.message : String(error)
        };
    }
}
