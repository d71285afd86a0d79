/**
 * @file VoxPlan Factory
 *
 * Wiring for the resolution and execution pipeline. Every component is
 * constructed explicitly and injected; nothing is process-global.
 *
 * @module VoxPlanFactory
 */

import type { ResolvedSettings } from './config/settings.js';
import { SimulatedActuator } from './execution/SimulatedActuator.js';
import { StepSequencer } from './execution/StepSequencer.js';
import type { Actuator } from './execution/types.js';
import { Verbalizer } from './execution/Verbalizer.js';
import { generationClient_create } from './llm/clients/index.js';
import { GenerativeParser } from './llm/GenerativeParser.js';
import { PromptAssembler } from './llm/PromptAssembler.js';
import type { GenerationClient } from './llm/types.js';
import { PlanResolver } from './routing/PlanResolver.js';
import { PlanSplitter } from './routing/PlanSplitter.js';
import { RuleMatcher } from './routing/RuleMatcher.js';
import { ruleTable_load } from './routing/rules.js';
import { SafetyEscalator } from './routing/SafetyEscalator.js';
import type { TelemetryHooks } from './telemetry/types.js';

/**
 * Container for the pre-wired pipeline.
 */
export interface VoxPlanServiceBag {
    matcher: RuleMatcher;
    parser: GenerativeParser | null;
    resolver: PlanResolver;
    sequencer: StepSequencer;
    verbalizer: Verbalizer;
    actuator: Actuator;
}

export interface VoxPlanAssembleOptions {
    /** Skip the generation service even when credentials exist. */
    noLlm?: boolean;
    /** Injected client; built from settings when omitted. */
    client?: GenerationClient;
    actuator?: Actuator;
    hooks?: TelemetryHooks;
}

/**
 * Assemble the pipeline from resolved settings.
 *
 * @throws {Error} If the rule table cannot be loaded.
 */
export function voxplan_assemble(settings: ResolvedSettings, options: VoxPlanAssembleOptions = {}): VoxPlanServiceBag {
    const hooks: TelemetryHooks = options.hooks ?? {};
    const matcher: RuleMatcher = new RuleMatcher(ruleTable_load(settings.rulesPath));
    const verbalizer: Verbalizer = new Verbalizer();

    const parser: GenerativeParser | null = parser_create(settings, options, hooks);
    if (!parser) {
        hooks.log_emit?.('Generative parser disabled; rule matcher only');
    }

    const resolver: PlanResolver = new PlanResolver({
        parser,
        matcher,
        splitter: new PlanSplitter(),
        escalator: new SafetyEscalator(matcher, { confirmDangerous: settings.confirmDangerous })
    }, hooks);

    return {
        matcher,
        parser,
        resolver,
        sequencer: new StepSequencer({ actuatorTimeoutMs: settings.actuatorTimeoutMs }, verbalizer, hooks),
        verbalizer,
        actuator: options.actuator ?? new SimulatedActuator(hooks)
    };
}

function parser_create(
    settings: ResolvedSettings,
    options: VoxPlanAssembleOptions,
    hooks: TelemetryHooks
): GenerativeParser | null {
    if (options.noLlm) {
        return null;
    }

    let client: GenerationClient | undefined = options.client;
    if (!client && settings.apiKey) {
        client = generationClient_create({ provider: settings.provider, apiKey: settings.apiKey }, hooks);
    }
    if (!client) {
        return null;
    }

    return new GenerativeParser(
        client,
        new PromptAssembler(settings.promptsDir, hooks),
        {
            model: settings.model,
            temperature: settings.temperature,
            maxTokens: settings.maxTokens,
            maxRetries: settings.maxRetries,
            requestTimeoutMs: settings.requestTimeoutMs
        },
        hooks
    );
}
