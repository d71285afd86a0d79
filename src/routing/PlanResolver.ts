/**
 * @file Plan Resolver
 *
 * Top-level entry point: utterance in, Intent or Plan out.
 *
 * Resolution order:
 *   1. Generative parser (when configured); its output is safety-escalated.
 *   2. Dangerous text short-circuits to the rule matcher's guarded clarify.
 *   3. Multi-step heuristics: split, rule-match fragments, keep non-clarify.
 *   4. Single rule match on the whole utterance.
 *
 * `resolve` never rejects. Every failure of the generative path ends in
 * the deterministic path.
 *
 * @module routing/PlanResolver
 */

import { plan_create } from '../command/schemas.js';
import { command_isPlan, type Intent, type Plan } from '../command/types.js';
import type { GenerationResult, GenerativeParser } from '../llm/GenerativeParser.js';
import type { TelemetryHooks } from '../telemetry/types.js';
import type { PlanSplitter } from './PlanSplitter.js';
import type { RuleMatcher } from './RuleMatcher.js';
import type { SafetyEscalator } from './SafetyEscalator.js';

export type ResolutionOrigin = 'model' | 'rules' | 'splitter';

export type ResolvedCommand =
    | { kind: 'intent'; intent: Intent; origin: ResolutionOrigin }
    | { kind: 'plan'; plan: Plan; origin: ResolutionOrigin };

/**
 * Collaborators of the resolver. `parser` is null when no generation
 * service is configured.
 */
export interface PlanResolverDeps {
    parser: GenerativeParser | null;
    matcher: RuleMatcher;
    splitter: PlanSplitter;
    escalator: SafetyEscalator;
}

export class PlanResolver {
    constructor(
        private readonly deps: PlanResolverDeps,
        private readonly hooks: TelemetryHooks = {}
    ) {}

    public async resolve(text: string): Promise<ResolvedCommand> {
        const utterance: string = text.trim();

        if (this.deps.parser) {
            const generated: ResolvedCommand | null = await this.generative_resolve(this.deps.parser, utterance);
            if (generated) {
                return generated;
            }
        }

        return this.fallback_resolve(utterance);
    }

    /**
     * Deterministic path only. Used directly when no parser is configured.
     */
    public fallback_resolve(text: string): ResolvedCommand {
        if (this.deps.matcher.dangerous_detect(text)) {
            this.hooks.log_emit?.('Fallback: dangerous text, single rule match');
            return { kind: 'intent', intent: this.deps.matcher.match(text), origin: 'rules' };
        }

        if (this.deps.splitter.multiStep_detect(text)) {
            const steps: Intent[] = this.deps.splitter
                .fragments_split(text)
                .map((fragment: string): Intent => this.deps.matcher.match(fragment))
                .filter((intent: Intent): boolean => intent.name !== 'clarify');

            if (steps.length >= 2) {
                this.hooks.log_emit?.(`Fallback: split into ${steps.length} steps`);
                return { kind: 'plan', plan: plan_create(steps), origin: 'splitter' };
            }
        }

        return { kind: 'intent', intent: this.deps.matcher.match(text), origin: 'rules' };
    }

    private async generative_resolve(parser: GenerativeParser, text: string): Promise<ResolvedCommand | null> {
        let result: GenerationResult;
        try {
            result = await parser.resolve(text);
        } catch (error: unknown) {
            const reason: string = error instanceof Error ? error.message : String(error);
            this.hooks.log_emit?.(`Generative parser raised unexpectedly: ${reason}`);
            return null;
        }

        if (!result.ok) {
            this.hooks.status_emit?.(`GENERATIVE PARSE FAILED (${result.failure.kind}); USING RULES`);
            return null;
        }

        if (command_isPlan(result.command)) {
            return { kind: 'plan', plan: this.deps.escalator.plan_escalate(result.command, text), origin: 'model' };
        }
        return { kind: 'intent', intent: this.deps.escalator.intent_escalate(result.command, text), origin: 'model' };
    }
}
