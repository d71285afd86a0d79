/**
 * @file Safety Escalator
 *
 * Cross-checks intents produced by the generative parser against the
 * deterministic dangerous-operation detector. A model that reports `low`
 * risk for text the detector recognizes as dangerous gets overruled.
 *
 * Escalation only ever raises risk. `medium` and `high` pass through.
 *
 * @module routing/SafetyEscalator
 */

import type { Intent, Plan } from '../command/types.js';

export const REASON_ESCALATED: string = 'dangerous keyword detected';

/**
 * Configuration for the SafetyEscalator.
 */
export interface SafetyEscalatorConfig {
    /** Force a confirmation gate on escalated intents. */
    confirmDangerous: boolean;
}

/**
 * Detector shared with the rule matcher.
 */
export interface DangerDetector {
    dangerous_detect(text: string): boolean;
}

export class SafetyEscalator {
    constructor(
        private readonly detector: DangerDetector,
        private readonly config: SafetyEscalatorConfig
    ) {}

    /**
     * Return the intent with risk raised when the source text is dangerous.
     *
     * @param intent - Intent produced for `sourceText`.
     * @param sourceText - The utterance the intent was derived from.
     * @returns The same intent, or a new escalated copy.
     */
    public intent_escalate(intent: Intent, sourceText: string): Intent {
        if (intent.safety.risk !== 'low' || !this.detector.dangerous_detect(sourceText)) {
            return intent;
        }

        return {
            ...intent,
            requiresConfirmation: this.config.confirmDangerous ? true : intent.requiresConfirmation,
            safety: { risk: 'high', reason: REASON_ESCALATED }
        };
    }

    /**
     * Escalate every step of a plan against the whole utterance.
     */
    public plan_escalate(plan: Plan, sourceText: string): Plan {
        return {
            ...plan,
            steps: plan.steps.map((step: Intent): Intent => this.intent_escalate(step, sourceText))
        };
    }
}
