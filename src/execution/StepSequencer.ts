/**
 * @file Step Sequencer
 *
 * Drives ordered, confirmation-gated, halt-on-first-failure execution of
 * an Intent or Plan against an actuator.
 *
 * A plan containing any step that requires confirmation or carries high
 * risk is confirmed once as a whole before anything runs. A lone step
 * that is already step-gated is not asked twice. Dry mode replaces every
 * actuator call with a description and asks nothing.
 *
 * Cancellation through the AbortSignal during a confirmation or an
 * actuator call aborts the current and every remaining step and yields
 * `cancelled`, which callers must not confuse with `halted`.
 *
 * @module execution/StepSequencer
 */

import { plan_create } from '../command/schemas.js';
import { command_isPlan, type ExecutionResult, type Intent, type Plan } from '../command/types.js';
import type { TelemetryHooks } from '../telemetry/types.js';
import { outcome_race, type RaceOutcome } from './race.js';
import {
    StepState,
    type Actuator,
    type ConfirmCallback,
    type SequenceOptions,
    type SequenceReport,
    type SequenceStatus,
    type StepRecord
} from './types.js';
import { Verbalizer } from './Verbalizer.js';

/**
 * Configuration for the StepSequencer.
 */
export interface StepSequencerConfig {
    actuatorTimeoutMs: number;
}

export const STEP_SEQUENCER_DEFAULTS: StepSequencerConfig = {
    actuatorTimeoutMs: 30_000
};

type StepOutcome =
    | { kind: 'done'; result: ExecutionResult }
    | { kind: 'failed'; result: ExecutionResult }
    | { kind: 'declined' }
    | { kind: 'cancelled' };

export class StepSequencer {
    private readonly config: StepSequencerConfig;

    constructor(
        config: Partial<StepSequencerConfig> = {},
        private readonly verbalizer: Verbalizer = new Verbalizer(),
        private readonly hooks: TelemetryHooks = {}
    ) {
        this.config = { ...STEP_SEQUENCER_DEFAULTS, ...config };
    }

    /**
     * Run a bare intent or a plan to completion, decline, failure or cancellation.
     */
    public async run(
        command: Intent | Plan,
        confirm: ConfirmCallback,
        actuator: Actuator,
        options: SequenceOptions = {}
    ): Promise<SequenceReport> {
        const plan: Plan = command_isPlan(command) ? command : plan_create([command]);
        const records: StepRecord[] = plan.steps.map((intent: Intent, index: number): StepRecord => ({
            index,
            intent,
            state: StepState.Pending
        }));
        const results: ExecutionResult[] = [];
        const signal: AbortSignal | undefined = options.signal;

        if (signal?.aborted) {
            return this.report_close(records, results, 'cancelled', 0, 'cancelled before start');
        }

        if (options.dryRun) {
            return this.dryRun_execute(records, results, signal);
        }

        if (this.planGate_required(plan)) {
            this.hooks.status_emit?.('AWAITING PLAN CONFIRMATION');
            const prompt: string = `${this.verbalizer.plan_describe(plan)}\n确认执行吗？`;
            const answer: RaceOutcome<boolean> = await outcome_race(
                (): Promise<boolean> => confirm(prompt, signal), undefined, signal);

            if (answer.kind !== 'value') {
                return this.report_close(records, results, 'cancelled', 0, 'cancelled during plan confirmation');
            }
            if (!answer.value) {
                return this.report_close(records, results, 'declined', 0, 'plan declined');
            }
        }

        for (const record of records) {
            const outcome: StepOutcome = await this.step_execute(record, confirm, actuator, signal);
            const stepNumber: number = record.index + 1;

            switch (outcome.kind) {
                case 'done':
                    results.push(outcome.result);
                    break;
                case 'failed':
                    results.push(outcome.result);
                    return this.report_close(records, results, 'halted', record.index + 1,
                        outcome.result.error || outcome.result.message, stepNumber);
                case 'declined':
                    return this.report_close(records, results, 'declined', record.index, `step ${stepNumber} declined`);
                case 'cancelled':
                    return this.report_close(records, results, 'cancelled', record.index, `cancelled at step ${stepNumber}`);
            }
        }

        return this.report_close(records, results, 'completed', records.length, '');
    }

    /**
     * Whether a plan-level confirmation precedes execution.
     *
     * A plan gate normally comes in addition to step-level gates. The one
     * deliberate exception: a plan of a single step that already asks for
     * confirmation skips the plan gate, so the operator answers the same
     * question once instead of twice. A lone high-risk step that does not
     * ask on its own still gets the plan gate.
     */
    public planGate_required(plan: Plan): boolean {
        const gated: boolean = plan.steps.some((step: Intent): boolean =>
            step.requiresConfirmation || step.safety.risk === 'high');
        if (!gated) {
            return false;
        }
        const lone: boolean = plan.steps.length === 1 && plan.steps[0].requiresConfirmation;
        return !lone;
    }

    // ─── Steps ───────────────────────────────────────────────────────────────

    private async step_execute(
        record: StepRecord,
        confirm: ConfirmCallback,
        actuator: Actuator,
        signal: AbortSignal | undefined
    ): Promise<StepOutcome> {
        if (signal?.aborted) {
            return { kind: 'cancelled' };
        }

        if (record.intent.requiresConfirmation) {
            this.state_set(record, StepState.Confirming);
            const answer: RaceOutcome<boolean> = await outcome_race(
                (): Promise<boolean> => confirm(this.verbalizer.confirmation_generate(record.intent), signal),
                undefined,
                signal
            );
            if (answer.kind !== 'value') {
                return { kind: 'cancelled' };
            }
            if (!answer.value) {
                return { kind: 'declined' };
            }
        }

        this.state_set(record, StepState.Executing);
        const result: ExecutionResult | null = await this.actuator_call(record.intent, actuator, signal);
        if (result === null) {
            return { kind: 'cancelled' };
        }

        record.result = result;
        if (!result.succeeded) {
            this.state_set(record, StepState.Aborted);
            return { kind: 'failed', result };
        }
        this.state_set(record, StepState.Done);
        return { kind: 'done', result };
    }

    /**
     * Bounded actuator call. Timeouts and exceptions become failed results;
     * null means the run was cancelled.
     */
    private async actuator_call(
        intent: Intent,
        actuator: Actuator,
        signal: AbortSignal | undefined
    ): Promise<ExecutionResult | null> {
        try {
            const outcome: RaceOutcome<ExecutionResult> = await outcome_race(
                (): Promise<ExecutionResult> => actuator.execute(intent, signal),
                this.config.actuatorTimeoutMs,
                signal
            );
            switch (outcome.kind) {
                case 'value':
                    return outcome.value;
                case 'timeout':
                    return {
                        succeeded: false,
                        message: 'Execution timed out',
                        output: '',
                        error: `actuator did not respond within ${this.config.actuatorTimeoutMs}ms`
                    };
                case 'aborted':
                    return null;
            }
        } catch (error: unknown) {
            const reason: string = error instanceof Error ? error.message : String(error);
            this.hooks.log_emit?.(`Actuator raised: ${reason}`);
            return { succeeded: false, message: 'Execution failed', output: '', error: reason };
        }
    }

    private dryRun_execute(
        records: StepRecord[],
        results: ExecutionResult[],
        signal: AbortSignal | undefined
    ): SequenceReport {
        for (const record of records) {
            if (signal?.aborted) {
                return { ...this.report_close(records, results, 'cancelled', record.index, 'cancelled during dry run'), dryRun: true };
            }
            const description: string = this.verbalizer.dryRun_describe(record.intent);
            const result: ExecutionResult = { succeeded: true, message: description, output: description, error: '' };
            record.result = result;
            results.push(result);
            this.state_set(record, StepState.Done);
        }
        return { ...this.report_close(records, results, 'completed', records.length, ''), dryRun: true };
    }

    // ─── Bookkeeping ─────────────────────────────────────────────────────────

    /**
     * Abort every record from `firstUnfinished` on and build the report.
     */
    private report_close(
        records: StepRecord[],
        results: ExecutionResult[],
        status: SequenceStatus,
        firstUnfinished: number,
        reason: string,
        failedStep?: number
    ): SequenceReport {
        for (const record of records.slice(firstUnfinished)) {
            this.state_set(record, StepState.Aborted);
        }
        this.hooks.status_emit?.(`SEQUENCE ${status.toUpperCase()}`);

        const report: SequenceReport = { status, results, steps: records, reason };
        if (failedStep !== undefined) {
            report.failedStep = failedStep;
        }
        return report;
    }

    private state_set(record: StepRecord, state: StepState): void {
        if (record.state === state) {
            return;
        }
        record.state = state;
        this.hooks.step_emit?.(record.index, state, record.intent.name);
    }
}
