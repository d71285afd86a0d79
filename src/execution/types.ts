/**
 * @file Execution Contracts
 *
 * Actuator and confirmation interfaces plus the per-step state machine
 * vocabulary used by the StepSequencer.
 *
 * @module execution/types
 */

import type { ExecutionResult, Intent } from '../command/types.js';

/**
 * Per-step lifecycle.
 *
 *   pending → confirming → executing → done
 *      └──────────┴────────────┴─────→ aborted
 */
export enum StepState {
    Pending = 'pending',
    Confirming = 'confirming',
    Executing = 'executing',
    Done = 'done',
    Aborted = 'aborted'
}

export type SequenceStatus = 'completed' | 'halted' | 'declined' | 'cancelled';

/**
 * Performs the side effect an intent describes. Failures are reported in
 * the result; a thrown error is converted by the sequencer.
 */
export interface Actuator {
    execute(intent: Intent, signal?: AbortSignal): Promise<ExecutionResult>;
}

/**
 * Asks the operator a yes/no question. Not timed out by the sequencer.
 */
export type ConfirmCallback = (prompt: string, signal?: AbortSignal) => Promise<boolean>;

export interface StepRecord {
    index: number;
    intent: Intent;
    state: StepState;
    result?: ExecutionResult;
}

export interface SequenceReport {
    status: SequenceStatus;
    /** One entry per step that reached the actuator (or the dry description). */
    results: ExecutionResult[];
    steps: StepRecord[];
    /** 1-indexed step that failed, for `halted`. */
    failedStep?: number;
    reason: string;
    /** Set when nothing reached the actuator because the run was a preview. */
    dryRun?: boolean;
}

export interface SequenceOptions {
    dryRun?: boolean;
    signal?: AbortSignal;
}
