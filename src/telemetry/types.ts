/**
 * @file Telemetry Contracts
 *
 * Event shapes carried by the TelemetryBus and the optional hook bundle
 * that components accept in their constructors.
 *
 * @module telemetry/types
 */

import type { StepState } from '../execution/types.js';

export interface LogEvent {
    type: 'log';
    message: string;
}

export interface StatusEvent {
    type: 'status';
    message: string;
}

export interface StepEvent {
    type: 'step';
    index: number;
    state: StepState;
    intent: string;
}

export type TelemetryEvent = LogEvent | StatusEvent | StepEvent;

/**
 * Optional hooks. Components call them as `hooks.log_emit?.(...)`, so an
 * empty object silences a component entirely.
 */
export interface TelemetryHooks {
    status_emit?: (message: string) => void;
    log_emit?: (message: string) => void;
    step_emit?: (index: number, state: StepState, intent: string) => void;
}
