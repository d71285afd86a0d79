/**
 * @file Telemetry Bus
 *
 * Central event bus for log, status and step-transition events emitted by
 * the resolver, parser and sequencer. The CLI subscribes to render them.
 *
 * Typed facade over Node.js EventEmitter.
 *
 * @module telemetry/TelemetryBus
 */

import { EventEmitter } from 'events';
import type { StepState } from '../execution/types.js';
import type { TelemetryEvent, TelemetryHooks } from './types.js';

export type TelemetryObserver = (event: TelemetryEvent) => void;

/** Internal event channel. */
const CHANNEL = 'telemetry' as const;

export class TelemetryBus {
    private readonly emitter: EventEmitter;

    constructor() {
        this.emitter = new EventEmitter();
        this.emitter.setMaxListeners(0);
    }

    /**
     * Subscribe to telemetry events.
     *
     * @returns Unsubscribe function.
     */
    subscribe(observer: TelemetryObserver): () => void {
        this.emitter.on(CHANNEL, observer);
        return () => this.emitter.off(CHANNEL, observer);
    }

    emit(event: TelemetryEvent): void {
        this.emitter.emit(CHANNEL, event);
    }

    /**
     * Hook bundle that forwards every call onto this bus.
     */
    hooks_create(): TelemetryHooks {
        return {
            log_emit: (message: string): void => this.emit({ type: 'log', message }),
            status_emit: (message: string): void => this.emit({ type: 'status', message }),
            step_emit: (index: number, state: StepState, intent: string): void =>
                this.emit({ type: 'step', index, state, intent })
        };
    }
}
