/**
 * @file Command Types
 *
 * Data contracts shared by the matcher, the generative parser, the
 * resolver and the sequencer. Slots are a tagged variant keyed by the
 * intent name; the open slot map only exists at the wire boundary.
 *
 * @module command/types
 */

export const INTENT_NAMES = [
    'system_setting',
    'play_music',
    'web_search',
    'write_note',
    'control_app',
    'clarify'
] as const;

export type IntentName = typeof INTENT_NAMES[number];

export const RISK_LEVELS = ['low', 'medium', 'high'] as const;

export type RiskLevel = typeof RISK_LEVELS[number];

export interface SafetyAssessment {
    risk: RiskLevel;
    reason: string;
}

// ─── Slot variants ─────────────────────────────────────────────────────────

export interface SystemSettingSlots {
    setting?: string;
    value?: number;
}

export interface PlayMusicSlots {
    action?: string;
    query?: string;
}

export interface WebSearchSlots {
    query: string;
}

export interface WriteNoteSlots {
    title?: string;
    body?: string;
}

export interface ControlAppSlots {
    app?: string;
    action?: string;
    url?: string;
}

export type ClarifySlots = Record<string, never>;

export interface SlotsByIntent {
    system_setting: SystemSettingSlots;
    play_music: PlayMusicSlots;
    web_search: WebSearchSlots;
    write_note: WriteNoteSlots;
    control_app: ControlAppSlots;
    clarify: ClarifySlots;
}

// ─── Intent / Plan ─────────────────────────────────────────────────────────

export interface IntentOf<K extends IntentName> {
    readonly name: K;
    readonly slots: Readonly<SlotsByIntent[K]>;
    readonly requiresConfirmation: boolean;
    readonly spokenAcknowledgement: string;
    readonly safety: Readonly<SafetyAssessment>;
}

/**
 * A single structured command. Narrow on `name` to get the slot shape.
 */
export type Intent = { [K in IntentName]: IntentOf<K> }[IntentName];

/**
 * Ordered multi-step task. Step order is execution order.
 */
export interface Plan {
    readonly steps: ReadonlyArray<Intent>;
    readonly summary: string;
}

/**
 * Outcome of one actuator call. Never mutated after creation.
 */
export interface ExecutionResult {
    readonly succeeded: boolean;
    readonly message: string;
    readonly output: string;
    readonly error: string;
}

// ─── Wire payloads ─────────────────────────────────────────────────────────

export type SlotScalar = string | number | boolean | null;

/**
 * Intent as emitted by the generative service and stored in few-shot files.
 */
export interface IntentPayload {
    intent: IntentName;
    slots: Record<string, SlotScalar>;
    confirm: boolean;
    speak_back: string;
    safety: SafetyAssessment;
}

export interface PlanPayload {
    steps: IntentPayload[];
    summary: string;
}

export interface DecodeSuccess<T> {
    ok: true;
    value: T;
}

export interface DecodeFailure {
    ok: false;
    error: string;
}

export type DecodeResult<T> = DecodeSuccess<T> | DecodeFailure;

/**
 * Type guard separating a Plan from an Intent.
 */
export function command_isPlan(command: Intent | Plan): command is Plan {
    return 'steps' in command;
}
