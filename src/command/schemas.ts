/**
 * @file Command Schemas
 *
 * Zod runtime schemas for the wire form of intents and plans, plus the
 * decoders that turn a validated open slot map into the tagged slot variant.
 *
 * Everything the generative service emits passes through `command_decode`
 * before any other component sees it. A wrong intent name, an unknown risk
 * level or a non-scalar value in a slot the intent declares is a decode
 * failure, never a silent pass. Undeclared slots are dropped unread.
 *
 * Usage:
 *   const result = command_decode(JSON.parse(raw));
 *   if (!result.ok) { ... retry or fall back ... }
 *   const command = result.value;  // Intent | Plan
 *
 * @module command/schemas
 */

import { z } from 'zod';
import {
    INTENT_NAMES,
    RISK_LEVELS,
    type ClarifySlots,
    type DecodeResult,
    type Intent,
    type IntentName,
    type IntentOf,
    type IntentPayload,
    type Plan,
    type SafetyAssessment,
    type SlotScalar,
    type SlotsByIntent
} from './types.js';

// ─── Wire schemas ────────────────────────────────────────────────────────────

export const SafetySchema = z.object({
    risk:   z.enum(RISK_LEVELS).default('low'),
    reason: z.string().default('')
});

export const IntentPayloadSchema = z.object({
    intent:     z.enum(INTENT_NAMES),
    slots:      z.record(z.string(), z.unknown()).default({}),
    confirm:    z.boolean().default(false),
    speak_back: z.string().default(''),
    safety:     SafetySchema.default({ risk: 'low', reason: '' })
});

/**
 * `plan` is accepted as an alias of `steps`; older prompts used it.
 */
export const PlanPayloadSchema = z.preprocess(
    (raw: unknown): unknown => {
        if (value_isRecord(raw) && raw['steps'] === undefined && raw['plan'] !== undefined) {
            const { plan: steps, ...rest } = raw;
            return { ...rest, steps };
        }
        return raw;
    },
    z.object({
        steps:   z.array(IntentPayloadSchema).min(1, 'plan must have at least one step'),
        summary: z.string().default('')
    })
);

type ParsedIntentPayload = z.infer<typeof IntentPayloadSchema>;

// ─── Slot schemas (one per intent) ───────────────────────────────────────────

const OptionalText = z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value: string | number | null | undefined): string | undefined =>
        value === null || value === undefined ? undefined : String(value));

const OptionalNumber = z
    .union([
        z.number(),
        z.string().regex(/^\s*-?\d+(?:\.\d+)?\s*%?\s*$/, 'expected a number').transform(
            (value: string): number => Number.parseFloat(value)
        )
    ])
    .nullish()
    .transform((value: number | null | undefined): number | undefined => value ?? undefined);

const SystemSettingSlotsSchema = z.object({
    setting: OptionalText,
    value:   OptionalNumber
});

const PlayMusicSlotsSchema = z.object({
    action: OptionalText,
    query:  OptionalText
});

const WebSearchSlotsSchema = z.object({
    query: z.string().trim().min(1, 'web_search requires a query')
});

const WriteNoteSlotsSchema = z.object({
    title: OptionalText,
    body:  OptionalText
});

const ControlAppSlotsSchema = z.object({
    app:    OptionalText,
    action: OptionalText,
    url:    OptionalText
});

const ClarifySlotsSchema = z.object({}).transform((): ClarifySlots => ({}));

// ─── Decoders ────────────────────────────────────────────────────────────────

/**
 * Decode a raw wire value into a validated Intent.
 */
export function intent_decode(raw: unknown): DecodeResult<Intent> {
    const parsed = IntentPayloadSchema.safeParse(raw);
    if (!parsed.success) {
        return { ok: false, error: issues_format(parsed.error) };
    }
    return intent_fromPayload(parsed.data);
}

/**
 * Decode a raw wire value into a validated Plan. Every step must decode.
 */
export function plan_decode(raw: unknown): DecodeResult<Plan> {
    const parsed = PlanPayloadSchema.safeParse(raw);
    if (!parsed.success) {
        return { ok: false, error: issues_format(parsed.error) };
    }

    const steps: Intent[] = [];
    for (let i: number = 0; i < parsed.data.steps.length; i++) {
        const step: DecodeResult<Intent> = intent_fromPayload(parsed.data.steps[i]);
        if (!step.ok) {
            return { ok: false, error: `steps.${i}: ${step.error}` };
        }
        steps.push(step.value);
    }

    return { ok: true, value: plan_create(steps, parsed.data.summary) };
}

/**
 * Decode either shape. A record carrying `steps` (or `plan`) is a Plan.
 */
export function command_decode(raw: unknown): DecodeResult<Intent | Plan> {
    if (value_isRecord(raw) && (raw['steps'] !== undefined || raw['plan'] !== undefined)) {
        return plan_decode(raw);
    }
    return intent_decode(raw);
}

/**
 * Encode an Intent back into its wire form. Absent slots are omitted.
 */
export function intent_encode(intent: Intent): IntentPayload {
    const slots: Record<string, SlotScalar> = {};
    for (const [key, value] of Object.entries(intent.slots)) {
        const scalar: unknown = value;
        if (typeof scalar === 'string' || typeof scalar === 'number' || typeof scalar === 'boolean') {
            slots[key] = scalar;
        }
    }
    return {
        intent: intent.name,
        slots,
        confirm: intent.requiresConfirmation,
        speak_back: intent.spokenAcknowledgement,
        safety: { risk: intent.safety.risk, reason: intent.safety.reason }
    };
}

export interface IntentOptions {
    requiresConfirmation?: boolean;
    spokenAcknowledgement?: string;
    safety?: SafetyAssessment;
}

/**
 * Convenience constructor. Defaults to no confirmation and low risk.
 *
 * @example
 *   intent_create('web_search', { query: 'weather' }, { spokenAcknowledgement: '好的' });
 */
export function intent_create<K extends IntentName>(
    name: K,
    slots: SlotsByIntent[K],
    options: IntentOptions = {}
): IntentOf<K> {
    return {
        name,
        slots,
        requiresConfirmation: options.requiresConfirmation ?? false,
        spokenAcknowledgement: options.spokenAcknowledgement ?? '',
        safety: options.safety ?? { risk: 'low', reason: '' }
    };
}

/**
 * Build a Plan, deriving the summary when none is given.
 */
export function plan_create(steps: ReadonlyArray<Intent>, summary: string = ''): Plan {
    const trimmed: string = summary.trim();
    return {
        steps: [...steps],
        summary: trimmed.length > 0 ? trimmed : planSummary_derive(steps.length)
    };
}

export function planSummary_derive(stepCount: number): string {
    return `执行${stepCount}个任务`;
}

/**
 * Build a clarify intent. Used for re-asks and dangerous-operation gates.
 */
export function clarify_create(acknowledgement: string, safety: SafetyAssessment): Intent {
    return {
        name: 'clarify',
        slots: {},
        requiresConfirmation: true,
        spokenAcknowledgement: acknowledgement,
        safety: { risk: safety.risk, reason: safety.reason }
    };
}

function intent_fromPayload(payload: ParsedIntentPayload): DecodeResult<Intent> {
    const common = {
        requiresConfirmation: payload.confirm,
        spokenAcknowledgement: payload.speak_back,
        safety: { risk: payload.safety.risk, reason: payload.safety.reason }
    };

    switch (payload.intent) {
        case 'system_setting':
            return slots_decode(SystemSettingSlotsSchema, payload.slots,
                (slots): Intent => ({ name: 'system_setting', slots, ...common }));
        case 'play_music':
            return slots_decode(PlayMusicSlotsSchema, payload.slots,
                (slots): Intent => ({ name: 'play_music', slots, ...common }));
        case 'web_search':
            return slots_decode(WebSearchSlotsSchema, payload.slots,
                (slots): Intent => ({ name: 'web_search', slots, ...common }));
        case 'write_note':
            return slots_decode(WriteNoteSlotsSchema, payload.slots,
                (slots): Intent => ({ name: 'write_note', slots, ...common }));
        case 'control_app':
            return slots_decode(ControlAppSlotsSchema, payload.slots,
                (slots): Intent => ({ name: 'control_app', slots, ...common }));
        case 'clarify':
            return slots_decode(ClarifySlotsSchema, payload.slots,
                (slots): Intent => ({ name: 'clarify', slots, ...common }));
    }
}

function slots_decode<S>(
    schema: z.ZodType<S, z.ZodTypeDef, unknown>,
    raw: Record<string, unknown>,
    build: (slots: S) => Intent
): DecodeResult<Intent> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        return { ok: false, error: issues_format(parsed.error, 'slots') };
    }
    return { ok: true, value: build(parsed.data) };
}

function issues_format(error: z.ZodError, prefix?: string): string {
    return error.issues
        .map((issue: z.ZodIssue): string => {
            const path: string = [prefix, ...issue.path].filter((part) => part !== undefined).join('.');
            return `${path || '(root)'}: ${issue.message}`;
        })
        .join('; ');
}

function value_isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
