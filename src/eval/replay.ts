/**
 * @file Replay Evaluation
 *
 * Replays a suite of labelled utterances through the resolver and scores
 * the results. Intent cases check the intent name and the slots; plan
 * cases check whether the result is a plan and how many steps it has.
 *
 * Slot comparison is lenient:
 *   - only the expected keys are checked;
 *   - strings match when either contains the other (case-insensitive);
 *     `query` also matches on any shared whitespace-separated word;
 *   - a numeric `value` may differ by at most 1.
 *
 * @module eval/replay
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import { z } from 'zod';
import { INTENT_NAMES, type Intent } from '../command/types.js';
import type { ResolvedCommand } from '../routing/PlanResolver.js';
import type { TelemetryHooks } from '../telemetry/types.js';

// ─── Suite schema ────────────────────────────────────────────────────────────

const IntentCaseSchema = z.object({
    utterance: z.string().min(1, 'utterance must not be empty'),
    intent:    z.enum(INTENT_NAMES),
    slots:     z.record(z.string(), z.unknown()).default({})
});

const PlanCaseSchema = z.object({
    utterance:   z.string().min(1, 'utterance must not be empty'),
    type:        z.enum(['intent', 'plan']),
    steps:       z.number().int().positive(),
    description: z.string().default('')
});

export const ReplaySuiteSchema = z.object({
    version: z.number().int().positive().default(1),
    intents: z.array(IntentCaseSchema).default([]),
    plans:   z.array(PlanCaseSchema).default([])
});

export type IntentCase = z.infer<typeof IntentCaseSchema>;
export type PlanCase = z.infer<typeof PlanCaseSchema>;
export type ReplaySuite = z.infer<typeof ReplaySuiteSchema>;

/** What the replay needs from the pipeline. */
export interface CommandSource {
    resolve(text: string): Promise<ResolvedCommand>;
}

export interface SlotComparison {
    match: boolean;
    reason: string;
}

export interface IntentCaseResult {
    index: number;
    utterance: string;
    expectedIntent: string;
    /** `plan` when the resolver returned a plan for an intent case. */
    predictedIntent: string;
    expectedSlots: Record<string, unknown>;
    predictedSlots: Record<string, unknown>;
    intentMatch: boolean;
    slots: SlotComparison;
}

export interface PlanCaseResult {
    index: number;
    utterance: string;
    expectedType: PlanCase['type'];
    actualType: PlanCase['type'];
    expectedSteps: number;
    actualSteps: number;
    passed: boolean;
}

export interface ReplayReport {
    intents: {
        total: number;
        intentCorrect: number;
        slotsCorrect: number;
        bothCorrect: number;
        results: IntentCaseResult[];
    };
    plans: {
        total: number;
        passed: number;
        results: PlanCaseResult[];
    };
}

/** Overall intent accuracy at or above this is passing. */
export const INTENT_PASS_RATE: number = 0.7;
/** Plan-case pass rate at or above this is passing. */
export const PLAN_PASS_RATE: number = 0.8;

const PROGRESS_EVERY: number = 10;
const NUMERIC_TOLERANCE: number = 1;

// ─── Loading ─────────────────────────────────────────────────────────────────

export function replaySuiteDefault_path(): string {
    return fileURLToPath(new URL('../../eval/replay.yaml', import.meta.url));
}

/**
 * Read and validate a replay suite.
 *
 * @throws {Error} If the file is missing or fails validation.
 */
export function replaySuite_load(filePath: string = replaySuiteDefault_path()): ReplaySuite {
    if (!fs.existsSync(filePath)) {
        throw new Error(`Replay suite not found: ${filePath}`);
    }
    return replaySuite_parse(fs.readFileSync(filePath, 'utf-8'), filePath);
}

export function replaySuite_parse(yamlText: string, source: string = '<inline>'): ReplaySuite {
    const parsed = ReplaySuiteSchema.safeParse(yaml.load(yamlText) ?? {});
    if (!parsed.success) {
        const details: string = parsed.error.issues
            .map((issue: z.ZodIssue): string => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid replay suite ${source}: ${details}`);
    }
    return parsed.data;
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

/**
 * Compare predicted slots against the expected subset.
 */
export function slots_compare(
    predicted: Readonly<Record<string, unknown>>,
    expected: Readonly<Record<string, unknown>>
): SlotComparison {
    for (const [key, want] of Object.entries(expected)) {
        const got: unknown = predicted[key];
        if (got === undefined || got === null) {
            return { match: false, reason: `Missing slot: ${key}` };
        }

        if (typeof want === 'number') {
            const gotNumber: number = typeof got === 'number' ? got : Number(got);
            if (Number.isNaN(gotNumber)) {
                return { match: false, reason: `Slot ${key}: type mismatch` };
            }
            if (key === 'value' && Math.abs(gotNumber - want) > NUMERIC_TOLERANCE) {
                return { match: false, reason: `Slot ${key}: value differs too much` };
            }
            continue;
        }

        if (typeof want === 'string' && typeof got === 'string' && !text_overlaps(key, got, want)) {
            return {
                match: false,
                reason: key === 'query' ? `Slot ${key}: no word overlap` : `Slot ${key}: value mismatch`
            };
        }
    }
    return { match: true, reason: '' };
}

function text_overlaps(key: string, got: string, want: string): boolean {
    const gotLower: string = got.toLowerCase();
    const wantLower: string = want.toLowerCase();
    if (gotLower.includes(wantLower) || wantLower.includes(gotLower)) {
        return true;
    }
    if (key !== 'query') {
        return false;
    }
    const gotWords: Set<string> = new Set(gotLower.split(/\s+/).filter(Boolean));
    return wantLower.split(/\s+/).some((word: string): boolean => word.length > 0 && gotWords.has(word));
}

export function intentCase_score(index: number, testCase: IntentCase, resolved: ResolvedCommand): IntentCaseResult {
    const intent: Intent | null = resolved.kind === 'intent' ? resolved.intent : null;
    const predictedIntent: string = intent ? intent.name : 'plan';
    const predictedSlots: Record<string, unknown> = intent ? Object.fromEntries(Object.entries(intent.slots)) : {};
    return {
        index,
        utterance: testCase.utterance,
        expectedIntent: testCase.intent,
        predictedIntent,
        expectedSlots: testCase.slots,
        predictedSlots,
        intentMatch: predictedIntent === testCase.intent,
        slots: slots_compare(predictedSlots, testCase.slots)
    };
}

export function planCase_score(index: number, testCase: PlanCase, resolved: ResolvedCommand): PlanCaseResult {
    const actualSteps: number = resolved.kind === 'plan' ? resolved.plan.steps.length : 1;
    return {
        index,
        utterance: testCase.utterance,
        expectedType: testCase.type,
        actualType: resolved.kind,
        expectedSteps: testCase.steps,
        actualSteps,
        passed: resolved.kind === testCase.type && actualSteps === testCase.steps
    };
}

// ─── Running ─────────────────────────────────────────────────────────────────

/**
 * Replay every case in order. Cases run one at a time so that attempt
 * logs from a generative parser stay readable.
 */
export async function replay_run(
    source: CommandSource,
    suite: ReplaySuite,
    hooks: TelemetryHooks = {}
): Promise<ReplayReport> {
    const report: ReplayReport = {
        intents: { total: suite.intents.length, intentCorrect: 0, slotsCorrect: 0, bothCorrect: 0, results: [] },
        plans: { total: suite.plans.length, passed: 0, results: [] }
    };
    const caseCount: number = suite.intents.length + suite.plans.length;
    let processed: number = 0;

    const progress_note = (): void => {
        processed++;
        if (processed % PROGRESS_EVERY === 0) {
            hooks.status_emit?.(`REPLAY: ${processed}/${caseCount}`);
        }
    };

    for (let i: number = 0; i < suite.intents.length; i++) {
        const testCase: IntentCase = suite.intents[i];
        const result: IntentCaseResult = intentCase_score(i + 1, testCase, await source.resolve(testCase.utterance));
        report.intents.results.push(result);
        if (result.intentMatch) report.intents.intentCorrect++;
        if (result.slots.match) report.intents.slotsCorrect++;
        if (result.intentMatch && result.slots.match) report.intents.bothCorrect++;
        progress_note();
    }

    for (let i: number = 0; i < suite.plans.length; i++) {
        const testCase: PlanCase = suite.plans[i];
        const result: PlanCaseResult = planCase_score(i + 1, testCase, await source.resolve(testCase.utterance));
        report.plans.results.push(result);
        if (result.passed) report.plans.passed++;
        progress_note();
    }

    hooks.log_emit?.(`Replayed ${caseCount} case(s)`);
    return report;
}

/**
 * Fraction in [0, 1]; an empty section counts as fully passing.
 */
export function rate_compute(count: number, total: number): number {
    return total === 0 ? 1 : count / total;
}

export function replayReport_passed(report: ReplayReport): boolean {
    return rate_compute(report.intents.bothCorrect, report.intents.total) >= INTENT_PASS_RATE
        && rate_compute(report.plans.passed, report.plans.total) >= PLAN_PASS_RATE;
}
