/**
 * @file Rule Table Loader
 *
 * Loads the ordered `(intent, patterns)` table and the dangerous-operation
 * patterns from YAML, validates them with zod and compiles every pattern
 * once. The compiled table is read-only and safe to share.
 *
 * @module routing/rules
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { IntentName } from '../command/types.js';

/** Intents the table may route to. `clarify` is the matcher's own fallback. */
const ROUTABLE_INTENTS = [
    'system_setting',
    'play_music',
    'web_search',
    'write_note',
    'control_app'
] as const;

export type RoutableIntentName = Exclude<IntentName, 'clarify'>;

export interface IntentRule {
    readonly name: RoutableIntentName;
    readonly patterns: ReadonlyArray<RegExp>;
}

export interface RuleTable {
    readonly dangerous: ReadonlyArray<RegExp>;
    readonly intents: ReadonlyArray<IntentRule>;
}

// ─── Schema ──────────────────────────────────────────────────────────────────

const PatternSchema = z
    .string()
    .min(1, 'pattern must not be empty')
    .refine(pattern_isValid, (pattern: string) => ({ message: `invalid regular expression: ${pattern}` }));

export const RuleTableSchema = z.object({
    version:   z.number().int().positive().default(1),
    dangerous: z.array(PatternSchema).min(1, 'at least one dangerous pattern is required'),
    intents:   z.array(z.object({
        intent:   z.enum(ROUTABLE_INTENTS),
        patterns: z.array(PatternSchema).min(1, 'intent needs at least one pattern')
    })).min(1, 'at least one intent rule is required')
});

export type RawRuleTable = z.infer<typeof RuleTableSchema>;

// ─── Loading ─────────────────────────────────────────────────────────────────

/** Path of the rule table shipped with the package. */
export function ruleTableDefault_path(): string {
    return fileURLToPath(new URL('../../rules/default.yaml', import.meta.url));
}

/**
 * Read, validate and compile a rule table file.
 *
 * @param filePath - YAML file; defaults to the bundled table.
 * @throws {Error} If the file is missing or fails validation.
 */
export function ruleTable_load(filePath: string = ruleTableDefault_path()): RuleTable {
    if (!fs.existsSync(filePath)) {
        throw new Error(`Rule table not found: ${filePath}`);
    }
    return ruleTable_parse(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Validate and compile a rule table from YAML text.
 */
export function ruleTable_parse(yamlText: string, source: string = '<inline>'): RuleTable {
    const parsed = RuleTableSchema.safeParse(yaml.load(yamlText));
    if (!parsed.success) {
        const details: string = parsed.error.issues
            .map((issue: z.ZodIssue): string => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid rule table ${source}: ${details}`);
    }
    return ruleTable_compile(parsed.data);
}

export function ruleTable_compile(raw: RawRuleTable): RuleTable {
    return {
        dangerous: raw.dangerous.map((pattern: string): RegExp => new RegExp(pattern)),
        intents: raw.intents.map((rule): IntentRule => ({
            name: rule.intent,
            patterns: rule.patterns.map((pattern: string): RegExp => new RegExp(pattern))
        }))
    };
}

function pattern_isValid(pattern: string): boolean {
    try {
        new RegExp(pattern);
        return true;
    } catch {
        return false;
    }
}
