/**
 * @file Runtime Settings Service
 *
 * Resolves runtime settings with deterministic precedence
 * (explicit override > env > defaults). Numeric values are clamped to
 * their bounds; switches accept `1/true/on/yes` and `0/false/off/no`.
 *
 * @module config/settings
 */

import { ruleTableDefault_path } from '../routing/rules.js';
import { promptsDefault_dir } from '../llm/PromptAssembler.js';
import type { GenerationProvider } from '../llm/types.js';

export interface ResolvedSettings {
    provider: GenerationProvider;
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens: number;
    maxRetries: number;
    requestTimeoutMs: number;
    actuatorTimeoutMs: number;
    confirmDangerous: boolean;
    promptsDir: string;
    rulesPath: string;
    verbose: boolean;
}

export type SettingsKey = keyof ResolvedSettings;

export type SettingsOverrides = Partial<ResolvedSettings>;

export type SettingSource = 'override' | 'env' | 'default';

type Env = Record<string, string | undefined>;

type NumericKey = 'temperature' | 'maxTokens' | 'maxRetries' | 'requestTimeoutMs' | 'actuatorTimeoutMs';

interface NumericBounds {
    min: number;
    max: number;
    integer: boolean;
}

export const DEFAULT_MODELS: Record<GenerationProvider, string> = {
    anthropic: 'claude-3-5-sonnet-20241022',
    openai: 'gpt-4o-mini'
};

const ENV_KEYS: Record<Exclude<SettingsKey, 'apiKey'>, string> = {
    provider: 'VOXPLAN_PROVIDER',
    model: 'VOXPLAN_MODEL',
    temperature: 'VOXPLAN_TEMPERATURE',
    maxTokens: 'VOXPLAN_MAX_TOKENS',
    maxRetries: 'VOXPLAN_MAX_RETRIES',
    requestTimeoutMs: 'VOXPLAN_REQUEST_TIMEOUT_MS',
    actuatorTimeoutMs: 'VOXPLAN_ACTUATOR_TIMEOUT_MS',
    confirmDangerous: 'VOXPLAN_CONFIRM_DANGEROUS',
    promptsDir: 'VOXPLAN_PROMPTS_DIR',
    rulesPath: 'VOXPLAN_RULES',
    verbose: 'VOXPLAN_VERBOSE'
};

/** Checked in order; the provider-specific key only for its provider. */
const API_KEY_ENV: Record<GenerationProvider, string[]> = {
    anthropic: ['VOXPLAN_API_KEY', 'ANTHROPIC_API_KEY'],
    openai: ['VOXPLAN_API_KEY', 'OPENAI_API_KEY']
};

const BOUNDS: Record<NumericKey, NumericBounds> = {
    temperature:       { min: 0, max: 1, integer: false },
    maxTokens:         { min: 64, max: 8192, integer: true },
    maxRetries:        { min: 1, max: 5, integer: true },
    requestTimeoutMs:  { min: 1_000, max: 120_000, integer: true },
    actuatorTimeoutMs: { min: 1_000, max: 300_000, integer: true }
};

const SWITCH_ON: ReadonlySet<string> = new Set(['1', 'true', 'on', 'yes']);
const SWITCH_OFF: ReadonlySet<string> = new Set(['0', 'false', 'off', 'no']);

export class SettingsService {
    constructor(
        private readonly env: Env = process.env,
        private readonly overrides: SettingsOverrides = {}
    ) {}

    /**
     * Return effective settings.
     */
    public snapshot(): ResolvedSettings {
        const provider: GenerationProvider = this.provider_resolve();
        return {
            provider,
            apiKey: this.apiKey_resolve(provider),
            model: this.overrides.model ?? this.envText_resolve('model') ?? DEFAULT_MODELS[provider],
            temperature: this.numeric_resolve('temperature', 0.2),
            maxTokens: this.numeric_resolve('maxTokens', 1024),
            maxRetries: this.numeric_resolve('maxRetries', 2),
            requestTimeoutMs: this.numeric_resolve('requestTimeoutMs', 20_000),
            actuatorTimeoutMs: this.numeric_resolve('actuatorTimeoutMs', 30_000),
            confirmDangerous: this.switch_resolve('confirmDangerous', true),
            promptsDir: this.overrides.promptsDir ?? this.envText_resolve('promptsDir') ?? promptsDefault_dir(),
            rulesPath: this.overrides.rulesPath ?? this.envText_resolve('rulesPath') ?? ruleTableDefault_path(),
            verbose: this.switch_resolve('verbose', false)
        };
    }

    /**
     * Where the effective value of a setting came from.
     */
    public source(key: SettingsKey): SettingSource {
        if (this.overrides[key] !== undefined) return 'override';
        if (key === 'apiKey') {
            return this.apiKeyEnv_find(this.provider_resolve()) !== undefined ? 'env' : 'default';
        }
        return this.envText_resolve(key) !== undefined ? 'env' : 'default';
    }

    /**
     * Whether a generation client can be built from these settings.
     */
    public credentials_present(): boolean {
        return this.snapshot().apiKey.length > 0;
    }

    // ─── Resolution ──────────────────────────────────────────────────────────

    private provider_resolve(): GenerationProvider {
        if (this.overrides.provider) return this.overrides.provider;
        const raw: string | undefined = this.envText_resolve('provider')?.toLowerCase();
        if (raw === undefined) return 'anthropic';
        if (raw === 'anthropic' || raw === 'openai') return raw;
        throw new Error(`Invalid value for ${ENV_KEYS.provider}: ${raw} (expected anthropic or openai)`);
    }

    private apiKey_resolve(provider: GenerationProvider): string {
        if (this.overrides.apiKey !== undefined) return this.overrides.apiKey;
        const envKey: string | undefined = this.apiKeyEnv_find(provider);
        return envKey !== undefined ? (this.env[envKey] ?? '').trim() : '';
    }

    private apiKeyEnv_find(provider: GenerationProvider): string | undefined {
        return API_KEY_ENV[provider].find((key: string): boolean => (this.env[key] ?? '').trim().length > 0);
    }

    private envText_resolve(key: Exclude<SettingsKey, 'apiKey'>): string | undefined {
        const raw: string | undefined = this.env[ENV_KEYS[key]]?.trim();
        return raw ? raw : undefined;
    }

    private numeric_resolve(key: NumericKey, fallback: number): number {
        const override: number | undefined = this.overrides[key];
        if (typeof override === 'number') {
            return this.value_clamp(key, override);
        }

        const raw: string | undefined = this.envText_resolve(key);
        if (raw === undefined) return fallback;

        const parsed: number = Number(raw);
        if (!Number.isFinite(parsed)) {
            throw new Error(`Invalid value for ${ENV_KEYS[key]}: ${raw}`);
        }
        return this.value_clamp(key, parsed);
    }

    private switch_resolve(key: 'confirmDangerous' | 'verbose', fallback: boolean): boolean {
        const override: boolean | undefined = this.overrides[key];
        if (typeof override === 'boolean') return override;

        const raw: string | undefined = this.envText_resolve(key)?.toLowerCase();
        if (raw === undefined) return fallback;
        if (SWITCH_ON.has(raw)) return true;
        if (SWITCH_OFF.has(raw)) return false;
        throw new Error(`Invalid value for ${ENV_KEYS[key]}: ${raw} (expected on/off)`);
    }

    private value_clamp(key: NumericKey, value: number): number {
        const bounds: NumericBounds = BOUNDS[key];
        const rounded: number = bounds.integer ? Math.round(value) : value;
        return Math.max(bounds.min, Math.min(bounds.max, rounded));
    }
}
