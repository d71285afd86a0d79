import { describe, it, expect } from 'vitest';
import { SettingsService, type ResolvedSettings } from './settings.js';
import { ruleTableDefault_path } from '../routing/rules.js';
import { promptsDefault_dir } from '../llm/PromptAssembler.js';

describe('SettingsService', (): void => {
    it('resolves defaults when nothing is set', (): void => {
        const service: SettingsService = new SettingsService({});

        expect(service.snapshot()).toEqual({
            provider: 'anthropic',
            apiKey: '',
            model: 'claude-3-5-sonnet-20241022',
            temperature: 0.2,
            maxTokens: 1024,
            maxRetries: 2,
            requestTimeoutMs: 20_000,
            actuatorTimeoutMs: 30_000,
            confirmDangerous: true,
            promptsDir: promptsDefault_dir(),
            rulesPath: ruleTableDefault_path(),
            verbose: false
        } satisfies ResolvedSettings);
        expect(service.source('maxRetries')).toBe('default');
        expect(service.credentials_present()).toBe(false);
    });

    it('applies env values with clamping', (): void => {
        const service: SettingsService = new SettingsService({
            VOXPLAN_MAX_RETRIES: '9',
            VOXPLAN_TEMPERATURE: '1.5',
            VOXPLAN_MAX_TOKENS: '10',
            VOXPLAN_ACTUATOR_TIMEOUT_MS: '4500.6'
        });
        const settings: ResolvedSettings = service.snapshot();

        expect(settings.maxRetries).toBe(5);
        expect(settings.temperature).toBe(1);
        expect(settings.maxTokens).toBe(64);
        expect(settings.actuatorTimeoutMs).toBe(4501);
        expect(service.source('maxRetries')).toBe('env');
    });

    it('parses switches', (): void => {
        expect(new SettingsService({ VOXPLAN_CONFIRM_DANGEROUS: 'off' }).snapshot().confirmDangerous).toBe(false);
        expect(new SettingsService({ VOXPLAN_VERBOSE: 'Yes' }).snapshot().verbose).toBe(true);
    });

    it('rejects malformed values with the variable name', (): void => {
        expect((): ResolvedSettings => new SettingsService({ VOXPLAN_VERBOSE: 'maybe' }).snapshot())
            .toThrow('Invalid value for VOXPLAN_VERBOSE: maybe (expected on/off)');
        expect((): ResolvedSettings => new SettingsService({ VOXPLAN_MAX_TOKENS: 'lots' }).snapshot())
            .toThrow('Invalid value for VOXPLAN_MAX_TOKENS: lots');
        expect((): ResolvedSettings => new SettingsService({ VOXPLAN_PROVIDER: 'gemini' }).snapshot())
            .toThrow(/VOXPLAN_PROVIDER: gemini/);
    });

    it('picks the provider key and model', (): void => {
        const service: SettingsService = new SettingsService({
            VOXPLAN_PROVIDER: 'openai',
            ANTHROPIC_API_KEY: 'anthropic-test-secret',
            OPENAI_API_KEY: 'test-secret'
        });
        const settings: ResolvedSettings = service.snapshot();

        expect(settings.apiKey).toBe('test-secret');
        expect(settings.model).toBe('gpt-4o-mini');
        expect(service.source('apiKey')).toBe('env');
        expect(service.credentials_present()).toBe(true);
    });

    it('prefers the generic key over provider keys', (): void => {
        const service: SettingsService = new SettingsService({
            VOXPLAN_API_KEY: 'test-secret',
            ANTHROPIC_API_KEY: 'other-secret'
        });

        expect(service.snapshot().apiKey).toBe('test-secret');
    });

    it('lets explicit overrides win over env', (): void => {
        const service: SettingsService = new SettingsService(
            { VOXPLAN_MAX_RETRIES: '4', VOXPLAN_VERBOSE: 'on' },
            { maxRetries: 0, verbose: false, model: 'custom-model' }
        );
        const settings: ResolvedSettings = service.snapshot();

        expect(settings.maxRetries).toBe(1);
        expect(settings.verbose).toBe(false);
        expect(settings.model).toBe('custom-model');
        expect(service.source('maxRetries')).toBe('override');
    });
});
