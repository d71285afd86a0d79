import { afterAll, describe, expect, it, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PlanResolver, type ResolvedCommand } from './PlanResolver.js';
import { PlanSplitter } from './PlanSplitter.js';
import { REASON_DANGEROUS, RuleMatcher } from './RuleMatcher.js';
import { ruleTable_load } from './rules.js';
import { REASON_ESCALATED, SafetyEscalator } from './SafetyEscalator.js';
import { GenerativeParser } from '../llm/GenerativeParser.js';
import { PromptAssembler } from '../llm/PromptAssembler.js';
import { GenerationError, type GenerationClient, type GenerationRequest } from '../llm/types.js';
import type { Intent } from '../command/types.js';

const matcher: RuleMatcher = new RuleMatcher(ruleTable_load());
const promptsDir: string = fs.mkdtempSync(path.join(os.tmpdir(), 'voxplan-resolver-'));

function resolver_create(generate: ((request: GenerationRequest) => Promise<string>) | null): PlanResolver {
    const parser: GenerativeParser | null = generate
        ? new GenerativeParser(
            { provider: 'openai', generate } satisfies GenerationClient,
            new PromptAssembler(promptsDir),
            { model: 'test-model', temperature: 0, maxTokens: 256, maxRetries: 2, requestTimeoutMs: 1_000 }
        )
        : null;
    return new PlanResolver({
        parser,
        matcher,
        splitter: new PlanSplitter(),
        escalator: new SafetyEscalator(matcher, { confirmDangerous: true })
    });
}

describe('PlanResolver', (): void => {
    afterAll((): void => {
        fs.rmSync(promptsDir, { recursive: true, force: true });
    });

    it('splits a compound request when the generation service is down', async (): Promise<void> => {
        const generate = vi.fn<(request: GenerationRequest) => Promise<string>>()
            .mockRejectedValue(new GenerationError('service_error', 'HTTP 503: unavailable'));

        const resolved: ResolvedCommand = await resolver_create(generate).resolve('打开微信然后把音量调到30%');

        expect(generate).toHaveBeenCalledTimes(2);
        expect(resolved.kind).toBe('plan');
        if (resolved.kind !== 'plan') return;
        expect(resolved.origin).toBe('splitter');
        expect(resolved.plan.summary).toBe('执行2个任务');
        expect(resolved.plan.steps.map((step: Intent) => [step.name, step.slots])).toEqual([
            ['control_app', { app: '微信', action: 'open' }],
            ['system_setting', { setting: 'volume', value: 30 }]
        ]);
    });

    it('checks for danger before splitting', async (): Promise<void> => {
        const resolved: ResolvedCommand = await resolver_create(null).resolve('打开微信然后删除所有聊天记录');

        expect(resolved.kind).toBe('intent');
        if (resolved.kind !== 'intent') return;
        expect(resolved.origin).toBe('rules');
        expect(resolved.intent.name).toBe('clarify');
        expect(resolved.intent.safety).toEqual({ risk: 'high', reason: REASON_DANGEROUS });
    });

    it('falls back to a whole-text match when splitting yields fewer than two intents', async (): Promise<void> => {
        const resolved: ResolvedCommand = await resolver_create(null).resolve('打开微信然后休息一下');

        expect(resolved.kind).toBe('intent');
        if (resolved.kind !== 'intent') return;
        expect(resolved.intent.name).toBe('control_app');
    });

    it('matches a single request with rules when no parser is configured', async (): Promise<void> => {
        const resolved: ResolvedCommand = await resolver_create(null).resolve('  把音量调到50%  ');

        expect(resolved).toMatchObject({
            kind: 'intent',
            origin: 'rules',
            intent: { name: 'system_setting', slots: { setting: 'volume', value: 50 } }
        });
    });

    it('escalates a model intent that understates risk', async (): Promise<void> => {
        const generate = vi.fn<(request: GenerationRequest) => Promise<string>>().mockResolvedValue(
            '{"intent":"web_search","slots":{"query":"旧文件"},"confirm":false,"speak_back":"好的","safety":{"risk":"low","reason":""}}'
        );

        const resolved: ResolvedCommand = await resolver_create(generate).resolve('删除旧文件');

        expect(resolved.kind === 'intent' && resolved.origin).toBe('model');
        if (resolved.kind !== 'intent') return;
        expect(resolved.intent.name).toBe('web_search');
        expect(resolved.intent.requiresConfirmation).toBe(true);
        expect(resolved.intent.safety).toEqual({ risk: 'high', reason: REASON_ESCALATED });
    });

    it('returns a model plan with every step escalated', async (): Promise<void> => {
        const generate = vi.fn<(request: GenerationRequest) => Promise<string>>().mockResolvedValue(JSON.stringify({
            steps: [
                { intent: 'control_app', slots: { app: 'Finder', action: 'open' } },
                { intent: 'write_note', slots: { body: 'done' } }
            ]
        }));

        const resolved: ResolvedCommand = await resolver_create(generate).resolve('open Finder then wipe the trash');

        expect(resolved.kind).toBe('plan');
        if (resolved.kind !== 'plan') return;
        expect(resolved.origin).toBe('model');
        expect(resolved.plan.steps.every((step: Intent): boolean => step.safety.risk === 'high')).toBe(true);
    });

    it('asks for clarification when nothing is understood', async (): Promise<void> => {
        const resolved: ResolvedCommand = await resolver_create(null).resolve('今天天气怎么样');

        expect(resolved.kind === 'intent' && resolved.intent.name).toBe('clarify');
    });
});
