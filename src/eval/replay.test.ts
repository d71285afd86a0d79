import { beforeAll, describe, expect, it, vi } from 'vitest';
import {
    replay_run,
    replayReport_passed,
    replaySuite_load,
    replaySuite_parse,
    slots_compare,
    type CommandSource,
    type ReplayReport,
    type ReplaySuite
} from './replay.js';
import { intent_create } from '../command/schemas.js';
import { SettingsService } from '../config/settings.js';
import type { ResolvedCommand } from '../routing/PlanResolver.js';
import { voxplan_assemble, type VoxPlanServiceBag } from '../VoxPlanFactory.js';

describe('slots_compare', (): void => {
    it('accepts anything when no slots are expected', (): void => {
        expect(slots_compare({ query: 'cats' }, {})).toEqual({ match: true, reason: '' });
    });

    it('reports the first missing slot', (): void => {
        expect(slots_compare({}, { setting: 'volume' })).toEqual({ match: false, reason: 'Missing slot: setting' });
    });

    it('matches text by containment in either direction, ignoring case', (): void => {
        expect(slots_compare({ app: 'Safari' }, { app: 'safari' }).match).toBe(true);
        expect(slots_compare({ body: '周末买牛奶清单' }, { body: '买牛奶' }).match).toBe(true);
        expect(slots_compare({ body: '牛奶' }, { body: '周末买牛奶' }).match).toBe(true);
        expect(slots_compare({ app: 'Chrome' }, { app: 'safari' })).toEqual({ match: false, reason: 'Slot app: value mismatch' });
    });

    it('lets a query match on a shared word', (): void => {
        expect(slots_compare({ query: 'best TypeScript books' }, { query: 'typescript generics' }).match).toBe(true);
        expect(slots_compare({ query: 'cats' }, { query: 'dogs' })).toEqual({ match: false, reason: 'Slot query: no word overlap' });
    });

    it('allows a numeric value to be off by one', (): void => {
        expect(slots_compare({ value: 49 }, { value: 50 }).match).toBe(true);
        expect(slots_compare({ value: 51 }, { value: 50 }).match).toBe(true);
        expect(slots_compare({ value: 47 }, { value: 50 })).toEqual({ match: false, reason: 'Slot value: value differs too much' });
    });

    it('coerces numeric text and rejects non-numbers', (): void => {
        expect(slots_compare({ value: '50' }, { value: 50 }).match).toBe(true);
        expect(slots_compare({ value: 'loud' }, { value: 50 })).toEqual({ match: false, reason: 'Slot value: type mismatch' });
    });

    it('ignores numeric differences outside the value slot', (): void => {
        expect(slots_compare({ count: 9 }, { count: 2 }).match).toBe(true);
    });
});

describe('replaySuite_parse', (): void => {
    it('loads the bundled suite', (): void => {
        const suite: ReplaySuite = replaySuite_load();

        expect(suite.intents.length).toBeGreaterThan(0);
        expect(suite.plans.length).toBeGreaterThan(0);
    });

    it('fills defaults for omitted sections and slots', (): void => {
        expect(replaySuite_parse('intents:\n  - utterance: 静音\n    intent: system_setting\n')).toEqual({
            version: 1,
            intents: [{ utterance: '静音', intent: 'system_setting', slots: {} }],
            plans: []
        });
    });

    it('rejects an unknown intent name with its path', (): void => {
        expect((): ReplaySuite => replaySuite_parse('intents:\n  - utterance: hi\n    intent: reboot\n'))
            .toThrow(/^Invalid replay suite <inline>: intents\.0\.intent:/);
    });

    it('rejects a plan case without a positive step count', (): void => {
        expect((): ReplaySuite => replaySuite_parse('plans:\n  - utterance: hi\n    type: plan\n    steps: 0\n', 'cases.yaml'))
            .toThrow(/^Invalid replay suite cases\.yaml: plans\.0\.steps:/);
    });

    it('reports a missing file', (): void => {
        expect((): ReplaySuite => replaySuite_load('/nonexistent/replay.yaml'))
            .toThrow('Replay suite not found: /nonexistent/replay.yaml');
    });
});

describe('replay_run', (): void => {
    let bag: VoxPlanServiceBag;

    beforeAll((): void => {
        bag = voxplan_assemble(new SettingsService({}).snapshot(), { noLlm: true });
    });

    it('scores intent and plan cases against the rule fallback', async (): Promise<void> => {
        const suite: ReplaySuite = {
            version: 1,
            intents: [
                { utterance: '把音量调到50%', intent: 'system_setting', slots: { setting: 'volume', value: 51 } },
                { utterance: '今天天气怎么样', intent: 'web_search', slots: { query: '天气' } },
                { utterance: '打开微信然后把音量调到30%', intent: 'control_app', slots: {} }
            ],
            plans: [
                { utterance: '打开微信然后把音量调到30%', type: 'plan', steps: 2, description: '' },
                { utterance: '把音量调到50%', type: 'plan', steps: 2, description: '' }
            ]
        };

        const report: ReplayReport = await replay_run(bag.resolver, suite);

        expect([report.intents.intentCorrect, report.intents.slotsCorrect, report.intents.bothCorrect]).toEqual([1, 2, 1]);
        expect(report.intents.results[1]).toMatchObject({
            predictedIntent: 'clarify',
            intentMatch: false,
            slots: { match: false, reason: 'Missing slot: query' }
        });
        expect(report.intents.results[2].predictedIntent).toBe('plan');
        expect(report.plans.passed).toBe(1);
        expect(report.plans.results[1]).toMatchObject({ actualType: 'intent', actualSteps: 1, passed: false });
        expect(replayReport_passed(report)).toBe(false);
    });

    it('reports progress every ten cases', async (): Promise<void> => {
        const resolved: ResolvedCommand = {
            kind: 'intent',
            intent: intent_create('play_music', { action: 'play' }),
            origin: 'rules'
        };
        const source: CommandSource = { resolve: vi.fn<(text: string) => Promise<ResolvedCommand>>().mockResolvedValue(resolved) };
        const status_emit = vi.fn<(message: string) => void>();
        const suite: ReplaySuite = {
            version: 1,
            intents: Array.from({ length: 12 }, (_: unknown, i: number) => ({
                utterance: `播放第${i + 1}首`,
                intent: 'play_music' as const,
                slots: { action: 'play' }
            })),
            plans: []
        };

        const report: ReplayReport = await replay_run(source, suite, { status_emit });

        expect(status_emit.mock.calls).toEqual([['REPLAY: 10/12']]);
        expect(report.intents.bothCorrect).toBe(12);
        expect(replayReport_passed(report)).toBe(true);
    });
});
