import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { ACK_NO_MATCH, REASON_DANGEROUS, REASON_NO_MATCH, RuleMatcher } from './RuleMatcher.js';
import { ruleTable_load } from './rules.js';
import type { Intent } from '../command/types.js';

const matcher: RuleMatcher = new RuleMatcher(ruleTable_load());

describe('RuleMatcher scenarios', (): void => {
    it('sets volume from a percentage', (): void => {
        expect(matcher.match('把音量调到50%')).toEqual({
            name: 'system_setting',
            slots: { setting: 'volume', value: 50 },
            requiresConfirmation: false,
            spokenAcknowledgement: '好的，把音量调到50%',
            safety: { risk: 'low', reason: '' }
        });
    });

    it('guards a bulk delete behind a high-risk clarify', (): void => {
        expect(matcher.match('删除所有文件')).toEqual({
            name: 'clarify',
            slots: {},
            requiresConfirmation: true,
            spokenAcknowledgement: '您确定要执行「删除所有文件」吗？这可能有风险。',
            safety: { risk: 'high', reason: REASON_DANGEROUS }
        });
    });

    it('extracts the search query after the keyword', (): void => {
        const intent: Intent = matcher.match('搜索机器学习教程');

        expect(intent.name).toBe('web_search');
        expect(intent.slots).toEqual({ query: '机器学习教程' });
        expect(intent.spokenAcknowledgement).toBe('好的，搜索机器学习教程');
    });

    it('strips a leading "for" from English searches', (): void => {
        expect(matcher.match('search for weather in Shanghai').slots).toEqual({ query: 'weather in Shanghai' });
    });

    it('records a note with title and body', (): void => {
        const intent: Intent = matcher.match('记录明天开会');

        expect(intent.name).toBe('write_note');
        expect(intent.slots).toEqual({ title: '明天开会', body: '明天开会' });
        expect(intent.spokenAcknowledgement).toBe('好的，创建笔记');
    });

    it('truncates long note titles to twenty characters', (): void => {
        const intent: Intent = matcher.match('笔记：一二三四五六七八九十一二三四五六七八九十二十一');

        expect(intent.name).toBe('write_note');
        expect(intent.slots).toEqual({
            title: '一二三四五六七八九十一二三四五六七八九十',
            body: '一二三四五六七八九十一二三四五六七八九十二十一'
        });
    });

    it('opens and quits applications', (): void => {
        expect(matcher.match('打开微信').slots).toEqual({ app: '微信', action: 'open' });
        expect(matcher.match('关闭微信').slots).toEqual({ app: '微信', action: 'quit' });
        expect(matcher.match('open safari').slots).toEqual({ app: 'safari', action: 'open' });
        expect(matcher.match('关闭微信').spokenAcknowledgement).toBe('好的，关闭微信');
    });

    it('reads brightness digits without a percent sign', (): void => {
        const intent: Intent = matcher.match('把亮度调到80');

        expect(intent.slots).toEqual({ setting: 'brightness', value: 80 });
        expect(intent.spokenAcknowledgement).toBe('好的，把亮度调到80%');
    });

    it('maps music controls', (): void => {
        expect(matcher.match('暂停音乐').slots).toEqual({ action: 'pause' });
        expect(matcher.match('暂停音乐').spokenAcknowledgement).toBe('好的，暂停播放');
        expect(matcher.match('播放下一首').slots).toEqual({ action: 'next' });
    });

    it('asks for clarification when nothing matches', (): void => {
        expect(matcher.match('今天天气怎么样')).toEqual({
            name: 'clarify',
            slots: {},
            requiresConfirmation: true,
            spokenAcknowledgement: ACK_NO_MATCH,
            safety: { risk: 'low', reason: REASON_NO_MATCH }
        });
    });

    it('does not flag words that merely contain a dangerous keyword', (): void => {
        expect(matcher.dangerous_detect('more information please')).toBe(false);
        expect(matcher.match('more information please').safety.risk).toBe('low');
    });

    it('detects dangerous keywords case-insensitively', (): void => {
        expect(matcher.dangerous_detect('Please DELETE my files')).toBe(true);
        expect(matcher.dangerous_detect('关闭无线网络')).toBe(true);
    });
});

describe('RuleMatcher properties', (): void => {
    const dangerous = fc.constantFrom('删除', '清空', '格式化', '断网', '关机', '卸载', 'delete', 'wipe', 'format', 'shutdown');

    it('any text containing a dangerous keyword yields a guarded high-risk clarify', (): void => {
        fc.assert(
            fc.property(fc.string(), dangerous, fc.string(), (before: string, keyword: string, after: string): void => {
                const intent: Intent = matcher.match(`${before} ${keyword} ${after}`);

                expect(intent.name).toBe('clarify');
                expect(intent.requiresConfirmation).toBe(true);
                expect(intent.safety.risk).toBe('high');
            })
        );
    });

    it('is deterministic', (): void => {
        fc.assert(
            fc.property(fc.string(), (text: string): void => {
                expect(matcher.match(text)).toEqual(matcher.match(text));
            })
        );
    });
});
