import { describe, expect, it } from 'vitest';
import { Verbalizer } from './Verbalizer.js';
import { StepState, type SequenceReport } from './types.js';
import { intent_create, plan_create } from '../command/schemas.js';
import type { ExecutionResult, Intent } from '../command/types.js';

const verbalizer: Verbalizer = new Verbalizer();

describe('Verbalizer', (): void => {
    it('prefers the spoken acknowledgement', (): void => {
        const intent: Intent = intent_create('play_music', { action: 'play' }, { spokenAcknowledgement: '好的，播放音乐' });

        expect(verbalizer.confirmation_generate(intent)).toBe('好的，播放音乐');
    });

    it('phrases a confirmation from slots when there is no acknowledgement', (): void => {
        expect(verbalizer.confirmation_generate(intent_create('web_search', { query: 'cats' }))).toBe('好的，帮您搜索cats');
        expect(verbalizer.confirmation_generate(intent_create('write_note', {}))).toBe('好的，正在创建笔记：笔记');
        expect(verbalizer.confirmation_generate(intent_create('control_app', { app: 'Safari' }))).toBe('好的，打开Safari');
    });

    it('phrases results', (): void => {
        const note: Intent = intent_create('write_note', { title: 't' });
        const ok: ExecutionResult = { succeeded: true, message: 'Note created: t', output: '', error: '' };
        const failed: ExecutionResult = { succeeded: false, message: 'No query provided', output: '', error: 'Missing query parameter' };

        expect(verbalizer.result_generate(note, ok)).toBe('笔记已创建');
        expect(verbalizer.result_generate(note, failed)).toBe('抱歉，操作失败了：Missing query parameter');
    });

    it('describes a dry run with the slot payload', (): void => {
        expect(verbalizer.dryRun_describe(intent_create('system_setting', { setting: 'volume', value: 50 })))
            .toBe('[DRY RUN] 将执行：system_setting，参数：{"setting":"volume","value":50}');
    });

    it('outlines a plan', (): void => {
        const plan = plan_create([
            intent_create('control_app', { app: '微信', action: 'open' }, { spokenAcknowledgement: '好的，打开微信' }),
            intent_create('web_search', { query: 'cats' })
        ]);

        expect(verbalizer.plan_describe(plan)).toBe('执行2个任务（共2步）\n1. 好的，打开微信\n2. 好的，帮您搜索cats');
    });

    it('summarizes a halted report with the failing step', (): void => {
        const intent: Intent = intent_create('control_app', {});
        const failed: ExecutionResult = { succeeded: false, message: 'No app specified', output: '', error: 'Missing app parameter' };
        const report: SequenceReport = {
            status: 'halted',
            results: [failed],
            steps: [{ index: 0, intent, state: StepState.Aborted, result: failed }],
            failedStep: 1,
            reason: 'Missing app parameter'
        };

        expect(verbalizer.report_summarize(report)).toBe('第1步失败：Missing app parameter，已停止后续步骤');
    });
});
