import { beforeAll, describe, expect, it, vi, type Mock } from 'vitest';
import chalk from 'chalk';
import { answer_isYes, utterance_handle, type UtteranceIO } from './Repl.js';
import { SettingsService } from '../config/settings.js';
import { voxplan_assemble, type VoxPlanServiceBag } from '../VoxPlanFactory.js';
import { ACK_NO_MATCH } from '../routing/RuleMatcher.js';

type ConfirmFn = (prompt: string, signal?: AbortSignal) => Promise<boolean>;

function io_create(answer: boolean): { io: UtteranceIO; lines: string[]; confirm: Mock<ConfirmFn> } {
    const lines: string[] = [];
    const confirm = vi.fn<ConfirmFn>().mockResolvedValue(answer);
    return {
        io: { confirm, write: (line: string): void => { lines.push(line); } },
        lines,
        confirm
    };
}

describe('utterance_handle', (): void => {
    let bag: VoxPlanServiceBag;

    beforeAll((): void => {
        chalk.level = 0;
        bag = voxplan_assemble(new SettingsService({}).snapshot(), { noLlm: true });
    });

    it('resolves and executes a single request', async (): Promise<void> => {
        const { io, lines, confirm } = io_create(true);

        expect(await utterance_handle(bag, '把音量调到50%', io, { dryRun: false })).toBe('continue');

        expect(lines).toEqual([
            '[rules] system_setting {"setting":"volume","value":50} risk=low',
            '○ 1. Volume set to 50%',
            '● 设置已完成'
        ]);
        expect(confirm).not.toHaveBeenCalled();
    });

    it('previews a split plan in dry mode', async (): Promise<void> => {
        const { io, lines } = io_create(true);

        await utterance_handle(bag, '打开微信然后把音量调到30%', io, { dryRun: true });

        expect(lines).toEqual([
            '[splitter] 执行2个任务\n' +
            '  1. control_app {"app":"微信","action":"open"} risk=low\n' +
            '  2. system_setting {"setting":"volume","value":30} risk=low',
            '○ 1. [DRY RUN] 将执行：control_app，参数：{"app":"微信","action":"open"}',
            '○ 2. [DRY RUN] 将执行：system_setting，参数：{"setting":"volume","value":30}',
            '● [DRY RUN] 预览完成，共2步，未实际执行'
        ]);
    });

    it('previews a single request in dry mode without claiming it ran', async (): Promise<void> => {
        const { io, lines, confirm } = io_create(true);

        await utterance_handle(bag, '把音量调到50%', io, { dryRun: true });

        expect(lines).toEqual([
            '[rules] system_setting {"setting":"volume","value":50} risk=low',
            '○ 1. [DRY RUN] 将执行：system_setting，参数：{"setting":"volume","value":50}',
            '● [DRY RUN] 预览完成，共1步，未实际执行'
        ]);
        expect(confirm).not.toHaveBeenCalled();
    });

    it('asks before a dangerous request and honours a refusal', async (): Promise<void> => {
        const { io, lines, confirm } = io_create(false);

        await utterance_handle(bag, '删除所有文件', io, { dryRun: false });

        expect(confirm).toHaveBeenCalledTimes(1);
        expect(confirm.mock.calls[0][0]).toBe('您确定要执行「删除所有文件」吗？这可能有风险。');
        expect(lines[lines.length - 1]).toBe('○ 好的，已取消');
    });

    it('repeats the clarification instead of running it', async (): Promise<void> => {
        const { io, lines, confirm } = io_create(true);

        await utterance_handle(bag, '今天天气怎么样', io, { dryRun: false });

        expect(lines[1]).toBe(`○ ${ACK_NO_MATCH}`);
        expect(confirm).not.toHaveBeenCalled();
    });

    it('signals exit on an exit word and ignores blank input', async (): Promise<void> => {
        const { io, lines } = io_create(true);

        expect(await utterance_handle(bag, '再见', io, { dryRun: false })).toBe('exit');
        expect(await utterance_handle(bag, '   ', io, { dryRun: false })).toBe('continue');
        expect(lines).toEqual([]);
    });
});

describe('answer_isYes', (): void => {
    it('accepts only affirmative answers', (): void => {
        expect(['y', 'YES', ' 是 ', '好'].every(answer_isYes)).toBe(true);
        expect(['', 'n', 'no', 'maybe'].some(answer_isYes)).toBe(false);
    });
});
