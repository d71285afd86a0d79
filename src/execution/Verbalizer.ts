/**
 * @file Verbalizer
 *
 * Spoken-language phrasing for confirmations, results and previews.
 * Output is plain text suitable for a text-to-speech collaborator.
 *
 * @module execution/Verbalizer
 */

import type { ExecutionResult, Intent, Plan } from '../command/types.js';
import type { SequenceReport } from './types.js';

export class Verbalizer {
    /**
     * Phrase spoken before executing an intent. Prefers the intent's own
     * acknowledgement.
     */
    public confirmation_generate(intent: Intent): string {
        if (intent.spokenAcknowledgement) {
            return intent.spokenAcknowledgement;
        }

        switch (intent.name) {
            case 'system_setting':
                return `好的，正在调整${intent.slots.setting ?? '设置'}到${intent.slots.value ?? ''}`;
            case 'play_music':
                return `好的，${intent.slots.action ?? '播放'}${intent.slots.query ?? '音乐'}`;
            case 'web_search':
                return `好的，帮您搜索${intent.slots.query}`;
            case 'write_note':
                return `好的，正在创建笔记：${intent.slots.title ?? '笔记'}`;
            case 'control_app':
                return `好的，${intent.slots.action ?? '打开'}${intent.slots.app ?? '应用'}`;
            case 'clarify':
                return '抱歉，我没理解您的意思';
        }
    }

    public result_generate(intent: Intent, result: ExecutionResult): string {
        if (!result.succeeded) {
            return `抱歉，操作失败了：${result.error || result.message}`;
        }

        switch (intent.name) {
            case 'system_setting': return '设置已完成';
            case 'play_music':     return '已为您播放';
            case 'web_search':     return '已打开搜索结果';
            case 'write_note':     return '笔记已创建';
            case 'control_app':    return '操作已完成';
            default:               return '操作成功';
        }
    }

    public dryRun_describe(intent: Intent): string {
        return `[DRY RUN] 将执行：${intent.name}，参数：${JSON.stringify(intent.slots)}`;
    }

    /**
     * Numbered outline of a plan, used for the plan-level confirmation.
     */
    public plan_describe(plan: Plan): string {
        const lines: string[] = plan.steps.map((step: Intent, index: number): string =>
            `${index + 1}. ${this.confirmation_generate(step)}`);
        return [`${plan.summary}（共${plan.steps.length}步）`, ...lines].join('\n');
    }

    /**
     * Closing line for a run. A dry run is summarized as a preview and
     * never as a finished action.
     */
    public report_summarize(report: SequenceReport): string {
        switch (report.status) {
            case 'completed':
                if (report.dryRun) {
                    return `[DRY RUN] 预览完成，共${report.steps.length}步，未实际执行`;
                }
                return report.steps.length === 1
                    ? this.result_generate(report.steps[0].intent, report.results[0])
                    : `全部${report.steps.length}个步骤已完成`;
            case 'halted':
                return `第${report.failedStep ?? report.results.length}步失败：${report.reason}，已停止后续步骤`;
            case 'declined':
                return '好的，已取消';
            case 'cancelled':
                return '操作已中断';
        }
    }
}
