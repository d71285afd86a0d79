/**
 * @file CLI Presenter
 *
 * Terminal formatting for resolution results, confirmations, step
 * transitions and sequence reports.
 *
 * @module cli/Presenter
 */

import chalk from 'chalk';
import { intent_encode } from '../command/schemas.js';
import type { Intent } from '../command/types.js';
import {
    rate_compute,
    replayReport_passed,
    type IntentCaseResult,
    type PlanCaseResult,
    type ReplayReport
} from '../eval/replay.js';
import type { SequenceReport } from '../execution/types.js';
import type { ResolvedCommand } from '../routing/PlanResolver.js';
import type { TelemetryEvent } from '../telemetry/types.js';

/** Intent failures listed before the remainder is collapsed. */
const REPLAY_FAILURES_SHOWN: number = 10;

/**
 * Standard markers for the CLI's visual dialect.
 */
export const MARKERS = {
    AFFIRMATIVE: '●',
    INFO: '○',
    ERROR: '>> ERROR:',
    WARNING: '>> WARNING:',
    HINT: '»'
} as const;

export class Presenter {
    static success_format(message: string): string {
        return chalk.cyan(`${MARKERS.AFFIRMATIVE} ${message}`);
    }

    static info_format(message: string): string {
        return chalk.white(`${MARKERS.INFO} ${message}`);
    }

    static warning_format(message: string): string {
        return chalk.yellow(`${MARKERS.WARNING} ${message}`);
    }

    static error_format(message: string): string {
        return chalk.red(`${MARKERS.ERROR} ${message}`);
    }

    /**
     * Resolution panel: origin, then one line per intent.
     */
    static resolved_format(resolved: ResolvedCommand): string {
        const origin: string = chalk.dim(`[${resolved.origin}]`);
        if (resolved.kind === 'intent') {
            return `${origin} ${this.intent_format(resolved.intent)}`;
        }
        const lines: string[] = resolved.plan.steps.map((step: Intent, index: number): string =>
            `  ${index + 1}. ${this.intent_format(step)}`);
        return [`${origin} ${chalk.bold(resolved.plan.summary)}`, ...lines].join('\n');
    }

    static intent_format(intent: Intent): string {
        const risk: string = intent.safety.risk === 'high'
            ? chalk.red('high')
            : intent.safety.risk === 'medium' ? chalk.yellow('medium') : chalk.green('low');
        const gate: string = intent.requiresConfirmation ? ` ${MARKERS.HINT} confirm` : '';
        return `${chalk.bold(intent.name)} ${JSON.stringify(intent_encode(intent).slots)} risk=${risk}${gate}`;
    }

    static report_format(report: SequenceReport, summary: string): string {
        switch (report.status) {
            case 'completed': return this.success_format(summary);
            case 'halted':    return this.error_format(summary);
            case 'declined':  return this.info_format(summary);
            case 'cancelled': return this.warning_format(summary);
        }
    }

    /**
     * Replay scoreboard: accuracy lines, the first failures, plan results
     * and a closing verdict.
     */
    static replay_format(report: ReplayReport): string[] {
        const { intents, plans } = report;
        const lines: string[] = [];

        if (intents.total > 0) {
            lines.push(chalk.bold('Intent cases'));
            lines.push(`  Intent accuracy:  ${this.ratio_format(intents.intentCorrect, intents.total)}`);
            lines.push(`  Slot accuracy:    ${this.ratio_format(intents.slotsCorrect, intents.total)}`);
            lines.push(`  Overall accuracy: ${this.ratio_format(intents.bothCorrect, intents.total)}`);

            const failures: IntentCaseResult[] = intents.results
                .filter((result: IntentCaseResult): boolean => !result.intentMatch || !result.slots.match);
            for (const failure of failures.slice(0, REPLAY_FAILURES_SHOWN)) {
                lines.push(this.error_format(`#${failure.index} ${failure.utterance}: ${this.issue_describe(failure)}`));
            }
            if (failures.length > REPLAY_FAILURES_SHOWN) {
                lines.push(chalk.dim(`  ... and ${failures.length - REPLAY_FAILURES_SHOWN} more`));
            }
        }

        if (plans.total > 0) {
            lines.push(chalk.bold('Plan cases'));
            for (const result of plans.results) {
                lines.push(this.planCase_format(result));
            }
            lines.push(`  Pass rate: ${this.ratio_format(plans.passed, plans.total)}`);
        }

        lines.push(replayReport_passed(report)
            ? this.success_format('Replay passed')
            : this.warning_format('Replay below threshold'));
        return lines;
    }

    static ratio_format(count: number, total: number): string {
        return `${count}/${total} (${(rate_compute(count, total) * 100).toFixed(1)}%)`;
    }

    private static issue_describe(failure: IntentCaseResult): string {
        const issues: string[] = [];
        if (!failure.intentMatch) {
            issues.push(`intent ${failure.expectedIntent} ≠ ${failure.predictedIntent}`);
        }
        if (!failure.slots.match) {
            issues.push(failure.slots.reason);
        }
        return issues.join('; ');
    }

    private static planCase_format(result: PlanCaseResult): string {
        const detail: string = `${result.utterance} (${result.actualType} ${result.actualSteps}/${result.expectedSteps} steps)`;
        return result.passed
            ? this.success_format(`PASS ${detail}`)
            : this.error_format(`FAIL ${detail}, expected ${result.expectedType}`);
    }

    static event_format(event: TelemetryEvent): string {
        switch (event.type) {
            case 'log':    return chalk.dim(`  ${event.message}`);
            case 'status': return chalk.dim(`  ${MARKERS.HINT} ${event.message}`);
            case 'step':   return chalk.dim(`  step ${event.index + 1} (${event.intent}) → ${event.state}`);
        }
    }
}
