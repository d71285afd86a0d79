/**
 * @file VoxPlan REPL
 *
 * Interactive readline loop plus the per-utterance handler shared with
 * the single-shot `--text` mode. Ctrl-C while an utterance is running
 * cancels that run; at the prompt it closes the loop.
 *
 * @module cli/Repl
 */

import * as readline from 'readline/promises';
import type { Intent, Plan } from '../command/types.js';
import type { ConfirmCallback, SequenceReport } from '../execution/types.js';
import type { ResolvedCommand } from '../routing/PlanResolver.js';
import type { VoxPlanServiceBag } from '../VoxPlanFactory.js';
import { exitWord_is } from './options.js';
import { Presenter } from './Presenter.js';

export interface UtteranceIO {
    confirm: ConfirmCallback;
    write: (line: string) => void;
}

export interface UtteranceOptions {
    dryRun: boolean;
    signal?: AbortSignal;
}

export type UtteranceOutcome = 'continue' | 'exit';

/**
 * Resolve and run one utterance. Never rejects: unexpected errors are
 * written out and the loop continues.
 */
export async function utterance_handle(
    bag: VoxPlanServiceBag,
    text: string,
    io: UtteranceIO,
    options: UtteranceOptions
): Promise<UtteranceOutcome> {
    const trimmed: string = text.trim();
    if (!trimmed) return 'continue';
    if (exitWord_is(trimmed)) return 'exit';

    try {
        const resolved: ResolvedCommand = await bag.resolver.resolve(trimmed);
        io.write(Presenter.resolved_format(resolved));

        const clarify: Intent | null = clarify_unguarded(resolved);
        if (clarify) {
            io.write(Presenter.info_format(clarify.spokenAcknowledgement));
            return 'continue';
        }

        const command: Intent | Plan = resolved.kind === 'plan' ? resolved.plan : resolved.intent;
        const report: SequenceReport = await bag.sequencer.run(command, io.confirm, bag.actuator, {
            dryRun: options.dryRun,
            signal: options.signal
        });

        for (const record of report.steps) {
            if (record.result) {
                io.write(Presenter.info_format(`${record.index + 1}. ${record.result.message}`));
            }
        }
        io.write(Presenter.report_format(report, bag.verbalizer.report_summarize(report)));
    } catch (error: unknown) {
        const reason: string = error instanceof Error ? error.message : String(error);
        io.write(Presenter.error_format(reason));
    }
    return 'continue';
}

/**
 * A clarify that carries no risk is a re-ask, not something to run.
 */
function clarify_unguarded(resolved: ResolvedCommand): Intent | null {
    if (resolved.kind !== 'intent' || resolved.intent.name !== 'clarify') return null;
    return resolved.intent.safety.risk === 'high' ? null : resolved.intent;
}

/**
 * Confirmation through a readline question. Anything but y/yes/是/好 is no.
 */
export function readlineConfirm_create(rl: readline.Interface): ConfirmCallback {
    return async (prompt: string, signal?: AbortSignal): Promise<boolean> => {
        const answer: string = await rl.question(`${prompt} [y/N] `, signal ? { signal } : {});
        return answer_isYes(answer);
    };
}

export function answer_isYes(answer: string): boolean {
    return /^(?:y|yes|是|好|确认)$/i.test(answer.trim());
}

/**
 * Run the interactive loop until an exit word, EOF or Ctrl-C at the prompt.
 */
export async function repl_start(bag: VoxPlanServiceBag, options: UtteranceOptions): Promise<void> {
    const rl: readline.Interface = readline.createInterface({ input: process.stdin, output: process.stdout });
    const write = (line: string): void => console.log(line);
    let running: AbortController | null = null;
    let closed: boolean = false;

    rl.on('SIGINT', (): void => {
        if (running) {
            running.abort();
            return;
        }
        rl.close();
    });
    rl.on('close', (): void => {
        closed = true;
    });

    write(Presenter.success_format(`Ready${options.dryRun ? ' (dry run)' : ''}. Type 'exit' to quit.`));
    const confirm: ConfirmCallback = readlineConfirm_create(rl);

    while (!closed) {
        let line: string;
        try {
            line = await rl.question('> ');
        } catch (error: unknown) {
            if (closed) break;
            throw error;
        }

        running = new AbortController();
        const outcome: UtteranceOutcome = await utterance_handle(bag, line, { confirm, write }, {
            dryRun: options.dryRun,
            signal: running.signal
        });
        running = null;
        if (outcome === 'exit') break;
    }

    if (!closed) rl.close();
    write(Presenter.info_format('再见'));
}
