/**
 * @file CLI argument parsing.
 *
 * @module cli/options
 */

export interface CliOptions {
    /** Single utterance to process, then exit. */
    text?: string;
    dryRun: boolean;
    noLlm: boolean;
    verbose: boolean;
    help: boolean;
    rulesPath?: string;
    promptsDir?: string;
}

export type CliParseResult =
    | { ok: true; options: CliOptions }
    | { ok: false; error: string };

export const EXIT_WORDS: ReadonlySet<string> = new Set(['exit', 'quit', '退出', '拜拜', '再见']);

export const USAGE: string = [
    'Usage: voxplan [options]',
    '',
    '  --text, -t <utterance>   Process one utterance and exit',
    '  --dry-run                Describe actions without executing them',
    '  --no-llm                 Use the rule matcher only',
    '  --rules <file>           Rule table YAML',
    '  --prompts <dir>          Directory holding system.txt and fewshot.jsonl',
    '  --verbose, -v            Print telemetry',
    '  --help, -h               Show this help'
].join('\n');

/**
 * Parse argv (without the node and script entries).
 */
export function cliOptions_parse(args: ReadonlyArray<string>): CliParseResult {
    const options: CliOptions = { dryRun: false, noLlm: false, verbose: false, help: false };

    for (let i: number = 0; i < args.length; i++) {
        const arg: string = args[i];
        switch (arg) {
            case '--dry-run':
                options.dryRun = true;
                break;
            case '--no-llm':
                options.noLlm = true;
                break;
            case '--verbose':
            case '-v':
                options.verbose = true;
                break;
            case '--help':
            case '-h':
                options.help = true;
                break;
            case '--text':
            case '-t':
            case '--rules':
            case '--prompts': {
                const value: string | undefined = args[i + 1];
                if (value === undefined || value.startsWith('--')) {
                    return { ok: false, error: `${arg} requires a value` };
                }
                i++;
                if (arg === '--rules') options.rulesPath = value;
                else if (arg === '--prompts') options.promptsDir = value;
                else options.text = value;
                break;
            }
            default:
                return { ok: false, error: `Unknown option: ${arg}` };
        }
    }

    return { ok: true, options };
}

export function exitWord_is(text: string): boolean {
    return EXIT_WORDS.has(text.trim().toLowerCase());
}

// ─── Replay ──────────────────────────────────────────────────────────────────

export interface ReplayOptions {
    /** Use the generative parser when credentials exist; rules only otherwise. */
    llm: boolean;
    verbose: boolean;
    help: boolean;
    suitePath?: string;
    rulesPath?: string;
}

export type ReplayParseResult =
    | { ok: true; options: ReplayOptions }
    | { ok: false; error: string };

export const REPLAY_USAGE: string = [
    'Usage: voxplan-replay [options]',
    '',
    '  --suite <file>           Replay suite YAML (defaults to eval/replay.yaml)',
    '  --llm                    Resolve with the generative parser',
    '  --rules <file>           Rule table YAML',
    '  --verbose, -v            Print telemetry',
    '  --help, -h               Show this help'
].join('\n');

export function replayOptions_parse(args: ReadonlyArray<string>): ReplayParseResult {
    const options: ReplayOptions = { llm: false, verbose: false, help: false };

    for (let i: number = 0; i < args.length; i++) {
        const arg: string = args[i];
        switch (arg) {
            case '--llm':
                options.llm = true;
                break;
            case '--verbose':
            case '-v':
                options.verbose = true;
                break;
            case '--help':
            case '-h':
                options.help = true;
                break;
            case '--suite':
            case '--rules': {
                const value: string | undefined = args[i + 1];
                if (value === undefined || value.startsWith('--')) {
                    return { ok: false, error: `${arg} requires a value` };
                }
                i++;
                if (arg === '--suite') options.suitePath = value;
                else options.rulesPath = value;
                break;
            }
            default:
                return { ok: false, error: `Unknown option: ${arg}` };
        }
    }

    return { ok: true, options };
}
