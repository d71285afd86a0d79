#!/usr/bin/env node
/**
 * @file VoxPlan CLI Entry Point
 *
 * Thin entry point: parse arguments, load `.env`, resolve settings, wire the pipeline,
 * then either process one `--text` utterance or start the REPL.
 *
 * Usage:
 *   npm start -- --text "把音量调到50%" --dry-run
 *   npm start -- --no-llm
 *
 * @module cli/voxplan-cli
 */

import * as readline from 'readline/promises';
import { envFile_load, type EnvFileLoadResult } from '../config/env.js';
import { SettingsService, type ResolvedSettings, type SettingsOverrides } from '../config/settings.js';
import { TelemetryBus } from '../telemetry/TelemetryBus.js';
import type { TelemetryEvent } from '../telemetry/types.js';
import { voxplan_assemble, type VoxPlanServiceBag } from '../VoxPlanFactory.js';
import { cliOptions_parse, USAGE, type CliParseResult } from './options.js';
import { Presenter } from './Presenter.js';
import { readlineConfirm_create, repl_start, utterance_handle } from './Repl.js';

async function main(): Promise<number> {
    const parsed: CliParseResult = cliOptions_parse(process.argv.slice(2));
    if (!parsed.ok) {
        console.error(Presenter.error_format(parsed.error));
        console.error(USAGE);
        return 2;
    }
    const options = parsed.options;
    if (options.help) {
        console.log(USAGE);
        return 0;
    }

    const overrides: SettingsOverrides = {};
    if (options.verbose) overrides.verbose = true;
    if (options.rulesPath) overrides.rulesPath = options.rulesPath;
    if (options.promptsDir) overrides.promptsDir = options.promptsDir;

    const envFile: EnvFileLoadResult | null = envFile_load();
    const settingsService: SettingsService = new SettingsService(process.env, overrides);
    const settings: ResolvedSettings = settingsService.snapshot();

    const bus: TelemetryBus = new TelemetryBus();
    if (settings.verbose) {
        bus.subscribe((event: TelemetryEvent): void => console.log(Presenter.event_format(event)));
    }
    if (envFile) {
        bus.emit({ type: 'log', message: `Loaded ${envFile.loaded.length} variable(s) from ${envFile.filePath}` });
    }

    if (!options.noLlm && !settingsService.credentials_present()) {
        console.log(Presenter.warning_format('No API key configured; using the rule matcher only.'));
    }

    const bag: VoxPlanServiceBag = voxplan_assemble(settings, { noLlm: options.noLlm, hooks: bus.hooks_create() });
    console.log(Presenter.info_format(
        `Mode: ${options.dryRun ? 'DRY RUN' : 'EXECUTE'} | Parser: ${bag.parser ? `${settings.provider}/${settings.model}` : 'rules'}`
    ));

    if (options.text !== undefined) {
        const rl: readline.Interface = readline.createInterface({ input: process.stdin, output: process.stdout });
        const controller: AbortController = new AbortController();
        rl.on('SIGINT', (): void => controller.abort());
        try {
            await utterance_handle(bag, options.text, {
                confirm: readlineConfirm_create(rl),
                write: (line: string): void => console.log(line)
            }, { dryRun: options.dryRun, signal: controller.signal });
        } finally {
            rl.close();
        }
        return 0;
    }

    await repl_start(bag, { dryRun: options.dryRun });
    return 0;
}

main().then(
    (code: number): void => {
        process.exitCode = code;
    },
    (e: unknown): void => {
        console.error(Presenter.error_format(`Fatal error: ${e instanceof Error ? e.message : String(e)}`));
        process.exitCode = 1;
    }
);
