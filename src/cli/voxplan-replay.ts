#!/usr/bin/env node
/**
 * @file VoxPlan Replay Entry Point
 *
 * Scores the resolver against a labelled suite. Rules only unless `--llm`
 * is given; nothing is executed. Exits 1 when the suite is below threshold.
 *
 * Usage:
 *   npm run replay
 *   npm run replay -- --suite my-cases.yaml --llm
 *
 * @module cli/voxplan-replay
 */

import { envFile_load, type EnvFileLoadResult } from '../config/env.js';
import { SettingsService, type ResolvedSettings, type SettingsOverrides } from '../config/settings.js';
import { replay_run, replayReport_passed, replaySuite_load, type ReplayReport, type ReplaySuite } from '../eval/replay.js';
import { TelemetryBus } from '../telemetry/TelemetryBus.js';
import type { TelemetryEvent } from '../telemetry/types.js';
import { voxplan_assemble, type VoxPlanServiceBag } from '../VoxPlanFactory.js';
import { REPLAY_USAGE, replayOptions_parse, type ReplayParseResult } from './options.js';
import { Presenter } from './Presenter.js';

async function main(): Promise<number> {
    const parsed: ReplayParseResult = replayOptions_parse(process.argv.slice(2));
    if (!parsed.ok) {
        console.error(Presenter.error_format(parsed.error));
        console.error(REPLAY_USAGE);
        return 2;
    }
    const options = parsed.options;
    if (options.help) {
        console.log(REPLAY_USAGE);
        return 0;
    }

    const envFile: EnvFileLoadResult | null = envFile_load();
    const overrides: SettingsOverrides = {};
    if (options.verbose) overrides.verbose = true;
    if (options.rulesPath) overrides.rulesPath = options.rulesPath;
    const settings: ResolvedSettings = new SettingsService(process.env, overrides).snapshot();

    const bus: TelemetryBus = new TelemetryBus();
    if (settings.verbose) {
        bus.subscribe((event: TelemetryEvent): void => console.log(Presenter.event_format(event)));
    }
    if (envFile) {
        bus.emit({ type: 'log', message: `Loaded ${envFile.loaded.length} variable(s) from ${envFile.filePath}` });
    }

    const suite: ReplaySuite = replaySuite_load(options.suitePath);
    const bag: VoxPlanServiceBag = voxplan_assemble(settings, { noLlm: !options.llm, hooks: bus.hooks_create() });
    if (options.llm && !bag.parser) {
        console.error(Presenter.error_format('No API key configured; --llm needs one.'));
        return 2;
    }

    console.log(Presenter.info_format(
        `Replaying ${suite.intents.length} intent case(s) and ${suite.plans.length} plan case(s) | ` +
        `Parser: ${bag.parser ? `${settings.provider}/${settings.model}` : 'rules'}`
    ));

    const report: ReplayReport = await replay_run(bag.resolver, suite, bus.hooks_create());
    for (const line of Presenter.replay_format(report)) {
        console.log(line);
    }
    return replayReport_passed(report) ? 0 : 1;
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
