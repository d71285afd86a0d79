/**
 * @file Simulated Actuator
 *
 * Stand-in for OS automation. Validates the parameters each intent needs
 * and reports the action it would perform, without touching the system.
 *
 * @module execution/SimulatedActuator
 */

import type {
    ControlAppSlots,
    ExecutionResult,
    Intent,
    PlayMusicSlots,
    SystemSettingSlots,
    WriteNoteSlots
} from '../command/types.js';
import type { TelemetryHooks } from '../telemetry/types.js';
import type { Actuator } from './types.js';

const SEARCH_URL: string = 'https://www.google.com/search?q=';
const MUSIC_ACTIONS: ReadonlySet<string> = new Set(['play', 'pause', 'next', 'previous']);

function result_ok(message: string, output: string = message): ExecutionResult {
    return { succeeded: true, message, output, error: '' };
}

function result_fail(message: string, error: string): ExecutionResult {
    return { succeeded: false, message, output: '', error };
}

export class SimulatedActuator implements Actuator {
    constructor(private readonly hooks: TelemetryHooks = {}) {}

    async execute(intent: Intent): Promise<ExecutionResult> {
        this.hooks.log_emit?.(`Executing intent: ${intent.name}`);

        switch (intent.name) {
            case 'system_setting': return this.systemSetting_apply(intent.slots);
            case 'play_music':     return this.music_control(intent.slots);
            case 'web_search':     return this.search_open(intent.slots.query);
            case 'write_note':     return this.note_create(intent.slots);
            case 'control_app':    return this.app_control(intent.slots);
            case 'clarify':        return result_ok('Clarification needed', intent.spokenAcknowledgement);
        }
    }

    private systemSetting_apply(slots: Readonly<SystemSettingSlots>): ExecutionResult {
        switch (slots.setting) {
            case 'volume':
                return result_ok(`Volume set to ${slots.value ?? 50}%`);
            case 'brightness':
                return result_ok(`Brightness set to ${slots.value ?? 50}%`);
            case 'mute':
                return result_ok('Output muted');
            case 'screenshot':
                return result_ok('Screenshot captured');
            default:
                return result_fail(`Unknown setting: ${slots.setting ?? '(none)'}`, 'Setting not implemented');
        }
    }

    private music_control(slots: Readonly<PlayMusicSlots>): ExecutionResult {
        const action: string = slots.action ?? 'play';
        if (!MUSIC_ACTIONS.has(action)) {
            return result_fail(`Unknown music action: ${action}`, 'Action not supported');
        }
        return result_ok(`Music ${action} executed`);
    }

    private search_open(query: string): ExecutionResult {
        if (!query.trim()) {
            return result_fail('No query provided', 'Missing query parameter');
        }
        return result_ok(`Opened search for: ${query}`, SEARCH_URL + encodeURIComponent(query));
    }

    private note_create(slots: Readonly<WriteNoteSlots>): ExecutionResult {
        const title: string = slots.title ?? 'Quick Note';
        return result_ok(`Note created: ${title}`, slots.body ?? '');
    }

    private app_control(slots: Readonly<ControlAppSlots>): ExecutionResult {
        const app: string = slots.app ?? '';
        if (!app) {
            return result_fail('No app specified', 'Missing app parameter');
        }

        const action: string = slots.action ?? 'open';
        if (action === 'open' || action === 'open_url') {
            return slots.url
                ? result_ok(`Opened ${slots.url} in ${app}`)
                : result_ok(`Opened ${app}`);
        }
        if (action === 'quit') {
            return result_ok(`Quit ${app}`);
        }
        return result_fail(`Unknown action: ${action}`, 'Action not implemented');
    }
}
