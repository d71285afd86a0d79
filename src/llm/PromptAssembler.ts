/**
 * @file Prompt Assembler
 *
 * Builds the system instructions and the user message for one generation
 * call: few-shot examples followed by the utterance. Templates are read
 * once at construction; an assembler can be shared across requests.
 *
 * @module llm/PromptAssembler
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { TelemetryHooks } from '../telemetry/types.js';

export interface AssembledPrompt {
    system: string;
    user: string;
}

export interface FewShotExample {
    user: string;
    assistant: unknown;
}

const FewShotLineSchema = z.object({
    user:      z.string(),
    assistant: z.unknown()
});

export const SYSTEM_PROMPT_FILE: string = 'system.txt';
export const FEWSHOT_FILE: string = 'fewshot.jsonl';

export const DEFAULT_SYSTEM_PROMPT: string = `You are a Command Planner for a desktop voice assistant.

Your ONLY job is to output valid JSON. For a single task use:
{
  "intent": "system_setting|play_music|web_search|write_note|control_app|clarify",
  "slots": {},
  "confirm": false,
  "speak_back": "",
  "safety": {"risk": "low|medium|high", "reason": ""}
}

For a request containing several tasks use:
{"steps": [<intent>, <intent>, ...], "summary": ""}

Rules:
1. Output ONLY minified JSON, no markdown, no prose, no explanations
2. If user request is unsafe/ambiguous → intent="clarify", confirm=true, brief speak_back
3. For dangerous operations (delete/format/shutdown) → safety.risk="high"
4. speak_back should be brief (< 20 words) in user's language
5. slots contain extracted parameters as key-value pairs`;

/** Directory of the prompt files shipped with the package. */
export function promptsDefault_dir(): string {
    return fileURLToPath(new URL('../../prompts', import.meta.url));
}

export class PromptAssembler {
    private readonly system: string;
    private readonly examples: ReadonlyArray<FewShotExample>;
    private readonly examplesBlock: string;

    constructor(
        promptsDir: string = promptsDefault_dir(),
        private readonly hooks: TelemetryHooks = {}
    ) {
        this.system = this.system_load(promptsDir);
        this.examples = this.fewShot_load(promptsDir);
        this.examplesBlock = this.examples_format(this.examples);
    }

    /**
     * First-attempt prompt for an utterance.
     */
    public prompt_assemble(text: string): AssembledPrompt {
        return {
            system: this.system,
            user: `${this.examplesBlock}\n\nNow parse this user request:\nUser: ${text}\n\nOutput only JSON:`
        };
    }

    /**
     * Follow-up prompt after the model produced unusable output.
     */
    public prompt_correct(text: string): AssembledPrompt {
        return {
            system: this.system,
            user: `The previous output was invalid. Please output ONLY valid JSON matching the schema. User request: ${text}`
        };
    }

    public examples_get(): ReadonlyArray<FewShotExample> {
        return this.examples;
    }

    // ─── Loading ─────────────────────────────────────────────────────────────

    private system_load(promptsDir: string): string {
        const filePath: string = path.join(promptsDir, SYSTEM_PROMPT_FILE);
        if (!fs.existsSync(filePath)) {
            return DEFAULT_SYSTEM_PROMPT;
        }
        const text: string = fs.readFileSync(filePath, 'utf-8').trim();
        return text.length > 0 ? text : DEFAULT_SYSTEM_PROMPT;
    }

    /**
     * One `{"user", "assistant"}` object per line. Any bad line discards
     * the whole store.
     */
    private fewShot_load(promptsDir: string): FewShotExample[] {
        const filePath: string = path.join(promptsDir, FEWSHOT_FILE);
        if (!fs.existsSync(filePath)) {
            return [];
        }

        try {
            const lines: string[] = fs.readFileSync(filePath, 'utf-8')
                .split('\n')
                .map((line: string): string => line.trim())
                .filter((line: string): boolean => line.length > 0);

            return lines.map((line: string, index: number): FewShotExample => {
                const parsed = FewShotLineSchema.safeParse(JSON.parse(line));
                if (!parsed.success) {
                    throw new Error(`line ${index + 1}: expected {"user", "assistant"}`);
                }
                return { user: parsed.data.user, assistant: parsed.data.assistant };
            });
        } catch (e: unknown) {
            const reason: string = e instanceof Error ? e.message : String(e);
            this.hooks.log_emit?.(`Failed to load few-shot examples from ${filePath}: ${reason}`);
            return [];
        }
    }

    private examples_format(examples: ReadonlyArray<FewShotExample>): string {
        if (examples.length === 0) {
            return '';
        }
        const body: string = examples
            .map((example: FewShotExample): string =>
                `\nUser: ${example.user}\nAssistant: ${JSON.stringify(example.assistant ?? {})}\n`)
            .join('');
        return `\n\nExamples:\n${body}`;
    }
}
