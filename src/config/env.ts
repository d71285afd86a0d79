/**
 * @file .env Loader
 *
 * Hydrates the environment from a `KEY=value` file before settings are
 * resolved. Blank lines and `#` comments are skipped, surrounding quotes
 * are stripped, and variables already set are never overwritten.
 *
 * @module config/env
 */

import fs from 'fs';
import path from 'path';

type Env = Record<string, string | undefined>;

export interface EnvFileLoadResult {
    filePath: string;
    /** Keys that were set from the file, in file order. */
    loaded: string[];
}

/**
 * Load a `.env` file into `env`.
 *
 * @param filePath - Defaults to `.env` in the working directory.
 * @param env - Target environment; defaults to `process.env`.
 * @returns What was loaded, or null when the file does not exist.
 */
export function envFile_load(
    filePath: string = path.join(process.cwd(), '.env'),
    env: Env = process.env
): EnvFileLoadResult | null {
    if (!fs.existsSync(filePath)) {
        return null;
    }

    const loaded: string[] = [];
    const content: string = fs.readFileSync(filePath, 'utf-8');
    for (const line of content.split(/\r?\n/)) {
        const entry: [string, string] | null = envLine_parse(line);
        if (!entry) continue;
        const [key, value] = entry;
        if (env[key]) continue;
        env[key] = value;
        loaded.push(key);
    }
    return { filePath, loaded };
}

/**
 * Parse one `KEY=value` line. `export ` prefixes are accepted.
 */
export function envLine_parse(line: string): [string, string] | null {
    const trimmed: string = line.trim();
    if (!trimmed || trimmed.startsWith('#') || !trimmed.includes('=')) {
        return null;
    }

    const separator: number = trimmed.indexOf('=');
    const key: string = trimmed.slice(0, separator).replace(/^export\s+/, '').trim();
    if (!key) {
        return null;
    }
    const value: string = trimmed.slice(separator + 1).trim().replace(/^["']|["']$/g, '');
    return [key, value];
}
