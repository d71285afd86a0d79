/**
 * @file JSON-over-HTTP transport shared by the generation clients.
 *
 * @module llm/clients/http
 */

import { GenerationError } from '../types.js';

/**
 * POST a JSON body and return the decoded JSON response.
 *
 * @throws {GenerationError} `timeout` when the deadline passes,
 *   `service_error` for transport failures and non-2xx responses.
 */
export async function json_post(
    url: string,
    headers: Record<string, string>,
    body: unknown,
    timeoutMs: number,
    errorMessage_extract: (payload: unknown) => string | undefined
): Promise<unknown> {
    let response: Response;
    try {
        response = await fetch(url, {
            method: 'POST',
            headers: { ...headers, 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
            signal: AbortSignal.timeout(timeoutMs)
        });
    } catch (error: unknown) {
        if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
            throw new GenerationError('timeout', `request timed out after ${timeoutMs}ms`);
        }
        const reason: string = error instanceof Error ? error.message : String(error);
        throw new GenerationError('service_error', `request failed: ${reason}`);
    }

    const payload: unknown = await response.json().catch((): unknown => null);
    if (!response.ok) {
        const detail: string = errorMessage_extract(payload) ?? response.statusText;
        throw new GenerationError('service_error', `HTTP ${response.status}: ${detail || 'unknown error'}`);
    }
    return payload;
}
