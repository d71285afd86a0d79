/**
 * @file Model Payload Extraction
 *
 * Recovers a JSON object from free model text. Models wrap output in
 * markdown fences or add prose despite instructions, so extraction takes
 * the widest span from the first `{` to the last `}`.
 *
 * @module llm/payload
 */

export interface PayloadParsed {
    ok: true;
    value: unknown;
}

export interface PayloadUnparsable {
    ok: false;
    error: string;
}

export type PayloadParseResult = PayloadParsed | PayloadUnparsable;

/**
 * Remove markdown code fence lines when the response opens with a fence.
 *
 * @param text - Raw model output text.
 * @returns Text without fence markers.
 */
export function fences_strip(text: string): string {
    const trimmed: string = text.trim();
    if (!trimmed.startsWith('```')) {
        return trimmed;
    }
    return trimmed
        .split('\n')
        .filter((line: string): boolean => !line.trim().startsWith('```'))
        .join('\n');
}

/**
 * Parse model text and extract the widest JSON object span.
 *
 * @param text - Raw model output text.
 * @returns Parsed value, or the reason nothing could be parsed.
 */
export function payload_parseFromModelText(text: string): PayloadParseResult {
    const body: string = fences_strip(text);
    const start: number = body.indexOf('{');
    const end: number = body.lastIndexOf('}');

    if (start < 0 || end <= start) {
        return { ok: false, error: 'no JSON object found in model output' };
    }

    try {
        return { ok: true, value: JSON.parse(body.slice(start, end + 1)) };
    } catch (e: unknown) {
        const reason: string = e instanceof Error ? e.message : String(e);
        return { ok: false, error: `JSON parse failed: ${reason}` };
    }
}
