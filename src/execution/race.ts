/**
 * @file Promise racing against a deadline and an abort signal.
 *
 * @module execution/race
 */

export type RaceOutcome<T> =
    | { kind: 'value'; value: T }
    | { kind: 'timeout' }
    | { kind: 'aborted' };

/**
 * Settle with whichever comes first: the work, the deadline, the abort.
 * `work` is not started when the signal is already aborted. A rejection
 * of the work propagates. `timeoutMs` of undefined means no deadline.
 * Timers and listeners are released on every path.
 */
export function outcome_race<T>(
    work_start: () => Promise<T>,
    timeoutMs: number | undefined,
    signal: AbortSignal | undefined
): Promise<RaceOutcome<T>> {
    if (signal?.aborted) {
        return Promise.resolve({ kind: 'aborted' });
    }

    return new Promise<RaceOutcome<T>>((resolve, reject): void => {
        let timer: ReturnType<typeof setTimeout> | undefined;

        const onAbort = (): void => {
            cleanup();
            resolve({ kind: 'aborted' });
        };
        const cleanup = (): void => {
            if (timer !== undefined) clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        };

        if (timeoutMs !== undefined) {
            timer = setTimeout((): void => {
                cleanup();
                resolve({ kind: 'timeout' });
            }, timeoutMs);
        }
        signal?.addEventListener('abort', onAbort, { once: true });

        let work: Promise<T>;
        try {
            work = work_start();
        } catch (error: unknown) {
            cleanup();
            reject(error);
            return;
        }

        void work.then(
            (value: T): void => {
                cleanup();
                resolve({ kind: 'value', value });
            },
            (error: unknown): void => {
                cleanup();
                reject(error);
            }
        );
    });
}
