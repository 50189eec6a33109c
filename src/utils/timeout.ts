import { TaskTimeoutError } from '../errors/index.js';

/**
 * Run `fn` with an optional time budget.
 *
 * On expiry the signal handed to `fn` aborts with a TaskTimeoutError and
 * the returned promise rejects with it, even if `fn` ignores the signal.
 */
export async function runWithTimeout<T>(
    fn: (signal?: AbortSignal) => Promise<T>,
    timeoutMs?: number
): Promise<T> {
    if (timeoutMs === undefined) {
        return fn(undefined);
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new TaskTimeoutError(timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([fn(controller.signal), expired]);
    } finally {
        clearTimeout(timer);
    }
}
