export const TIMED_OUT = Symbol("timed out");

/** Longest delay Node timers honour; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Races `promise` against a timer. A null timeout waits indefinitely.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number | null): Promise<T | typeof TIMED_OUT> {
    if (timeoutMs === null) {
        return promise;
    }

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<typeof TIMED_OUT>((resolve) => {
        timeoutId = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });

    try {
        return await Promise.race([promise, timeoutPromise]);
    } finally {
        clearTimeout(timeoutId);
    }
}

/** Rejects with the signal's reason as soon as it aborts. */
export async function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
        throw signal.reason;
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener("abort", onAbort, { once: true });
        void promise
            .then(resolve, reject)
            .finally(() => signal.removeEventListener("abort", onAbort));
    });
}

export function formatDuration(ms: number): string {
    if (ms >= 1000 && ms % 1000 === 0) {
        const seconds = ms / 1000;
        return `${seconds} second${seconds === 1 ? '' : 's'}`;
    }
    return `${ms}ms`;
}
