export class TimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export class AbortedError extends Error {
    constructor() {
        super('Operation aborted');
        this.name = 'AbortedError';
    }
}

/**
 * Run an abortable operation with a deadline. The operation receives a
 * signal that fires on timeout or when the parent signal aborts; the
 * returned promise rejects at that moment even if the operation ignores it.
 */
export function withTimeout<T>(
    run: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    parentSignal?: AbortSignal,
): Promise<T> {
    if (parentSignal?.aborted) {
        return Promise.reject(new AbortedError());
    }

    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
        let settled = false;

        const finish = (): boolean => {
            if (settled) {
                return false;
            }
            settled = true;
            clearTimeout(timeoutId);
            parentSignal?.removeEventListener('abort', onParentAbort);
            return true;
        };

        const onParentAbort = (): void => {
            if (finish()) {
                controller.abort();
                reject(new AbortedError());
            }
        };

        const timeoutId = setTimeout(() => {
            if (finish()) {
                controller.abort();
                reject(new TimeoutError(timeoutMs));
            }
        }, timeoutMs);

        parentSignal?.addEventListener('abort', onParentAbort, { once: true });

        let pending: Promise<T>;
        try {
            pending = run(controller.signal);
        } catch (error) {
            pending = Promise.reject(error);
        }

        pending.then(
            (value) => {
                if (finish()) {
                    resolve(value);
                }
            },
            (error: unknown) => {
                if (finish()) {
                    reject(error);
                }
            },
        );
    });
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
