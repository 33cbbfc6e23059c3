import { OperationAbortedError, OperationTimeoutError } from './errors';

export type DeadlineOptions = {
    signal?: AbortSignal;
    timeoutMs: number;
};

/**
 * Runs `task` with a child signal that aborts when the parent signal aborts or
 * `timeoutMs` elapses. The returned promise settles as soon as either happens,
 * even when `task` ignores its signal.
 */
export async function withDeadline<T>(
    operation: string,
    task: (signal: AbortSignal) => Promise<T>,
    options: DeadlineOptions,
): Promise<T> {
    if (options.signal?.aborted) {
        throw new OperationAbortedError(operation);
    }

    const controller = new AbortController();
    let rejectInterrupted: (error: Error) => void = () => undefined;
    const interrupted = new Promise<never>((_resolve, reject) => {
        rejectInterrupted = reject;
    });
    const interrupt = (error: Error): void => {
        controller.abort(error);
        rejectInterrupted(error);
    };
    const timer = setTimeout(() => {
        interrupt(new OperationTimeoutError(operation, options.timeoutMs));
    }, options.timeoutMs);
    const onParentAbort = (): void => {
        interrupt(new OperationAbortedError(operation));
    };

    options.signal?.addEventListener('abort', onParentAbort, { once: true });

    try {
        return await Promise.race([
            task(controller.signal),
            interrupted,
        ]);
    } finally {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onParentAbort);
    }
}
