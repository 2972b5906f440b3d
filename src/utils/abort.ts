/**
 * Derives a signal that aborts when `parent` aborts or after `timeoutMs`, whichever comes first.
 * Call `dispose` once the guarded operation settles to clear the timer.
 */
export function withTimeout(parent: AbortSignal | undefined, timeoutMs: number): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const timer = setTimeout(() => {
        const reason = new Error(`operation timed out after ${timeoutMs}ms`);
        reason.name = 'TimeoutError';
        controller.abort(reason);
    }, timeoutMs);

    const onParentAbort = (): void => {
        controller.abort(parent?.reason);
    };
    if (parent) {
        if (parent.aborted) {
            onParentAbort();
        } else {
            parent.addEventListener('abort', onParentAbort, { once: true });
        }
    }

    return {
        signal: controller.signal,
        dispose: () => {
            clearTimeout(timer);
            parent?.removeEventListener('abort', onParentAbort);
        },
    };
}
