/**
 * Abort controller that fires on timeout or when the caller's signal aborts,
 * and remembers which of the two happened.
 */
export class CallScope {
    readonly controller = new AbortController();
    timedOut = false;
    private readonly timer: NodeJS.Timeout;
    private readonly onCallerAbort = (): void => this.controller.abort();

    constructor(
        readonly timeoutMs: number,
        private readonly callerSignal?: AbortSignal
    ) {
        this.timer = setTimeout(() => {
            this.timedOut = true;
            this.controller.abort();
        }, timeoutMs);
        if (callerSignal?.aborted) {
            this.controller.abort();
        } else {
            callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true });
        }
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    get cancelled(): boolean {
        return this.callerSignal?.aborted === true;
    }

    dispose(): void {
        clearTimeout(this.timer);
        this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
    }
}
