/**
 * Read/Write Lock
 *
 * Coordination point for the vector index: any number of concurrent
 * readers, or exactly one writer. Waiters are served in arrival order and a
 * queued writer blocks readers that arrive after it, so a steady stream of
 * searches can't starve ingestion.
 */

type Release = () => void;

interface Waiter {
    mode: 'read' | 'write';
    grant: () => void;
}

export class ReadWriteLock {
    private activeReaders = 0;
    private writerActive = false;
    private readonly queue: Waiter[] = [];

    /**
     * Runs `fn` while holding a shared lock.
     */
    async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire('read');
        try {
            return await fn();
        } finally {
            release();
        }
    }

    /**
     * Runs `fn` while holding the exclusive lock.
     */
    async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
        const release = await this.acquire('write');
        try {
            return await fn();
        } finally {
            release();
        }
    }

    get readers(): number {
        return this.activeReaders;
    }

    get writing(): boolean {
        return this.writerActive;
    }

    get pending(): number {
        return this.queue.length;
    }

    private acquire(mode: 'read' | 'write'): Promise<Release> {
        return new Promise((resolve) => {
            const grant = (): void => {
                if (mode === 'read') {
                    this.activeReaders++;
                    resolve(() => this.releaseRead());
                } else {
                    this.writerActive = true;
                    resolve(() => this.releaseWrite());
                }
            };

            if (this.queue.length === 0 && this.canGrant(mode)) {
                grant();
                return;
            }
            this.queue.push({ mode, grant });
        });
    }

    private canGrant(mode: 'read' | 'write'): boolean {
        if (mode === 'read') {
            return !this.writerActive;
        }
        return !this.writerActive && this.activeReaders === 0;
    }

    private releaseRead(): void {
        this.activeReaders--;
        this.drain();
    }

    private releaseWrite(): void {
        this.writerActive = false;
        this.drain();
    }

    private drain(): void {
        while (this.queue.length > 0) {
            const next = this.queue[0];
            if (!next || !this.canGrant(next.mode)) {
                return;
            }
            this.queue.shift();
            next.grant();
            if (next.mode === 'write') {
                return;
            }
        }
    }
}
