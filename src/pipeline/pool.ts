import { PipelineCancelledError } from './errors';
import { debug } from './log';

/**
 * Bounded worker pool. Submissions beyond `width` wait for a free slot;
 * once `signal` aborts, waiting submissions are rejected and never start.
 */
export class WorkerPool {
    private active = 0;
    private waiters: Array<{ admit: () => void; reject: (e: Error) => void }> = [];

    constructor(
        readonly width: number,
        private signal?: AbortSignal
    ) {
        if (!Number.isInteger(width) || width < 1) {
            throw new RangeError(`Pool width must be a positive integer, got ${width}`);
        }
        signal?.addEventListener('abort', () => this.rejectWaiters(), { once: true });
    }

    get running() {
        return this.active;
    }

    get queued() {
        return this.waiters.length;
    }

    private rejectWaiters() {
        const pending = this.waiters.splice(0);
        for (const w of pending) w.reject(new PipelineCancelledError());
    }

    private async acquire(): Promise<void> {
        if (this.signal?.aborted) throw new PipelineCancelledError();
        if (this.active < this.width) {
            this.active++;
            return;
        }
        await new Promise<void>((resolve, reject) => {
            this.waiters.push({
                admit: () => {
                    this.active++;
                    resolve();
                },
                reject,
            });
        });
    }

    private release() {
        this.active = Math.max(0, this.active - 1);
        const next = this.waiters.shift();
        if (next) next.admit();
        else debug('pool.idle', { active: this.active, width: this.width });
    }

    async run<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }
}
