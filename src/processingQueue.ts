import logger from './logger.js';

type QueueCallback = (err: Error | null) => void;
type QueueTask = (callback: QueueCallback) => void;

/**
 * Runs queued tasks one at a time, in the order they were pushed.
 */
export class ProcessingQueue {
    queue: QueueTask[];
    processing: boolean;
    private idleWaiters: Array<() => void>;

    constructor() {
        this.queue = [];
        this.processing = false;
        this.idleWaiters = [];
    }

    push(f: QueueTask = cb => cb(null)): void {
        this.queue.push(f);
        if (!this.processing) {
            this.processing = true;
            this.execute();
        }
    }

    /**
     * Queue an async task and resolve with its result once every earlier task has finished.
     */
    run<T>(task: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.push(done => {
                task().then(
                    result => {
                        resolve(result);
                        done(null);
                    },
                    (err: unknown) => {
                        const error = err instanceof Error ? err : new Error(String(err));
                        reject(error);
                        done(error);
                    }
                );
            });
        });
    }

    /**
     * Resolves when the queue has no running or pending task.
     */
    onIdle(): Promise<void> {
        if (!this.processing) return Promise.resolve();
        return new Promise<void>(resolve => this.idleWaiters.push(resolve));
    }

    private execute(): void {
        const first = this.queue.shift();
        if (first) {
            first((err: Error | null) => {
                if (err) {
                    logger.error('Error in ProcessingQueue task:', err);
                }
                if (this.queue.length > 0) {
                    this.execute();
                } else {
                    this.finish();
                }
            });
        } else {
            this.finish();
        }
    }

    private finish(): void {
        this.processing = false;
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
    }
}

export default ProcessingQueue;
