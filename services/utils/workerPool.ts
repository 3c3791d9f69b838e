// Concurrency limiter: at most `concurrency` task bodies run at once, FIFO for the rest.
export class WorkerPool {
    private running = 0;
    private queue: Array<() => void> = [];

    constructor(private concurrency: number) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}`);
        }
    }

    run<T>(fn: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            const task = () => {
                this.running++;
                void new Promise<T>(r => r(fn()))
                    .then(resolve, reject)
                    .finally(() => this.next());
            };
            if (this.running < this.concurrency) task();
            else this.queue.push(task);
        });
    }

    private next(): void {
        this.running--;
        const task = this.queue.shift();
        if (task) task();
    }

    get active(): number {
        return this.running;
    }

    get pending(): number {
        return this.queue.length;
    }
}
