/**
 * Counting semaphore that bounds how many portal calls are in flight at once, no matter how
 * many requests are being served. Waiters are admitted in arrival order.
 */
export class AdmissionGate {
    private inFlight = 0;
    private readonly waiters: Array<() => void> = [];

    constructor(readonly limit: number) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new Error(`Admission gate limit must be a positive integer, got ${limit}`);
        }
    }

    get active(): number {
        return this.inFlight;
    }

    get waiting(): number {
        return this.waiters.length;
    }

    async acquire(): Promise<void> {
        if (this.inFlight < this.limit) {
            this.inFlight++;
            return;
        }

        await new Promise<void>(resolve => this.waiters.push(resolve));
    }

    release(): void {
        const next = this.waiters.shift();
        if (next) {
            // The slot passes straight to the next waiter; inFlight is unchanged
            next();
            return;
        }

        this.inFlight = Math.max(0, this.inFlight - 1);
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

export default AdmissionGate;
