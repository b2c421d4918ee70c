/**
 * Source of the current timestamp, in whole seconds.
 * Operations read time only through a Clock so that execution stays deterministic under test.
 */
export interface Clock {
    now(): number;
}

export class SystemClock implements Clock {
    now(): number {
        return Math.floor(Date.now() / 1000);
    }
}

/**
 * Clock that only moves when told to. Used for simulations and tests.
 */
export class ManualClock implements Clock {
    private current: number;

    constructor(start = 0) {
        if (!Number.isInteger(start) || start < 0) {
            throw new Error(`Invalid clock start: ${start}`);
        }
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    increase(seconds: number): number {
        if (!Number.isInteger(seconds) || seconds < 0) {
            throw new Error(`Cannot move clock by ${seconds} seconds`);
        }
        this.current += seconds;
        return this.current;
    }

    set(timestamp: number): void {
        if (!Number.isInteger(timestamp) || timestamp < this.current) {
            throw new Error(`Cannot move clock from ${this.current} to ${timestamp}`);
        }
        this.current = timestamp;
    }
}

export const systemClock = new SystemClock();
