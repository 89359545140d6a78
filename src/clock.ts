/**
 * Source of the current time, in whole seconds.
 * Values are non-decreasing across calls on the same node.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000),
};

/**
 * Clock driven by hand, used for replaying transactions and in tests.
 * Refuses to move backwards.
 */
export class ManualClock implements Clock {
    private current: number;

    constructor(start = 0) {
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    set(timestamp: number): void {
        if (timestamp < this.current) {
            throw new RangeError(`[clock] Cannot move from ${this.current} back to ${timestamp}`);
        }
        this.current = timestamp;
    }

    advance(seconds: number): number {
        this.set(this.current + seconds);
        return this.current;
    }
}
