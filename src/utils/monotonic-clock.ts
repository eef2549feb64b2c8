/**
 * Source of timestamps for match results.
 */
export interface Clock {
    now(): number;
}

/**
 * Monotonic Clock
 *
 * Wall-clock milliseconds that never repeat or go backwards within a process,
 * even when the system clock is adjusted or two calls land in the same tick.
 */
export class MonotonicClock implements Clock {
    private last = 0;

    constructor(private readonly source: () => number = Date.now) { }

    now(): number {
        const current = this.source();
        this.last = current > this.last ? current : this.last + 1;
        return this.last;
    }
}

// Singleton instance
let clock: MonotonicClock | null = null;

export function getMonotonicClock(): MonotonicClock {
    if (!clock) {
        clock = new MonotonicClock();
    }
    return clock;
}
