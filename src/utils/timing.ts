/**
 * Timing utilities: delays, timeouts and the clock used by WAIT
 */

import { TimeoutError } from '../classes/exceptions';

/**
 * Source of time for effects. Tests swap in an instant clock.
 */
export interface ClockAdapter {
    delay(ms: number): Promise<void>;
    now(): number;
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Resolve after pending timers and I/O callbacks have had a turn
 */
export function yieldToEventLoop(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

export const systemClock: ClockAdapter = {
    delay: (ms) => sleep(ms),
    now: () => Date.now()
};

/**
 * Race a promise against a timer. Rejects with TimeoutError when the timer wins;
 * the timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(message, ms)), ms);
    });
    try {
        return await Promise.race([promise, timeout]);
    } finally {
        if (timer !== undefined) {
            clearTimeout(timer);
        }
    }
}
