/**
 * Timing facility for deadline callbacks, kept separate from the execution
 * path: scheduling returns immediately and the callback runs on a later
 * turn of the event loop.
 */

import { performance } from 'perf_hooks';
import { TimerHandle } from './execution_types';

export interface Scheduler {
    /** @throws when the facility cannot take another timer */
    schedule(delayMs: number, callback: () => void): TimerHandle;
}

/** Monotonic clock in milliseconds. */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

// setTimeout clamps anything above this to 1ms
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const nodeScheduler: Scheduler = {
    schedule(delayMs, callback) {
        if (delayMs > MAX_TIMER_DELAY_MS) {
            throw new RangeError(`Deadline ${delayMs}ms exceeds timer range`);
        }
        const timer = setTimeout(callback, Math.max(0, delayMs));
        // Deadline timers must not keep the host process alive
        timer.unref();
        return { cancel: () => clearTimeout(timer) };
    },
};
