import type { Clock, TimerHandle, Timers } from '../snapshots/capabilities.js';

/**
 * Wall-clock time and Node timers.
 */
export class SystemClock implements Clock, Timers {
    public now(): Date {
        return new Date();
    }

    public setTimer(delayMs: number, callback: () => void): TimerHandle {
        const handle: NodeJS.Timeout = setTimeout(callback, delayMs);
        return {
            cancel: () => clearTimeout(handle)
        };
    }
}

export const systemClock = new SystemClock();
