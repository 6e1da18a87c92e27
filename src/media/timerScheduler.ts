/**
 * Timer-backed scheduler used for debounce checks, app mute polling,
 * device polling and indicator blinking.
 */

import { CancellableHandle, Scheduler } from './types.js';

export class TimerScheduler implements Scheduler {
    public scheduleAfter(seconds: number, callback: () => void): CancellableHandle {
        let timeoutId: NodeJS.Timeout | null = setTimeout(() => {
            timeoutId = null;
            callback();
        }, seconds * 1000);

        return {
            cancel: () => {
                if (timeoutId) {
                    clearTimeout(timeoutId);
                    timeoutId = null;
                }
            },
        };
    }

    public scheduleEvery(seconds: number, callback: () => void): CancellableHandle {
        let intervalId: NodeJS.Timeout | null = setInterval(callback, seconds * 1000);

        return {
            cancel: () => {
                if (intervalId) {
                    clearInterval(intervalId);
                    intervalId = null;
                }
            },
        };
    }
}
