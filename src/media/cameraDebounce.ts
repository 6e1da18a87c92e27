/**
 * Camera-off Debounce
 *
 * Some hosts report a camera as briefly stopped around sleep/wake. A
 * "camera stopped" signal is held for a delay and only passed on if the
 * camera is still not in use when the delay elapses. "Camera started" is
 * never delayed.
 */

import { createLogger, ScopedLogger } from '../mainLogger.js';
import { CancellableHandle, DeviceHandle, MediaPlatform, Scheduler } from './types.js';

export interface PendingTransition {
    device: DeviceHandle;
    /** Epoch milliseconds when the transition was deferred */
    scheduledAt: number;
    delaySeconds: number;
}

interface PendingEntry extends PendingTransition {
    timer: CancellableHandle;
}

export type CameraSignalHandler = (device: DeviceHandle) => void;

export class CameraDebounce {
    private readonly log: ScopedLogger;
    private pending: Map<string, PendingEntry> = new Map();

    constructor(
        private readonly platform: MediaPlatform,
        private readonly scheduler: Scheduler,
        private delaySeconds: number,
        private readonly onSignal: CameraSignalHandler
    ) {
        this.log = createLogger('CameraDebounce');
    }

    public getDelay(): number {
        return this.delaySeconds;
    }

    /**
     * Change the delay for transitions deferred from now on
     */
    public setDelay(seconds: number): void {
        this.delaySeconds = seconds;
    }

    public onCameraBecameUsed(device: DeviceHandle): void {
        this.log.debug(`Camera ${device.displayName} in use`);
        this.emit(device);
    }

    public onCameraBecameUnused(device: DeviceHandle): void {
        if (this.delaySeconds <= 0) {
            this.log.debug(`Camera ${device.displayName} stopped`);
            this.emit(device);
            return;
        }

        const existing = this.pending.get(device.id);
        if (existing) {
            // Restart the window from the latest stop
            existing.timer.cancel();
        }

        this.log.debug(`Delaying stop of camera ${device.displayName} for ${this.delaySeconds}s`);
        const timer = this.scheduler.scheduleAfter(this.delaySeconds, () => this.fire(device.id));
        this.pending.set(device.id, {
            device,
            scheduledAt: Date.now(),
            delaySeconds: this.delaySeconds,
            timer,
        });
    }

    /**
     * True while any camera stop is waiting for its deferred check
     */
    public hasPending(): boolean {
        return this.pending.size > 0;
    }

    public pendingTransitions(): PendingTransition[] {
        return [...this.pending.values()].map(({ device, scheduledAt, delaySeconds }) => ({
            device,
            scheduledAt,
            delaySeconds,
        }));
    }

    /**
     * Drop every deferred check without acting on it
     */
    public cancelAll(): void {
        for (const entry of this.pending.values()) {
            entry.timer.cancel();
        }
        this.pending.clear();
    }

    /**
     * Deferred check: re-read the device's live state and pass the stop on
     * only if it is still not in use
     */
    private fire(deviceId: string): void {
        const entry = this.pending.get(deviceId);
        if (!entry) return;

        let stillInUse: boolean;
        try {
            stillInUse = this.platform.listActiveCameras().some((camera) => camera.id === deviceId);
        } catch (error) {
            // Keep the stop pending and check again after another delay
            this.log.error(
                `Failed to re-check camera ${entry.device.displayName}, retrying in ${entry.delaySeconds}s:`,
                error
            );
            entry.scheduledAt = Date.now();
            entry.timer = this.scheduler.scheduleAfter(entry.delaySeconds, () => this.fire(deviceId));
            return;
        }

        this.pending.delete(deviceId);

        if (stillInUse) {
            this.log.debug(`Camera ${entry.device.displayName} back in use, dropping stop`);
            return;
        }

        this.log.debug(`Camera ${entry.device.displayName} stopped (after ${entry.delaySeconds}s)`);
        this.emit(entry.device);
    }

    private emit(device: DeviceHandle): void {
        try {
            this.onSignal(device);
        } catch (error) {
            this.log.error(`Error handling signal for camera ${device.displayName}:`, error);
        }
    }
}
