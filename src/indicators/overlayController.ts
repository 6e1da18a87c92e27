/**
 * Overlay Controller
 *
 * Drives one overlay surface for an indicator. With a blink interval the
 * overlay toggles on a timer while shown, and show()/hide() start and stop
 * that timer. With an interval of zero there is no timer at all and the
 * overlay is simply shown or hidden.
 */

import { ScopedLogger } from '../mainLogger.js';
import { CancellableHandle, Scheduler } from '../media/types.js';
import { OverlaySurface, Rectangle } from './types.js';

export class OverlayController {
    private blinkTimer: CancellableHandle | null = null;

    constructor(
        private readonly overlay: OverlaySurface,
        private readonly scheduler: Scheduler,
        private readonly blinkIntervalSeconds: number,
        private readonly log: ScopedLogger
    ) {}

    /**
     * Show the overlay, starting the blink timer if blinking. Idempotent.
     */
    public show(): void {
        if (this.blinkIntervalSeconds > 0) {
            if (this.blinkTimer) return;
            this.log.debug('Starting indicator blinking');
            this.overlay.show();
            this.blinkTimer = this.scheduler.scheduleEvery(this.blinkIntervalSeconds, () => this.blink());
            return;
        }

        if (this.overlay.isShowing()) return;
        this.log.debug('Showing indicator');
        this.overlay.show();
    }

    /**
     * Hide the overlay and stop any blinking. Idempotent.
     */
    public hide(): void {
        if (this.blinkTimer) {
            this.log.debug('Stopping indicator blinking');
            this.blinkTimer.cancel();
            this.blinkTimer = null;
        }

        if (!this.overlay.isShowing()) return;
        this.log.debug('Hiding indicator');
        this.overlay.hide();
    }

    /**
     * Shown means "showing or blinking", not "pixels on screen right now"
     */
    public isShown(): boolean {
        return this.blinkTimer !== null || this.overlay.isShowing();
    }

    public isBlinking(): boolean {
        return this.blinkTimer !== null;
    }

    public setFrame(frame: Rectangle): void {
        this.log.debug(`Placing overlay at x = ${frame.x} y = ${frame.y}`);
        this.overlay.setFrame(frame);
    }

    public delete(): void {
        this.hide();
        this.overlay.delete();
    }

    private blink(): void {
        try {
            if (this.overlay.isShowing()) {
                this.overlay.hide();
            } else {
                this.overlay.show();
            }
        } catch (error) {
            this.log.error('Error toggling overlay:', error);
        }
    }
}
