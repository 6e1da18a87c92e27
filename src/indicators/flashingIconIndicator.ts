/**
 * Flashing Icon Indicator
 *
 * A filled circle in a corner of the primary display, blinking while the
 * watched devices are in use. Set blinkIntervalSeconds to 0 for a steady
 * icon.
 *
 * Example, a steady amber icon in the upper left for microphones only:
 *
 *   FlashingIconIndicator.create('microphones', host, scheduler, {
 *       showFilter: showWhenMicActive,
 *       geometry: { x: 20, y: 20, width: 20, height: 20 },
 *       fillColor: { red: 1, green: 0.67, blue: 0, alpha: 1 },
 *       blinkIntervalSeconds: 0,
 *   });
 */

import { createLogger } from '../mainLogger.js';
import { Scheduler } from '../media/types.js';
import { IndicatorCore, resolveFrame, ShowFilter, showWhenAnyActive, validateGeometry } from './indicatorCore.js';
import { OverlayController } from './overlayController.js';
import {
    Color,
    Indicator,
    IndicatorCreateResult,
    IndicatorGeometry,
    IndicatorHost,
    IndicatorUpdate,
    OverlaySurface,
} from './types.js';

export interface FlashingIconOptions {
    /** Should be square */
    geometry: IndicatorGeometry;
    fillColor: Color;
    /** Seconds between toggles; 0 disables blinking */
    blinkIntervalSeconds: number;
    showFilter: ShowFilter;
}

export const DEFAULT_FLASHING_ICON_OPTIONS: Readonly<FlashingIconOptions> = Object.freeze({
    geometry: Object.freeze({ x: -60, y: 20, width: 50, height: 50 }),
    fillColor: Object.freeze({ red: 1, green: 0, blue: 0, alpha: 1 }),
    blinkIntervalSeconds: 1,
    showFilter: showWhenAnyActive,
});

export class FlashingIconIndicator implements Indicator {
    private constructor(
        public readonly name: string,
        private readonly host: Pick<IndicatorHost, 'displays'>,
        private readonly overlay: OverlayController,
        public readonly options: Readonly<FlashingIconOptions>,
        private readonly core: IndicatorCore
    ) {}

    /**
     * Create the indicator and its overlay. Fails without side effects if the
     * options are invalid or the host cannot create the overlay.
     */
    public static create(
        name: string,
        host: Pick<IndicatorHost, 'overlays' | 'displays'>,
        scheduler: Scheduler,
        options: Partial<FlashingIconOptions> = {}
    ): IndicatorCreateResult<FlashingIconIndicator> {
        const log = createLogger(`Flasher(${name})`);
        const resolved: Readonly<FlashingIconOptions> = Object.freeze({
            ...DEFAULT_FLASHING_ICON_OPTIONS,
            ...options,
            geometry: Object.freeze({ ...(options.geometry ?? DEFAULT_FLASHING_ICON_OPTIONS.geometry) }),
            fillColor: Object.freeze({ ...(options.fillColor ?? DEFAULT_FLASHING_ICON_OPTIONS.fillColor) }),
        });

        const geometryError = validateGeometry(resolved.geometry);
        if (geometryError) {
            log.error(geometryError);
            return { success: false, error: geometryError };
        }
        if (!Number.isFinite(resolved.blinkIntervalSeconds) || resolved.blinkIntervalSeconds < 0) {
            const error = `blinkIntervalSeconds must be a non-negative number, got ${resolved.blinkIntervalSeconds}`;
            log.error(error);
            return { success: false, error };
        }

        let surface: OverlaySurface | null;
        try {
            const frame = resolveFrame(resolved.geometry, host.displays.getPrimaryDisplay());
            log.debug(`Placing icon at x = ${frame.x} y = ${frame.y}`);
            surface = host.overlays.createOverlay({
                frame,
                shape: { type: 'circle' },
                fillColor: resolved.fillColor,
            });
        } catch (error) {
            log.error('Failed to create overlay:', error);
            return { success: false, error: `Failed to create overlay: ${String(error)}` };
        }

        if (!surface) {
            log.error('Failed to create overlay');
            return { success: false, error: 'Failed to create overlay' };
        }

        const overlay = new OverlayController(surface, scheduler, resolved.blinkIntervalSeconds, log);
        const indicator = new FlashingIconIndicator(name, host, overlay, resolved, new IndicatorCore(log));
        log.debug('New Flasher created');
        return { success: true, indicator };
    }

    public update(update: IndicatorUpdate): void {
        if (this.core.isDeleted('update')) return;
        this.core.record(update);
        this.apply();
    }

    public refresh(): void {
        if (this.core.isDeleted('refresh')) return;
        this.overlay.setFrame(resolveFrame(this.options.geometry, this.host.displays.getPrimaryDisplay()));
    }

    public mute(): void {
        if (this.core.isDeleted('mute')) return;
        this.core.setMuted(true);
        this.hide();
    }

    public unmute(): void {
        if (this.core.isDeleted('unmute')) return;
        this.core.setMuted(false);
        this.apply();
    }

    public show(): void {
        if (this.core.isDeleted('show')) return;
        this.overlay.show();
    }

    public hide(): void {
        if (this.core.isDeleted('hide')) return;
        this.overlay.hide();
    }

    public delete(): void {
        if (this.core.isDeleted('delete')) return;
        this.core.log.debug('Deleting');
        this.overlay.delete();
        this.core.markDeleted();
    }

    public isShown(): boolean {
        return this.overlay.isShown();
    }

    public isBlinking(): boolean {
        return this.overlay.isBlinking();
    }

    public isMuted(): boolean {
        return this.core.isMuted();
    }

    private apply(): void {
        if (this.core.wantsVisible(this.options.showFilter)) {
            this.show();
        } else {
            this.hide();
        }
    }
}
