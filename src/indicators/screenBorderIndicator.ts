/**
 * Screen Border Indicator
 *
 * A steady colored frame around the primary display's work area while a
 * camera or microphone is in use.
 */

import { createLogger } from '../mainLogger.js';
import { Scheduler } from '../media/types.js';
import { IndicatorCore, ShowFilter, showWhenAnyActive } from './indicatorCore.js';
import { OverlayController } from './overlayController.js';
import {
    Color,
    Indicator,
    IndicatorCreateResult,
    IndicatorHost,
    IndicatorUpdate,
    OverlaySurface,
    Rectangle,
} from './types.js';

export interface ScreenBorderOptions {
    /** Border width as a percentage of the screen size */
    widthPercent: number;
    fillColor: Color;
    showFilter: ShowFilter;
}

export const DEFAULT_SCREEN_BORDER_OPTIONS: Readonly<ScreenBorderOptions> = Object.freeze({
    widthPercent: 0.5,
    fillColor: Object.freeze({ red: 1, green: 0, blue: 0, alpha: 1 }),
    showFilter: showWhenAnyActive,
});

export class ScreenBorderIndicator implements Indicator {
    private constructor(
        public readonly name: string,
        private readonly host: Pick<IndicatorHost, 'displays'>,
        private readonly overlay: OverlayController,
        public readonly options: Readonly<ScreenBorderOptions>,
        private readonly core: IndicatorCore
    ) {}

    public static create(
        name: string,
        host: Pick<IndicatorHost, 'overlays' | 'displays'>,
        scheduler: Scheduler,
        options: Partial<ScreenBorderOptions> = {}
    ): IndicatorCreateResult<ScreenBorderIndicator> {
        const log = createLogger(`ScreenBorder(${name})`);
        const resolved: Readonly<ScreenBorderOptions> = Object.freeze({
            ...DEFAULT_SCREEN_BORDER_OPTIONS,
            ...options,
            fillColor: Object.freeze({ ...(options.fillColor ?? DEFAULT_SCREEN_BORDER_OPTIONS.fillColor) }),
        });

        const width = resolved.widthPercent;
        if (!Number.isFinite(width) || width <= 0 || width >= 50) {
            const error = `widthPercent must be between 0 and 50, got ${width}`;
            log.error(error);
            return { success: false, error };
        }

        let surface: OverlaySurface | null;
        try {
            surface = host.overlays.createOverlay({
                frame: ScreenBorderIndicator.fullScreenFrame(host),
                shape: { type: 'border', widthPercent: width },
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

        // A border never blinks
        const overlay = new OverlayController(surface, scheduler, 0, log);
        log.debug('New ScreenBorder created');
        return {
            success: true,
            indicator: new ScreenBorderIndicator(name, host, overlay, resolved, new IndicatorCore(log)),
        };
    }

    private static fullScreenFrame(host: Pick<IndicatorHost, 'displays'>): Rectangle {
        const { workArea } = host.displays.getPrimaryDisplay();
        return { ...workArea };
    }

    public update(update: IndicatorUpdate): void {
        if (this.core.isDeleted('update')) return;
        this.core.record(update);
        this.apply();
    }

    /**
     * Resize to the primary display's current work area
     */
    public refresh(): void {
        if (this.core.isDeleted('refresh')) return;
        this.overlay.setFrame(ScreenBorderIndicator.fullScreenFrame(this.host));
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
