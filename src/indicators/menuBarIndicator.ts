/**
 * Menu Bar Indicator
 *
 * A status item whose title reflects camera/microphone usage. Its menu
 * holds the mute toggle and lists the devices currently in use. While the
 * user has muted indicators the item stays in the menu bar with a
 * suppressed title, so it can still be used to unmute.
 */

import { DisplayState } from '../core/displayState.js';
import { createLogger } from '../mainLogger.js';
import { DeviceHandle } from '../media/types.js';
import { IndicatorCore } from './indicatorCore.js';
import { Indicator, IndicatorCreateResult, IndicatorUpdate, MenuItem, TrayFactory, TraySurface } from './types.js';

export const GREEN_DOT = '🟢';
export const RED_DOT = '🔴';
export const ORANGE_DIAMOND = '🔶';
export const YELLOW_DOT = '🟡';
export const CAMERA = '📷';
export const MICROPHONE = '🎙';

export interface MenuBarTitles {
    cameraInUse: string;
    micInUse: string;
    cameraAndMicInUse: string;
    nothingInUse: string;
    /** Muted while something is in use */
    suppressedActive: string;
    /** Muted while nothing is in use */
    suppressedIdle: string;
}

export interface MenuBarOptions {
    titles: MenuBarTitles;
    /** Stay in the menu bar (with nothingInUse) when nothing is in use */
    menubarIfNothingInUse: boolean;
    /** List in-use cameras in the menu */
    monitorCameras: boolean;
    /** List in-use microphones in the menu */
    monitorMics: boolean;
}

export const DEFAULT_MENU_BAR_OPTIONS: Readonly<MenuBarOptions> = Object.freeze({
    titles: Object.freeze({
        cameraInUse: RED_DOT,
        micInUse: RED_DOT,
        cameraAndMicInUse: RED_DOT,
        nothingInUse: GREEN_DOT,
        suppressedActive: ORANGE_DIAMOND,
        suppressedIdle: YELLOW_DOT,
    }),
    menubarIfNothingInUse: false,
    monitorCameras: true,
    monitorMics: true,
});

export type MenuBarCreateOptions = Partial<Omit<MenuBarOptions, 'titles'>> & {
    titles?: Partial<MenuBarTitles>;
};

/**
 * What the menu needs from the watcher, pulled when the menu opens
 */
export interface MenuBarControls {
    mute(): void;
    unmute(): void;
    isMuted(): boolean;
    camerasInUse(): DeviceHandle[];
    micsInUse(): DeviceHandle[];
}

export class MenuBarIndicator implements Indicator {
    private constructor(
        public readonly name: string,
        private readonly tray: TraySurface,
        private readonly controls: MenuBarControls,
        public readonly options: Readonly<MenuBarOptions>,
        private readonly core: IndicatorCore
    ) {}

    public static create(
        name: string,
        trays: TrayFactory,
        controls: MenuBarControls,
        options: MenuBarCreateOptions = {}
    ): IndicatorCreateResult<MenuBarIndicator> {
        const log = createLogger(`Menubar(${name})`);
        const resolved: Readonly<MenuBarOptions> = Object.freeze({
            ...DEFAULT_MENU_BAR_OPTIONS,
            ...options,
            titles: Object.freeze({ ...DEFAULT_MENU_BAR_OPTIONS.titles, ...options.titles }),
        });

        let tray: TraySurface | null;
        try {
            tray = trays.createTray({ inMenuBar: resolved.menubarIfNothingInUse });
        } catch (error) {
            log.error('Failed to create menu bar item:', error);
            return { success: false, error: `Failed to create menu bar item: ${String(error)}` };
        }

        if (!tray) {
            log.error('Failed to create menu bar item');
            return { success: false, error: 'Failed to create menu bar item' };
        }

        const indicator = new MenuBarIndicator(name, tray, controls, resolved, new IndicatorCore(log));
        tray.setMenuBuilder(() => indicator.buildMenu());
        indicator.render();
        return { success: true, indicator };
    }

    public update(update: IndicatorUpdate): void {
        if (this.core.isDeleted('update')) return;
        this.core.record(update);
        this.render();
    }

    /**
     * The menu bar has no geometry of its own
     */
    public refresh(): void {
        this.core.log.debug('refresh() called - doing nothing.');
    }

    public mute(): void {
        if (this.core.isDeleted('mute')) return;
        this.core.setMuted(true);
        this.render();
    }

    public unmute(): void {
        if (this.core.isDeleted('unmute')) return;
        this.core.setMuted(false);
        this.render();
    }

    public show(): void {
        if (this.core.isDeleted('show')) return;
        if (this.tray.isInMenuBar()) return;
        this.core.log.debug('Showing menubar icon');
        this.tray.returnToMenuBar();
    }

    public hide(): void {
        if (this.core.isDeleted('hide')) return;
        if (!this.tray.isInMenuBar()) return;
        this.core.log.debug('Hiding menubar icon');
        this.tray.removeFromMenuBar();
    }

    public delete(): void {
        if (this.core.isDeleted('delete')) return;
        this.core.log.debug('Deleting menubar');
        this.tray.delete();
        this.core.markDeleted();
    }

    public isMuted(): boolean {
        return this.core.isMuted();
    }

    /**
     * Title for a state, or null when the item should leave the menu bar
     */
    public titleFor(state: DisplayState): string | null {
        const { titles } = this.options;
        switch (state) {
            case DisplayState.BothActive:
                return titles.cameraAndMicInUse;
            case DisplayState.CameraActive:
                return titles.cameraInUse;
            case DisplayState.MicActive:
                return titles.micInUse;
            case DisplayState.SuppressedActive:
                return titles.suppressedActive;
            case DisplayState.SuppressedIdle:
                return titles.suppressedIdle;
            case DisplayState.Idle:
                return this.options.menubarIfNothingInUse ? titles.nothingInUse : null;
        }
    }

    /**
     * Built each time the user opens the menu
     */
    public buildMenu(): MenuItem[] {
        const muted = this.controls.isMuted();
        const items: MenuItem[] = [
            {
                title: muted ? 'Unmute Indicators' : 'Mute Indicators',
                click: () => this.toggleMute(muted),
            },
        ];

        if (this.options.monitorCameras) {
            for (const camera of this.controls.camerasInUse()) {
                items.push({ title: `${CAMERA}${camera.displayName}`, indent: 0 });
            }
        }

        if (this.options.monitorMics) {
            for (const mic of this.controls.micsInUse()) {
                items.push({ title: `${MICROPHONE}${mic.displayName}`, indent: 0 });
            }
        }

        return items;
    }

    private toggleMute(muted: boolean): void {
        try {
            if (muted) {
                this.controls.unmute();
            } else {
                this.controls.mute();
            }
        } catch (error) {
            this.core.log.error('Error toggling mute from menu:', error);
        }
    }

    private render(): void {
        const state = this.core.effectiveState();
        const title = this.titleFor(state);

        // Return to the menu bar before setting the title, or the title
        // may not take effect
        if (title === null) {
            this.core.log.debug(`Updating menubar icon: ${state}, removing`);
            this.hide();
            return;
        }

        this.core.log.debug(`Updating menubar icon: ${state}`);
        this.show();
        this.tray.setTitle(title);
    }
}
