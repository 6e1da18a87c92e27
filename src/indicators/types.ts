/**
 * Indicator Types
 *
 * The contract every indicator implements, and the rendering surfaces the
 * host provides. Pixel drawing, windows and the tray item itself live in
 * the host; indicators only decide what to show and when.
 */

import { DisplayState } from '../core/displayState.js';
import { DeviceHandle, Unsubscribe } from '../media/types.js';

/**
 * Pushed to every indicator on each broadcast
 */
export interface IndicatorUpdate {
    state: DisplayState;
    /** Device whose signal caused the update, when there is one */
    instigator?: DeviceHandle;
}

export interface Indicator {
    /** Name used in logs */
    readonly name: string;
    update(update: IndicatorUpdate): void;
    /** Recompute placement after a display change; never changes visibility */
    refresh(): void;
    mute(): void;
    unmute(): void;
    /** Idempotent */
    show(): void;
    /** Idempotent */
    hide(): void;
    /** Release the indicator's on-screen resources */
    delete(): void;
}

export type IndicatorCreateResult<T extends Indicator = Indicator> =
    | { success: true; indicator: T }
    | { success: false; error: string };

// ============================================================================
// Geometry
// ============================================================================

export interface Rectangle {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface Display {
    bounds: Rectangle;
    /** Bounds minus the menu bar and dock */
    workArea: Rectangle;
}

/**
 * Indicator geometry. Negative x or y are offsets from the right or bottom
 * edge of the primary display's work area.
 */
export interface IndicatorGeometry {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface Color {
    red: number;
    green: number;
    blue: number;
    alpha: number;
}

// ============================================================================
// Host surfaces
// ============================================================================

export type OverlayShape =
    | { type: 'circle' }
    /** Frame around the overlay edge, width as a percentage of its size */
    | { type: 'border'; widthPercent: number };

export interface OverlaySpec {
    frame: Rectangle;
    shape: OverlayShape;
    fillColor: Color;
}

/**
 * A borderless always-on-top window drawing one shape
 */
export interface OverlaySurface {
    show(): void;
    hide(): void;
    isShowing(): boolean;
    setFrame(frame: Rectangle): void;
    delete(): void;
}

export interface OverlayFactory {
    /** Returns null if the overlay cannot be created (e.g. no display) */
    createOverlay(spec: OverlaySpec): OverlaySurface | null;
}

export interface MenuItem {
    title: string;
    click?: () => void;
    indent?: number;
}

/**
 * A status item in the menu bar
 */
export interface TraySurface {
    setTitle(title: string): void;
    returnToMenuBar(): void;
    removeFromMenuBar(): void;
    isInMenuBar(): boolean;
    /** Builder is called each time the user opens the menu */
    setMenuBuilder(builder: () => MenuItem[]): void;
    delete(): void;
}

export interface TrayFactory {
    createTray(options: { inMenuBar: boolean }): TraySurface | null;
}

export interface DisplayProvider {
    getPrimaryDisplay(): Display;
    onDisplaysChanged(callback: () => void): Unsubscribe;
}

/**
 * Everything the built-in indicators need from the host
 */
export interface IndicatorHost {
    overlays: OverlayFactory;
    trays: TrayFactory;
    displays: DisplayProvider;
}
