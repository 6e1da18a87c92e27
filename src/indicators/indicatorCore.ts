/**
 * Indicator Core
 *
 * Behavior shared by every indicator variant, held by composition:
 * mute bookkeeping, the last pushed update, and geometry placement.
 */

import {
    DisplayState,
    isAnyActive,
    isCameraActive,
    isMicActive,
    suppress,
} from '../core/displayState.js';
import { ScopedLogger } from '../mainLogger.js';
import { Display, IndicatorGeometry, IndicatorUpdate, Rectangle } from './types.js';

/**
 * Decides which (unsuppressed) states make an overlay indicator visible
 */
export type ShowFilter = (state: DisplayState) => boolean;

export const showWhenAnyActive: ShowFilter = isAnyActive;
export const showWhenCameraActive: ShowFilter = isCameraActive;
export const showWhenMicActive: ShowFilter = isMicActive;

/**
 * Place geometry on a display's work area. Negative x/y count from the
 * right/bottom edge.
 */
export function resolveFrame(geometry: IndicatorGeometry, display: Display): Rectangle {
    const area = display.workArea;

    let x = area.x + geometry.x;
    if (geometry.x < 0) {
        x += area.width;
    }

    let y = area.y + geometry.y;
    if (geometry.y < 0) {
        y += area.height;
    }

    return { x, y, width: geometry.width, height: geometry.height };
}

export function validateGeometry(geometry: IndicatorGeometry): string | null {
    const values = [geometry.x, geometry.y, geometry.width, geometry.height];
    if (!values.every(Number.isFinite)) {
        return 'geometry values must be finite numbers';
    }
    if (geometry.width <= 0 || geometry.height <= 0) {
        return 'geometry width and height must be positive';
    }
    return null;
}

export class IndicatorCore {
    private muted = false;
    private deleted = false;
    private lastUpdate: IndicatorUpdate = { state: DisplayState.Idle };

    constructor(public readonly log: ScopedLogger) {}

    public isMuted(): boolean {
        return this.muted;
    }

    public setMuted(muted: boolean): void {
        this.log.debug(muted ? 'Muting' : 'Unmuting');
        this.muted = muted;
    }

    public record(update: IndicatorUpdate): void {
        this.lastUpdate = update;
    }

    /**
     * Last pushed state, turned into its suppressed variant while muted
     */
    public effectiveState(): DisplayState {
        return this.muted ? suppress(this.lastUpdate.state) : this.lastUpdate.state;
    }

    /**
     * Should an overlay with this filter be visible right now? Muted
     * always wins.
     */
    public wantsVisible(filter: ShowFilter): boolean {
        return !this.muted && filter(this.lastUpdate.state);
    }

    public markDeleted(): void {
        this.deleted = true;
    }

    /**
     * Guard for operations on a deleted indicator; logs and returns true
     * when the caller should bail out
     */
    public isDeleted(operation: string): boolean {
        if (this.deleted) {
            this.log.warn(`${operation}() called after delete()`);
        }
        return this.deleted;
    }
}
