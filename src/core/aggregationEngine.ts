/**
 * Aggregation Engine
 *
 * Sole owner of the booleans that decide the DisplayState: camera in use,
 * microphone in use (honoring the conferencing app's own mute), and user
 * mute. Every trigger recomputes from fresh snapshot reads; the cached
 * last-known values only serve change detection.
 */

import { createLogger } from '../mainLogger.js';
import { DeviceHandle, MediaPlatform } from '../media/types.js';
import { IndicatorUpdate } from '../indicators/types.js';
import { computeDisplayState, DisplayState } from './displayState.js';

const log = createLogger('AggregationEngine');

export interface EngineOptions {
    monitorCameras: boolean;
    monitorMics: boolean;
    honorExternalAppMute: boolean;
}

/**
 * Receives every broadcast (the indicator registry)
 */
export interface DisplayStateSink {
    broadcastUpdate(update: IndicatorUpdate): void;
    broadcastMute(): void;
    broadcastUnmute(): void;
}

/**
 * Whether the conferencing app is running, i.e. whether its mute state
 * counts at all
 */
export interface ExternalAppActivity {
    isActive(): boolean;
}

/**
 * Camera stops still waiting for their debounce check
 */
export interface PendingCameraOff {
    hasPending(): boolean;
}

export interface DisplayStateChange {
    state: DisplayState;
    /** Previously broadcast state, null before the first broadcast */
    previous: DisplayState | null;
    instigator?: DeviceHandle;
}

export type DisplayStateChangeCallback = (change: DisplayStateChange) => void;

export interface EngineCollaborators {
    platform: MediaPlatform;
    sink: DisplayStateSink;
    externalApp?: ExternalAppActivity;
    pendingCameraOff?: PendingCameraOff;
}

export class AggregationEngine {
    private readonly platform: MediaPlatform;
    private readonly sink: DisplayStateSink;
    private readonly externalApp: ExternalAppActivity | null;
    private readonly pendingCameraOff: PendingCameraOff | null;
    private options: EngineOptions;

    private userMuted = false;
    private externalAppMuted = false;
    private lastCameraInUse = false;
    private lastMicInUse = false;
    private lastBroadcast: DisplayState | null = null;
    private onChange: DisplayStateChangeCallback | null = null;

    constructor(collaborators: EngineCollaborators, options: EngineOptions) {
        this.platform = collaborators.platform;
        this.sink = collaborators.sink;
        this.externalApp = collaborators.externalApp ?? null;
        this.pendingCameraOff = collaborators.pendingCameraOff ?? null;
        this.options = { ...options };
    }

    public setOptions(options: EngineOptions): void {
        this.options = { ...options };
    }

    /**
     * Set callback for broadcasts whose state differs from the previous one
     */
    public setChangeCallback(callback: DisplayStateChangeCallback | null): void {
        this.onChange = callback;
    }

    // =========================================================================
    // INPUTS
    // =========================================================================

    /**
     * Any camera in use. A camera whose stop is still being debounced
     * counts as in use.
     */
    public cameraInUse(): boolean {
        if (!this.options.monitorCameras) {
            return false;
        }
        if (this.pendingCameraOff?.hasPending()) {
            return true;
        }
        return this.readSnapshot('cameras', () => this.platform.listActiveCameras().length > 0, this.lastCameraInUse);
    }

    /**
     * Any microphone in use, unless the conferencing app is running and
     * muted (when honored)
     */
    public micInUse(): boolean {
        if (!this.options.monitorMics) {
            return false;
        }
        if (this.isExternalMuteInEffect()) {
            return false;
        }
        return this.readSnapshot('microphones', () => this.platform.listActiveMicrophones().length > 0, this.lastMicInUse);
    }

    public camerasInUse(): DeviceHandle[] {
        if (!this.options.monitorCameras) return [];
        return this.readSnapshot('cameras', () => this.platform.listActiveCameras(), []);
    }

    /**
     * Microphones the platform reports in use, ignoring the app mute
     */
    public micsInUse(): DeviceHandle[] {
        if (!this.options.monitorMics) return [];
        return this.readSnapshot('microphones', () => this.platform.listActiveMicrophones(), []);
    }

    public isUserMuted(): boolean {
        return this.userMuted;
    }

    public isExternalMuteInEffect(): boolean {
        return (
            this.options.monitorMics &&
            this.options.honorExternalAppMute &&
            this.externalAppMuted &&
            this.externalApp !== null &&
            this.externalApp.isActive()
        );
    }

    public lastKnown(): { cameraInUse: boolean; micInUse: boolean } {
        return { cameraInUse: this.lastCameraInUse, micInUse: this.lastMicInUse };
    }

    public lastBroadcastState(): DisplayState | null {
        return this.lastBroadcast;
    }

    // =========================================================================
    // RECOMPUTATION
    // =========================================================================

    /**
     * Compute the current DisplayState from fresh reads. Only side effect:
     * the cached last-known booleans.
     */
    public recompute(instigator?: DeviceHandle): DisplayState {
        const cameraInUse = this.cameraInUse();
        const micInUse = this.micInUse();
        this.lastCameraInUse = cameraInUse;
        this.lastMicInUse = micInUse;

        const state = computeDisplayState({ cameraInUse, micInUse, userMuted: this.userMuted });
        log.debug(
            `recompute(${instigator?.displayName ?? ''}): camera=${cameraInUse} mic=${micInUse} ` +
                `userMuted=${this.userMuted} -> ${state}`
        );
        return state;
    }

    /**
     * A device changed state: recompute and broadcast unconditionally
     */
    public handleDeviceSignal(device: DeviceHandle): void {
        this.publish(device);
    }

    public setUserMuted(muted: boolean): void {
        const changed = this.userMuted !== muted;
        this.userMuted = muted;

        if (changed) {
            log.info(muted ? 'Muting indicators' : 'Unmuting indicators');
            if (muted) {
                this.sink.broadcastMute();
            } else {
                this.sink.broadcastUnmute();
            }
        }

        this.publish();
    }

    /**
     * The conferencing app's mute changed. Broadcasts only if that changes
     * the DisplayState.
     */
    public onExternalMuteChanged(muted: boolean): void {
        log.debug(`External app mute changed: ${muted}`);
        this.externalAppMuted = muted;
        this.refreshIfChanged();
    }

    /**
     * Recompute and broadcast only if the state differs from the last
     * broadcast
     *
     * @returns true if a broadcast happened
     */
    public refreshIfChanged(instigator?: DeviceHandle): boolean {
        const state = this.recompute(instigator);
        if (state === this.lastBroadcast) {
            log.debug(`State unchanged (${state}), not broadcasting`);
            return false;
        }
        this.broadcast(state, instigator);
        return true;
    }

    /**
     * Recompute and broadcast unconditionally
     */
    public publish(instigator?: DeviceHandle): DisplayState {
        const state = this.recompute(instigator);
        this.broadcast(state, instigator);
        return state;
    }

    private broadcast(state: DisplayState, instigator?: DeviceHandle): void {
        const previous = this.lastBroadcast;
        this.lastBroadcast = state;
        this.sink.broadcastUpdate(instigator ? { state, instigator } : { state });

        if (previous === state || !this.onChange) return;
        try {
            this.onChange(instigator ? { state, previous, instigator } : { state, previous });
        } catch (error) {
            log.error('Error calling display state change callback:', error);
        }
    }

    private readSnapshot<T>(what: string, read: () => T, fallback: T): T {
        try {
            return read();
        } catch (error) {
            log.error(`Failed to read active ${what}, using last known value:`, error);
            return fallback;
        }
    }
}
