/**
 * Zoom Mute Monitor
 *
 * Zoom grabs the microphone and then mutes/unmutes internally, so the
 * device keeps reporting "in use" while the user is muted. This monitor
 * polls the app's own mute control while the app is running and reports
 * changes.
 *
 * States: inactive (app not running, no timer) -> active (app running,
 * polling) -> inactive on termination. The cached mute value survives
 * termination but is only authoritative while active.
 */

import { createLogger, ScopedLogger } from '../mainLogger.js';
import { CancellableHandle, MediaPlatform, MuteMonitorState, Scheduler, Unsubscribe } from './types.js';

export type MuteChangeCallback = (muted: boolean) => void;
export type MonitorStateCallback = (state: MuteMonitorState) => void;

export interface ZoomMuteMonitorOptions {
    /** Process name of the app to watch */
    appName: string;
    pollIntervalSeconds: number;
}

export class ZoomMuteMonitor {
    private readonly log: ScopedLogger;
    private state: MuteMonitorState = 'inactive';
    /** Last polled mute value; null until the first poll */
    private lastMuteState: boolean | null = null;
    /** Set on activation so the next poll reports even an unchanged value */
    private reportNextPoll = false;
    private pollTimer: CancellableHandle | null = null;
    private unsubscribeLifecycle: Unsubscribe | null = null;
    private callback: MuteChangeCallback | null = null;
    private stateCallback: MonitorStateCallback | null = null;

    constructor(
        private readonly platform: MediaPlatform,
        private readonly scheduler: Scheduler,
        private readonly options: ZoomMuteMonitorOptions
    ) {
        this.log = createLogger('ZoomMuteMonitor');
    }

    /**
     * Set callback for mute state changes
     */
    public setCallback(callback: MuteChangeCallback | null): void {
        this.callback = callback;
    }

    /**
     * Set callback for active/inactive transitions
     */
    public setStateCallback(callback: MonitorStateCallback | null): void {
        this.stateCallback = callback;
    }

    public start(): void {
        if (this.unsubscribeLifecycle) {
            this.log.debug('Already started');
            return;
        }

        this.log.info(`Starting, watching for ${this.options.appName}`);
        this.unsubscribeLifecycle = this.platform.subscribeAppLifecycle({
            onLaunch: (appName) => {
                if (appName !== this.options.appName) return;
                this.log.info(`${appName} launch detected, starting poll`);
                this.activate();
            },
            onTerminate: (appName) => {
                if (appName !== this.options.appName) return;
                this.log.info(`${appName} termination detected, stopping poll`);
                this.deactivate();
            },
        });

        let running: boolean;
        try {
            running = this.platform.isExternalAppRunning(this.options.appName);
        } catch (error) {
            this.log.error(
                `Failed to check whether ${this.options.appName} is running, waiting for launch:`,
                error
            );
            return;
        }

        if (running) {
            this.log.info(`${this.options.appName} is already running, starting poll`);
            this.activate();
        }
    }

    public stop(): void {
        if (!this.unsubscribeLifecycle) return;

        this.log.info('Stopping');
        this.unsubscribeLifecycle();
        this.unsubscribeLifecycle = null;
        this.deactivate();
    }

    public getState(): MuteMonitorState {
        return this.state;
    }

    public isActive(): boolean {
        return this.state === 'active';
    }

    /**
     * Last known mute value, regardless of whether the app is running
     */
    public lastKnownMuted(): boolean {
        return this.lastMuteState === true;
    }

    /**
     * Is the app running and muted?
     */
    public muted(): boolean {
        return this.isActive() && this.lastKnownMuted();
    }

    /**
     * Poll tick: query the app and report a change. The first successful
     * poll after each activation always reports.
     */
    public poll(): void {
        if (!this.isActive()) return;

        let muteState: boolean;
        try {
            muteState = this.platform.isExternalAppMuted(this.options.appName);
        } catch (error) {
            this.log.error('Failed to query mute state:', error);
            return;
        }

        if (!this.reportNextPoll && muteState === this.lastMuteState) {
            return;
        }

        this.log.debug(`Mute state changed: ${muteState}`);
        this.lastMuteState = muteState;
        this.reportNextPoll = false;

        if (!this.callback) return;
        try {
            this.callback(muteState);
        } catch (error) {
            this.log.error('Error calling mute callback:', error);
        }
    }

    private activate(): void {
        if (this.state === 'active') {
            this.log.debug('Already active');
            return;
        }

        this.state = 'active';
        this.reportNextPoll = true;
        this.pollTimer = this.scheduler.scheduleEvery(this.options.pollIntervalSeconds, () => this.poll());
        this.poll();
        this.notifyState();
    }

    private deactivate(): void {
        if (this.pollTimer) {
            this.pollTimer.cancel();
            this.pollTimer = null;
        }

        if (this.state === 'inactive') return;

        this.state = 'inactive';
        this.notifyState();
    }

    private notifyState(): void {
        if (!this.stateCallback) return;
        try {
            this.stateCallback(this.state);
        } catch (error) {
            this.log.error('Error calling state callback:', error);
        }
    }
}
