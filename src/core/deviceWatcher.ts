/**
 * Device Watcher
 *
 * Entry point for hosts. Wires the device signal sources, the camera-off
 * debounce, the conferencing app mute monitor, the aggregation engine and
 * the indicator registry together, and emits an event whenever the
 * broadcast DisplayState changes.
 *
 * Usage:
 *   const watcher = new DeviceWatcher({ platform, host });
 *   watcher.on(WATCHER_EVENTS.DISPLAY_STATE_CHANGED, (change) => ...);
 *   watcher.start();
 */

import { EventEmitter } from 'events';
import { configFromEnv, loadEnvironment, resolveConfig, WatcherConfig } from '../config.js';
import { createLogger, initializeLogger, setDebugLogging } from '../mainLogger.js';
import { CameraDebounce } from '../media/cameraDebounce.js';
import { createSignalSource } from '../media/signalSources.js';
import { TimerScheduler } from '../media/timerScheduler.js';
import {
    DeviceHandle,
    DeviceKind,
    DeviceSignalHandlers,
    MediaPlatform,
    Scheduler,
    SignalSource,
    SignalSourceKind,
    Unsubscribe,
} from '../media/types.js';
import { ZoomMuteMonitor } from '../media/zoomMuteMonitor.js';
import { IndicatorRegistry } from '../indicators/indicatorRegistry.js';
import { MenuBarControls, MenuBarIndicator } from '../indicators/menuBarIndicator.js';
import { ScreenBorderIndicator } from '../indicators/screenBorderIndicator.js';
import { Indicator, IndicatorCreateResult, IndicatorHost } from '../indicators/types.js';
import { AggregationEngine, DisplayStateChange } from './aggregationEngine.js';
import { DisplayState } from './displayState.js';

const log = createLogger('DeviceWatcher');

export const WATCHER_EVENTS = {
    /** Payload: DisplayStateChange */
    DISPLAY_STATE_CHANGED: 'display-state-changed',
} as const;

export interface DeviceWatcherDeps {
    platform: MediaPlatform;
    /** Defaults to a setTimeout/setInterval backed scheduler */
    scheduler?: Scheduler;
    /** Surfaces for the default indicators; without it none are created */
    host?: IndicatorHost;
}

export class DeviceWatcher extends EventEmitter implements MenuBarControls {
    private readonly platform: MediaPlatform;
    private readonly scheduler: Scheduler;
    private readonly host: IndicatorHost | null;
    private readonly registry = new IndicatorRegistry();
    private readonly debounce: CameraDebounce;
    private readonly engine: AggregationEngine;
    private config: Readonly<WatcherConfig>;

    private running = false;
    private muteMonitor: ZoomMuteMonitor | null = null;
    private signalSources: SignalSource[] = [];
    private unsubscribeDisplays: Unsubscribe | null = null;

    constructor(deps: DeviceWatcherDeps, options: Partial<WatcherConfig> = {}) {
        super();
        this.platform = deps.platform;
        this.scheduler = deps.scheduler ?? new TimerScheduler();
        this.host = deps.host ?? null;
        this.config = resolveConfig(options);
        this.applyLogLevel(options);

        this.debounce = new CameraDebounce(this.platform, this.scheduler, this.config.cameraOffDebounceSeconds, (device) =>
            this.engine.handleDeviceSignal(device)
        );
        this.engine = new AggregationEngine(
            {
                platform: this.platform,
                sink: this.registry,
                externalApp: { isActive: () => this.muteMonitor?.isActive() ?? false },
                pendingCameraOff: this.debounce,
            },
            this.config
        );
        this.engine.setChangeCallback((change) => this.emitStateChange(change));
    }

    /**
     * Build a watcher from WATCHLIGHT_* environment variables, optionally
     * loading a dotenv file first. Explicit overrides win.
     */
    public static fromEnvironment(
        deps: DeviceWatcherDeps,
        envPath?: string,
        overrides: Partial<WatcherConfig> = {}
    ): DeviceWatcher {
        if (envPath) {
            loadEnvironment(envPath);
        }
        return new DeviceWatcher(deps, { ...configFromEnv(), ...overrides });
    }

    // =========================================================================
    // CONFIGURATION & LIFECYCLE
    // =========================================================================

    /**
     * Change settings. While running, signal sources and the mute monitor
     * are rewired and indicators are updated if the state changed.
     *
     * @throws ConfigError when a value is invalid; nothing is changed then
     */
    public configure(options: Partial<WatcherConfig>): void {
        this.config = resolveConfig(options, this.config);
        this.applyLogLevel(options);
        this.engine.setOptions(this.config);
        this.debounce.setDelay(this.config.cameraOffDebounceSeconds);
        log.info('Configuration updated');

        if (!this.running) return;
        this.stopSignals();
        this.startSignals();
        this.engine.refreshIfChanged();
    }

    public getConfig(): Readonly<WatcherConfig> {
        return this.config;
    }

    public start(): void {
        if (this.running) {
            log.debug('Already running');
            return;
        }

        log.info('Starting');
        this.running = true;
        this.addDefaultIndicators();
        this.startSignals();

        if (this.host) {
            this.unsubscribeDisplays = this.host.displays.onDisplaysChanged(() => {
                log.debug('Display configuration changed, refreshing indicators');
                this.registry.broadcastRefresh();
            });
        }

        this.engine.publish();
    }

    /**
     * Stop watching and delete every registered indicator
     */
    public stop(): void {
        if (!this.running) return;

        log.info('Stopping');
        this.stopSignals();
        this.debounce.cancelAll();

        if (this.unsubscribeDisplays) {
            this.unsubscribeDisplays();
            this.unsubscribeDisplays = null;
        }

        this.registry.teardownAll();
        this.running = false;
    }

    public isRunning(): boolean {
        return this.running;
    }

    /**
     * Enable or disable debug logging
     */
    public debug(enable: boolean): void {
        setDebugLogging(enable);
    }

    // =========================================================================
    // USER ACTIONS & QUERIES
    // =========================================================================

    public mute(): void {
        this.engine.setUserMuted(true);
    }

    public unmute(): void {
        this.engine.setUserMuted(false);
    }

    public isMuted(): boolean {
        return this.engine.isUserMuted();
    }

    public currentDisplayState(): DisplayState {
        return this.engine.recompute();
    }

    public camerasInUse(): DeviceHandle[] {
        return this.engine.camerasInUse();
    }

    public micsInUse(): DeviceHandle[] {
        return this.engine.micsInUse();
    }

    // =========================================================================
    // INDICATORS
    // =========================================================================

    /**
     * Add an indicator, or a factory result. The new indicator is brought
     * up to date with the last broadcast state.
     *
     * @returns false when a failed result was passed
     */
    public registerIndicator(candidate: Indicator | IndicatorCreateResult): boolean {
        const indicator = this.registry.register(candidate);
        if (!indicator) return false;

        this.syncIndicator(indicator);
        return true;
    }

    public unregisterIndicator(indicator: Indicator): boolean {
        return this.registry.unregister(indicator);
    }

    /**
     * Pause or resume dispatch to an indicator without removing it
     */
    public setIndicatorActive(indicator: Indicator, active: boolean): boolean {
        const found = this.registry.setActive(indicator, active);
        if (found && active) {
            this.syncIndicator(indicator);
        }
        return found;
    }

    public getIndicators(): Indicator[] {
        return this.registry.getIndicators();
    }

    // =========================================================================
    // PRIVATE
    // =========================================================================

    private startSignals(): void {
        const { config } = this;

        if (config.monitorCameras) {
            this.startSource(config.cameraSignalSource, 'camera', {
                onBecameUsed: (device) => this.debounce.onCameraBecameUsed(device),
                onBecameUnused: (device) => this.debounce.onCameraBecameUnused(device),
            });
        }

        if (config.monitorMics) {
            this.startSource(config.micSignalSource, 'microphone', {
                onBecameUsed: (device) => this.engine.handleDeviceSignal(device),
                onBecameUnused: (device) => this.engine.handleDeviceSignal(device),
            });
        }

        if (config.monitorMics && config.honorExternalAppMute) {
            const monitor = new ZoomMuteMonitor(this.platform, this.scheduler, {
                appName: config.externalAppName,
                pollIntervalSeconds: config.appMutePollIntervalSeconds,
            });
            monitor.setCallback((muted) => this.engine.onExternalMuteChanged(muted));
            monitor.setStateCallback((state) => {
                log.debug(`${config.externalAppName} mute monitor ${state}`);
                this.engine.refreshIfChanged();
            });
            this.muteMonitor = monitor;
            monitor.start();
        }
    }

    private startSource(
        sourceKind: SignalSourceKind,
        deviceKind: DeviceKind,
        usage: Pick<DeviceSignalHandlers, 'onBecameUsed' | 'onBecameUnused'>
    ): void {
        const source = createSignalSource(
            sourceKind,
            deviceKind,
            this.platform,
            this.scheduler,
            this.config.devicePollIntervalSeconds
        );
        source.start({
            onAdded: (device) => log.info(`${deviceKind} added: ${device.displayName}`),
            onRemoved: (device) => {
                log.info(`${deviceKind} removed: ${device.displayName}`);
                this.engine.refreshIfChanged(device);
            },
            ...usage,
        });
        this.signalSources.push(source);
    }

    private stopSignals(): void {
        for (const source of this.signalSources) {
            source.stop();
        }
        this.signalSources = [];

        if (this.muteMonitor) {
            this.muteMonitor.stop();
            this.muteMonitor = null;
        }
    }

    private addDefaultIndicators(): void {
        const { host, config } = this;
        if (!config.enableMenubar && !config.enableDefaultIndicators) return;

        if (!host) {
            log.warn('No indicator host provided, skipping default indicators');
            return;
        }

        if (config.enableMenubar) {
            this.registerIndicator(
                MenuBarIndicator.create('menubar', host.trays, this, {
                    monitorCameras: config.monitorCameras,
                    monitorMics: config.monitorMics,
                })
            );
        }

        if (config.enableDefaultIndicators) {
            this.registerIndicator(ScreenBorderIndicator.create('border', host, this.scheduler));
        }
    }

    /**
     * Bring one indicator in line with the user mute and last broadcast
     */
    private syncIndicator(indicator: Indicator): void {
        const state = this.engine.lastBroadcastState();
        try {
            if (this.engine.isUserMuted()) {
                indicator.mute();
            }
            if (state !== null) {
                indicator.update({ state });
            }
        } catch (error) {
            log.error(`Error bringing ${indicator.name} up to date:`, error);
        }
    }

    private applyLogLevel(options: Partial<WatcherConfig>): void {
        if (options.logLevel !== undefined) {
            initializeLogger({ level: options.logLevel });
        }
    }

    private emitStateChange(change: DisplayStateChange): void {
        log.info(`Display state ${change.previous ?? 'none'} -> ${change.state}`);
        // Raw listeners so once() wrappers remove themselves
        for (const listener of this.rawListeners(WATCHER_EVENTS.DISPLAY_STATE_CHANGED)) {
            try {
                Reflect.apply(listener, this, [change]);
            } catch (error) {
                log.error(`Error calling ${WATCHER_EVENTS.DISPLAY_STATE_CHANGED} listener:`, error);
            }
        }
    }
}
