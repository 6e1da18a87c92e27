/**
 * Device Signal Sources
 *
 * Two interchangeable producers of device signals: one forwards the
 * platform's push events, the other polls device snapshots and diffs them
 * (for hosts whose device watcher callbacks do not fire reliably).
 * Consumers only see DeviceSignalHandlers and cannot tell them apart.
 */

import { createLogger, ScopedLogger } from '../mainLogger.js';
import {
    CancellableHandle,
    DeviceEvent,
    DeviceHandle,
    DeviceKind,
    DeviceSignalHandlers,
    MediaPlatform,
    Scheduler,
    SignalSource,
    SignalSourceKind,
    Unsubscribe,
} from './types.js';

type SignalName = keyof DeviceSignalHandlers;

/**
 * Devices of a kind currently reported in use
 */
export function listActiveDevices(platform: MediaPlatform, kind: DeviceKind): DeviceHandle[] {
    return kind === 'camera' ? platform.listActiveCameras() : platform.listActiveMicrophones();
}

function dispatchSignal(
    logger: ScopedLogger,
    handlers: DeviceSignalHandlers,
    signal: SignalName,
    device: DeviceHandle
): void {
    try {
        handlers[signal](device);
    } catch (error) {
        logger.error(`Error handling ${signal} for ${device.kind} ${device.displayName}:`, error);
    }
}

/**
 * Push-based source backed by the platform's device event subscription
 */
export class EventSignalSource implements SignalSource {
    private readonly log: ScopedLogger;
    private unsubscribe: Unsubscribe | null = null;
    /** Devices seen so far, by ID, so removals can still be named */
    private knownDevices: Map<string, DeviceHandle> = new Map();

    constructor(
        public readonly kind: DeviceKind,
        private readonly platform: MediaPlatform
    ) {
        this.log = createLogger(`EventSignalSource(${kind})`);
    }

    public start(handlers: DeviceSignalHandlers): void {
        if (this.unsubscribe) {
            this.log.debug('Already started');
            return;
        }

        this.knownDevices.clear();
        try {
            for (const device of this.platform.listDevices(this.kind)) {
                this.knownDevices.set(device.id, device);
            }
        } catch (error) {
            this.log.error('Initial device snapshot failed, starting empty:', error);
        }

        this.unsubscribe = this.platform.subscribeDeviceEvents(this.kind, {
            onAdded: (event) => {
                const device = this.resolve(event, 'onAdded');
                if (device) {
                    this.knownDevices.set(device.id, device);
                    dispatchSignal(this.log, handlers, 'onAdded', device);
                }
            },
            onRemoved: (event) => {
                const device = this.knownDevices.get(event.id);
                if (!device) {
                    this.log.warn(`Removal of unknown ${event.kind} ${event.id} ignored`);
                    return;
                }
                this.knownDevices.delete(event.id);
                dispatchSignal(this.log, handlers, 'onRemoved', device);
            },
            onBecameUsed: (event) => {
                const device = this.resolve(event, 'onBecameUsed');
                if (device) {
                    dispatchSignal(this.log, handlers, 'onBecameUsed', device);
                }
            },
            onBecameUnused: (event) => {
                const device = this.resolve(event, 'onBecameUnused');
                if (device) {
                    dispatchSignal(this.log, handlers, 'onBecameUnused', device);
                }
            },
        });

        this.log.info(`Watching ${this.knownDevices.size} device(s) via platform events`);
    }

    public stop(): void {
        if (!this.unsubscribe) return;

        this.unsubscribe();
        this.unsubscribe = null;
        this.log.info('Stopped');
    }

    public isRunning(): boolean {
        return this.unsubscribe !== null;
    }

    /**
     * Map an event's device ID to a handle from the current snapshot
     */
    private resolve(event: DeviceEvent, signal: SignalName): DeviceHandle | undefined {
        const device = this.platform.findDevice(event.id);
        if (!device || device.kind !== this.kind) {
            this.log.warn(`Unknown ${event.kind} ${event.id} in ${signal}, ignoring`);
            return undefined;
        }
        return device;
    }
}

/**
 * Poll-based source: diffs device lists and in-use sets on an interval
 */
export class PollingSignalSource implements SignalSource {
    private readonly log: ScopedLogger;
    private timer: CancellableHandle | null = null;
    private handlers: DeviceSignalHandlers | null = null;
    private knownDevices: Map<string, DeviceHandle> = new Map();
    private activeIds: Set<string> = new Set();

    constructor(
        public readonly kind: DeviceKind,
        private readonly platform: MediaPlatform,
        private readonly scheduler: Scheduler,
        private readonly intervalSeconds: number
    ) {
        this.log = createLogger(`PollingSignalSource(${kind})`);
    }

    public start(handlers: DeviceSignalHandlers): void {
        if (this.timer) {
            this.log.debug('Already started');
            return;
        }

        this.handlers = handlers;
        try {
            this.knownDevices = new Map(this.platform.listDevices(this.kind).map((d) => [d.id, d]));
            this.activeIds = new Set(listActiveDevices(this.platform, this.kind).map((d) => d.id));
        } catch (error) {
            // The first successful poll reports everything as new
            this.log.error('Initial device snapshot failed, starting empty:', error);
            this.knownDevices = new Map();
            this.activeIds = new Set();
        }

        this.timer = this.scheduler.scheduleEvery(this.intervalSeconds, () => this.poll());
        this.log.info(`Polling ${this.knownDevices.size} device(s) every ${this.intervalSeconds}s`);
    }

    public stop(): void {
        if (!this.timer) return;

        this.timer.cancel();
        this.timer = null;
        this.handlers = null;
        this.log.info('Stopped');
    }

    public isRunning(): boolean {
        return this.timer !== null;
    }

    /**
     * One poll tick. Emits added, became-used, became-unused, removed in
     * that order.
     */
    public poll(): void {
        const handlers = this.handlers;
        if (!handlers) return;

        let devices: DeviceHandle[];
        let active: DeviceHandle[];
        try {
            devices = this.platform.listDevices(this.kind);
            active = listActiveDevices(this.platform, this.kind);
        } catch (error) {
            this.log.error('Device snapshot failed, skipping poll:', error);
            return;
        }

        const current = new Map(devices.map((d) => [d.id, d]));
        const activeIds = new Set(active.map((d) => d.id));

        for (const device of devices) {
            if (!this.knownDevices.has(device.id)) {
                dispatchSignal(this.log, handlers, 'onAdded', device);
            }
        }

        for (const device of active) {
            if (!this.activeIds.has(device.id)) {
                dispatchSignal(this.log, handlers, 'onBecameUsed', device);
            }
        }

        for (const id of this.activeIds) {
            if (!activeIds.has(id)) {
                const device = current.get(id) ?? this.knownDevices.get(id);
                if (device) {
                    dispatchSignal(this.log, handlers, 'onBecameUnused', device);
                }
            }
        }

        for (const [id, device] of this.knownDevices) {
            if (!current.has(id)) {
                dispatchSignal(this.log, handlers, 'onRemoved', device);
            }
        }

        this.knownDevices = current;
        this.activeIds = activeIds;
    }
}

export function createSignalSource(
    sourceKind: SignalSourceKind,
    deviceKind: DeviceKind,
    platform: MediaPlatform,
    scheduler: Scheduler,
    pollIntervalSeconds: number
): SignalSource {
    if (sourceKind === 'polling') {
        return new PollingSignalSource(deviceKind, platform, scheduler, pollIntervalSeconds);
    }
    return new EventSignalSource(deviceKind, platform);
}
