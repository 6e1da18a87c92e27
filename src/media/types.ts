/**
 * Media Device Types
 *
 * Type definitions for capture devices and the platform collaborators the
 * watcher consumes. Device enumeration and event subscription are provided
 * by the host; nothing here talks to hardware.
 */

/**
 * Classes of capture device the watcher tracks
 */
export type DeviceKind = 'camera' | 'microphone';

/**
 * Opaque reference to a camera or microphone
 */
export interface DeviceHandle {
    /** Stable unique key (device UID) */
    id: string;
    kind: DeviceKind;
    displayName: string;
}

/**
 * Device event as delivered by the platform: only the ID is carried,
 * the handle is resolved against the current snapshot.
 */
export interface DeviceEvent {
    id: string;
    kind: DeviceKind;
}

/**
 * Returned by every subscription; calling it stops delivery
 */
export type Unsubscribe = () => void;

/**
 * Timer handle returned by the scheduler
 */
export interface CancellableHandle {
    cancel(): void;
}

export interface Scheduler {
    /** Run callback once after the given number of seconds */
    scheduleAfter(seconds: number, callback: () => void): CancellableHandle;
    /** Run callback every given number of seconds until cancelled */
    scheduleEvery(seconds: number, callback: () => void): CancellableHandle;
}

export interface DeviceEventHandlers {
    onAdded(event: DeviceEvent): void;
    onRemoved(event: DeviceEvent): void;
    onBecameUsed(event: DeviceEvent): void;
    onBecameUnused(event: DeviceEvent): void;
}

export interface AppLifecycleHandlers {
    onLaunch(appName: string): void;
    onTerminate(appName: string): void;
}

/**
 * Snapshot queries and event subscriptions provided by the host platform.
 * All queries are synchronous reads and may be stale between polls.
 */
export interface MediaPlatform {
    /** All attached devices of a kind, in use or not */
    listDevices(kind: DeviceKind): DeviceHandle[];
    listActiveCameras(): DeviceHandle[];
    listActiveMicrophones(): DeviceHandle[];
    /** Resolve a device ID against the current snapshot */
    findDevice(id: string): DeviceHandle | undefined;
    isExternalAppRunning(name: string): boolean;
    /** Only meaningful while the app is running */
    isExternalAppMuted(name: string): boolean;
    subscribeDeviceEvents(kind: DeviceKind, handlers: DeviceEventHandlers): Unsubscribe;
    subscribeAppLifecycle(handlers: AppLifecycleHandlers): Unsubscribe;
}

/**
 * Normalized device signals produced by a signal source
 */
export interface DeviceSignalHandlers {
    onAdded(device: DeviceHandle): void;
    onRemoved(device: DeviceHandle): void;
    onBecameUsed(device: DeviceHandle): void;
    onBecameUnused(device: DeviceHandle): void;
}

export type SignalSourceKind = 'events' | 'polling';

export const SIGNAL_SOURCE_KINDS: readonly SignalSourceKind[] = ['events', 'polling'];

/**
 * Pluggable producer of device signals for one device kind
 */
export interface SignalSource {
    readonly kind: DeviceKind;
    start(handlers: DeviceSignalHandlers): void;
    stop(): void;
    isRunning(): boolean;
}

/**
 * Activity states of the external app mute monitor
 */
export type MuteMonitorState = 'inactive' | 'active';
