export { DeviceWatcher, WATCHER_EVENTS } from './core/deviceWatcher.js';
export type { DeviceWatcherDeps } from './core/deviceWatcher.js';
export { AggregationEngine } from './core/aggregationEngine.js';
export type {
    DisplayStateChange,
    DisplayStateChangeCallback,
    DisplayStateSink,
    EngineCollaborators,
    EngineOptions,
    ExternalAppActivity,
    PendingCameraOff,
} from './core/aggregationEngine.js';
export {
    computeDisplayState,
    DisplayState,
    isAnyActive,
    isCameraActive,
    isMicActive,
    isSuppressed,
    suppress,
} from './core/displayState.js';
export type { UsageInputs } from './core/displayState.js';

export { ConfigError, configFromEnv, DEFAULT_WATCHER_CONFIG, loadEnvironment, resolveConfig } from './config.js';
export type { WatcherConfig } from './config.js';
export { createLogger, initializeLogger, isLogLevel, LOG_LEVELS, setDebugLogging } from './mainLogger.js';
export type { LoggerOptions, LogLevel, ScopedLogger } from './mainLogger.js';

export { CameraDebounce } from './media/cameraDebounce.js';
export type { PendingTransition } from './media/cameraDebounce.js';
export { createSignalSource, EventSignalSource, PollingSignalSource } from './media/signalSources.js';
export { TimerScheduler } from './media/timerScheduler.js';
export { ZoomMuteMonitor } from './media/zoomMuteMonitor.js';
export type { ZoomMuteMonitorOptions } from './media/zoomMuteMonitor.js';
export * from './media/types.js';

export { IndicatorRegistry } from './indicators/indicatorRegistry.js';
export type { IndicatorHandle } from './indicators/indicatorRegistry.js';
export { resolveFrame, showWhenAnyActive, showWhenCameraActive, showWhenMicActive } from './indicators/indicatorCore.js';
export type { ShowFilter } from './indicators/indicatorCore.js';
export {
    DEFAULT_FLASHING_ICON_OPTIONS,
    FlashingIconIndicator,
} from './indicators/flashingIconIndicator.js';
export type { FlashingIconOptions } from './indicators/flashingIconIndicator.js';
export { DEFAULT_SCREEN_BORDER_OPTIONS, ScreenBorderIndicator } from './indicators/screenBorderIndicator.js';
export type { ScreenBorderOptions } from './indicators/screenBorderIndicator.js';
export { DEFAULT_MENU_BAR_OPTIONS, MenuBarIndicator } from './indicators/menuBarIndicator.js';
export type { MenuBarControls, MenuBarCreateOptions, MenuBarOptions, MenuBarTitles } from './indicators/menuBarIndicator.js';
export type * from './indicators/types.js';
