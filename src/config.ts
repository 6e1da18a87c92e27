/**
 * Watcher Configuration
 *
 * Defaults, environment overrides and validation for the watcher.
 *
 * ENVIRONMENT:
 * - Values can be overridden with WATCHLIGHT_* variables, optionally loaded
 *   from a dotenv file with loadEnvironment()
 * - Explicit overrides passed to resolveConfig() win over the environment
 */

import fs from 'fs';
import { config as dotenvConfig } from 'dotenv';
import { createLogger, isLogLevel, LogLevel } from './mainLogger.js';
import { SIGNAL_SOURCE_KINDS, SignalSourceKind } from './media/types.js';

const log = createLogger('Config');

export interface WatcherConfig {
    /** Monitor cameras at all; when false cameras never count as in use */
    monitorCameras: boolean;
    /** Monitor microphones at all; when false mics never count as in use */
    monitorMics: boolean;
    /**
     * The conferencing app grabs the microphone and mutes internally, which
     * looks like a microphone in use. Honor the app's own mute while it runs.
     */
    honorExternalAppMute: boolean;
    /** Delay before acting on "camera stopped" (0 disables the debounce) */
    cameraOffDebounceSeconds: number;
    /** How often to poll the external app's mute state while it runs */
    appMutePollIntervalSeconds: number;
    /** Process name of the conferencing app */
    externalAppName: string;
    cameraSignalSource: SignalSourceKind;
    micSignalSource: SignalSourceKind;
    /** Interval for 'polling' signal sources */
    devicePollIntervalSeconds: number;
    /** Register a menu bar indicator on start */
    enableMenubar: boolean;
    /** Register the default screen border indicator on start */
    enableDefaultIndicators: boolean;
    logLevel: LogLevel;
}

export const DEFAULT_WATCHER_CONFIG: Readonly<WatcherConfig> = Object.freeze<WatcherConfig>({
    monitorCameras: true,
    monitorMics: true,
    honorExternalAppMute: true,
    cameraOffDebounceSeconds: 5,
    appMutePollIntervalSeconds: 5,
    externalAppName: 'zoom.us',
    cameraSignalSource: 'events',
    // Microphone device callbacks are unreliable on some hosts
    micSignalSource: 'polling',
    devicePollIntervalSeconds: 1,
    enableMenubar: true,
    enableDefaultIndicators: true,
    logLevel: 'info',
});

export class ConfigError extends Error {
    constructor(
        public readonly key: keyof WatcherConfig,
        message: string
    ) {
        super(`Invalid configuration for ${key}: ${message}`);
        this.name = 'ConfigError';
    }
}

const BOOLEAN_KEYS = [
    'monitorCameras',
    'monitorMics',
    'honorExternalAppMute',
    'enableMenubar',
    'enableDefaultIndicators',
] as const;

const DELAY_KEYS = ['cameraOffDebounceSeconds'] as const;

const INTERVAL_KEYS = ['appMutePollIntervalSeconds', 'devicePollIntervalSeconds'] as const;

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws ConfigError for the first invalid value found
 */
export function resolveConfig(
    overrides: Partial<WatcherConfig> = {},
    base: Readonly<WatcherConfig> = DEFAULT_WATCHER_CONFIG
): Readonly<WatcherConfig> {
    const merged: WatcherConfig = { ...base };
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
            Object.assign(merged, { [key]: value });
        }
    }

    for (const key of BOOLEAN_KEYS) {
        if (typeof merged[key] !== 'boolean') {
            throw new ConfigError(key, `expected a boolean, got ${String(merged[key])}`);
        }
    }

    for (const key of DELAY_KEYS) {
        const value = merged[key];
        if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
            throw new ConfigError(key, `expected a non-negative number of seconds, got ${String(value)}`);
        }
    }

    for (const key of INTERVAL_KEYS) {
        const value = merged[key];
        if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
            throw new ConfigError(key, `expected a positive number of seconds, got ${String(value)}`);
        }
    }

    for (const key of ['cameraSignalSource', 'micSignalSource'] as const) {
        if (!SIGNAL_SOURCE_KINDS.includes(merged[key])) {
            throw new ConfigError(key, `expected one of ${SIGNAL_SOURCE_KINDS.join(', ')}, got ${String(merged[key])}`);
        }
    }

    if (typeof merged.externalAppName !== 'string' || merged.externalAppName.trim() === '') {
        throw new ConfigError('externalAppName', 'expected a non-empty string');
    }

    if (!isLogLevel(merged.logLevel)) {
        throw new ConfigError('logLevel', `unknown level ${String(merged.logLevel)}`);
    }

    return Object.freeze(merged);
}

/**
 * Load a dotenv file into process.env if it exists
 *
 * @returns true when the file was found and loaded
 */
export function loadEnvironment(envPath: string): boolean {
    if (!fs.existsSync(envPath)) {
        log.debug('No env file found at:', envPath);
        return false;
    }

    const result = dotenvConfig({ path: envPath });
    if (result.error) {
        log.error('Failed to load env file:', envPath, result.error);
        return false;
    }

    log.info('Loaded environment variables from', envPath);
    return true;
}

function parseBoolean(key: keyof WatcherConfig, name: string, raw: string): boolean {
    const value = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(value)) return true;
    if (['0', 'false', 'no', 'off'].includes(value)) return false;
    throw new ConfigError(key, `${name} must be a boolean, got "${raw}"`);
}

function parseSeconds(key: keyof WatcherConfig, name: string, raw: string): number {
    const value = Number(raw.trim());
    if (raw.trim() === '' || Number.isNaN(value)) {
        throw new ConfigError(key, `${name} must be a number, got "${raw}"`);
    }
    return value;
}

/**
 * Read WATCHLIGHT_* variables into a partial config. Range checks are left
 * to resolveConfig().
 *
 * @throws ConfigError for a value that does not parse
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<WatcherConfig> {
    const result: Partial<WatcherConfig> = {};

    const monitorCameras = env.WATCHLIGHT_MONITOR_CAMERAS;
    if (monitorCameras !== undefined) {
        result.monitorCameras = parseBoolean('monitorCameras', 'WATCHLIGHT_MONITOR_CAMERAS', monitorCameras);
    }

    const monitorMics = env.WATCHLIGHT_MONITOR_MICS;
    if (monitorMics !== undefined) {
        result.monitorMics = parseBoolean('monitorMics', 'WATCHLIGHT_MONITOR_MICS', monitorMics);
    }

    const honorMute = env.WATCHLIGHT_HONOR_EXTERNAL_APP_MUTE;
    if (honorMute !== undefined) {
        result.honorExternalAppMute = parseBoolean('honorExternalAppMute', 'WATCHLIGHT_HONOR_EXTERNAL_APP_MUTE', honorMute);
    }

    const debounce = env.WATCHLIGHT_CAMERA_OFF_DEBOUNCE_SECONDS;
    if (debounce !== undefined) {
        result.cameraOffDebounceSeconds = parseSeconds('cameraOffDebounceSeconds', 'WATCHLIGHT_CAMERA_OFF_DEBOUNCE_SECONDS', debounce);
    }

    const pollInterval = env.WATCHLIGHT_APP_MUTE_POLL_INTERVAL_SECONDS;
    if (pollInterval !== undefined) {
        result.appMutePollIntervalSeconds = parseSeconds('appMutePollIntervalSeconds', 'WATCHLIGHT_APP_MUTE_POLL_INTERVAL_SECONDS', pollInterval);
    }

    if (env.WATCHLIGHT_EXTERNAL_APP_NAME) {
        result.externalAppName = env.WATCHLIGHT_EXTERNAL_APP_NAME;
    }

    const logLevel = env.WATCHLIGHT_LOG_LEVEL;
    if (logLevel !== undefined) {
        if (!isLogLevel(logLevel)) {
            throw new ConfigError('logLevel', `unknown level ${logLevel}`);
        }
        result.logLevel = logLevel;
    }

    return result;
}
