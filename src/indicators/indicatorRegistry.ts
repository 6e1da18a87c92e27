/**
 * Indicator Registry
 *
 * Ordered dispatch list of indicators. Every broadcast reaches indicators
 * in registration order and each call is isolated: an indicator that throws
 * is logged and skipped, the rest still run. The registry owns membership
 * only; each indicator owns its own on-screen resources.
 */

import { createLogger } from '../mainLogger.js';
import { Indicator, IndicatorCreateResult, IndicatorUpdate } from './types.js';

const log = createLogger('IndicatorRegistry');

export interface IndicatorHandle {
    indicator: Indicator;
    /** Inactive entries are skipped by broadcasts but stay registered */
    active: boolean;
}

type IndicatorOperation = 'update' | 'refresh' | 'mute' | 'unmute' | 'delete';

export class IndicatorRegistry {
    private entries: IndicatorHandle[] = [];

    /**
     * Append an indicator. A failed creation result is logged and ignored.
     * No deduplication: registering the same indicator twice dispatches to
     * it twice.
     *
     * @returns the added indicator, or null when nothing was added
     */
    public register(candidate: Indicator | IndicatorCreateResult): Indicator | null {
        let indicator: Indicator;
        if ('success' in candidate) {
            if (!candidate.success) {
                log.warn('Indicator registration skipped:', candidate.error);
                return null;
            }
            indicator = candidate.indicator;
        } else {
            indicator = candidate;
        }

        this.entries.push({ indicator, active: true });
        log.debug(`Added Indicator ${indicator.name}: ${this.entries.length} total`);
        return indicator;
    }

    /**
     * Delete an indicator and remove every entry for it
     *
     * @returns true if it was registered
     */
    public unregister(indicator: Indicator): boolean {
        const before = this.entries.length;
        this.entries = this.entries.filter((entry) => entry.indicator !== indicator);
        if (this.entries.length === before) {
            return false;
        }

        this.invoke({ indicator, active: true }, 'delete', (i) => i.delete());
        log.debug(`Removed Indicator ${indicator.name}: ${this.entries.length} total`);
        return true;
    }

    /**
     * @returns true if the indicator is registered
     */
    public setActive(indicator: Indicator, active: boolean): boolean {
        let found = false;
        for (const entry of this.entries) {
            if (entry.indicator === indicator) {
                entry.active = active;
                found = true;
            }
        }
        return found;
    }

    public getIndicators(): Indicator[] {
        return this.entries.map((entry) => entry.indicator);
    }

    public size(): number {
        return this.entries.length;
    }

    public broadcastUpdate(update: IndicatorUpdate): void {
        const instigator = update.instigator ? ` (instigator: ${update.instigator.displayName})` : '';
        log.debug(`Updating ${this.entries.length} indicators to ${update.state}${instigator}`);
        this.broadcast('update', (indicator) => indicator.update(update));
    }

    /**
     * Let indicators recompute placement after a display change
     */
    public broadcastRefresh(): void {
        log.debug(`Refreshing ${this.entries.length} indicators`);
        this.broadcast('refresh', (indicator) => indicator.refresh());
    }

    public broadcastMute(): void {
        log.debug(`Muting ${this.entries.length} indicators`);
        this.broadcast('mute', (indicator) => indicator.mute());
    }

    public broadcastUnmute(): void {
        log.debug(`Unmuting ${this.entries.length} indicators`);
        this.broadcast('unmute', (indicator) => indicator.unmute());
    }

    /**
     * Delete every indicator, active or not, then clear the list
     */
    public teardownAll(): void {
        log.debug(`Deleting ${this.entries.length} indicators`);
        const entries = this.entries;
        this.entries = [];
        for (const entry of entries) {
            this.invoke(entry, 'delete', (indicator) => indicator.delete());
        }
    }

    private broadcast(operation: IndicatorOperation, fn: (indicator: Indicator) => void): void {
        // Snapshot so an indicator (un)registering mid-broadcast does not
        // shift the iteration
        for (const entry of [...this.entries]) {
            if (!entry.active) continue;
            this.invoke(entry, operation, fn);
        }
    }

    private invoke(entry: IndicatorHandle, operation: IndicatorOperation, fn: (indicator: Indicator) => void): void {
        try {
            fn(entry.indicator);
        } catch (error) {
            log.error(`Error calling ${entry.indicator.name}.${operation}():`, error);
        }
    }
}
