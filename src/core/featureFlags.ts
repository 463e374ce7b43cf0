/**
 * Feature flags for viewer behaviour
 * Stored in localStorage so they can be flipped from devtools without a rebuild.
 */

import { createLogger } from './logger';

const log = createLogger('Flags');

export interface FeatureFlags {
    /** Keep the sharp layer frozen during drags until the view escapes the tile */
    dragFreeze: boolean;
    /** Show the low-resolution proxy layer while dragging */
    dragPreview: boolean;
    /** Outline the current sharp tile on the viewport */
    tileDebugOverlay: boolean;
    /** Whether drag and drop of .tim files is enabled */
    dropZoneEnabled: boolean;
}

const STORAGE_KEY = 'tim-viewer-flags';

const defaults: FeatureFlags = {
    dragFreeze: true,
    dragPreview: true,
    tileDebugOverlay: false,
    dropZoneEnabled: true,
};

function isFlagRecord(value: unknown): value is Partial<FeatureFlags> {
    if (typeof value !== 'object' || value === null) return false;
    return Object.entries(value).every(([key, v]) => key in defaults && typeof v === 'boolean');
}

function loadFlags(): FeatureFlags {
    if (typeof window === 'undefined') return defaults;

    try {
        const stored = localStorage.getItem(STORAGE_KEY);
        if (stored) {
            const parsed: unknown = JSON.parse(stored);
            if (isFlagRecord(parsed)) {
                return { ...defaults, ...parsed };
            }
            log.warn('Ignoring malformed stored flags');
        }
    } catch (e) {
        log.warn('Failed to read stored flags', e);
    }
    return defaults;
}

let flags = loadFlags();

export function getFlag<K extends keyof FeatureFlags>(key: K): FeatureFlags[K] {
    return flags[key];
}

export function setFlag<K extends keyof FeatureFlags>(key: K, value: FeatureFlags[K]): void {
    flags = { ...flags, [key]: value };
    try {
        localStorage.setItem(STORAGE_KEY, JSON.stringify(flags));
    } catch (e) {
        log.warn('Failed to persist flags', e);
    }
}

export function getAllFlags(): FeatureFlags {
    return { ...flags };
}

export function resetFlags(): void {
    flags = { ...defaults };
    try {
        localStorage.removeItem(STORAGE_KEY);
    } catch (e) {
        log.warn('Failed to clear stored flags', e);
    }
}
