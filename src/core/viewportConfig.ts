/**
 * Viewport tuning
 *
 * Defaults tuned for indexed pixel art at 0.5x-16x. Every engine takes its own
 * overrides; drag freeze and the preview layer also follow the feature flags.
 */

import { getFlag } from './featureFlags';
import { createLogger } from './logger';
import { parseHexColor } from './raster';
import type { PadMode } from './viewportGeometry';
import type { DragTuning } from './zoomCurve';
import type { ResampleFilter, Rgba } from './types';

const log = createLogger('ViewportConfig');

export interface ViewportConfig extends DragTuning {
    minZoom: number;
    maxZoom: number;
    initialZoom: number;
    /** Zoom factor per wheel notch (120 delta units) */
    wheelZoomBase: number;
    pad: PadMode;
    background: Rgba;

    idleMarginPx: number;
    innerTolerancePx: number;
    edgeTriggerPx: number;

    freezeEnabled: boolean;
    escapeThresholdPx: number;
    escapeMinIntervalLowMs: number;
    escapeMinIntervalHighMs: number;

    previewEnabled: boolean;
    previewMinIntervalMs: number;
    previewBiasExtra: number;
    previewFilter: ResampleFilter;

    fallbackMinIntervalLowMs: number;
    fallbackMinIntervalHighMs: number;
    /** Outside-tile floor is this times the zoom curve position */
    fallbackOutsideMinIntervalMs: number;

    pyramidMinDimension: number;
    pyramidMaxLevels: number;
    pyramidFilter: ResampleFilter;
    downscaleFilter: ResampleFilter;
    upscaleFilter: ResampleFilter;
    dragFilter: ResampleFilter;
    levelBias: number;

    settleDelayMs: number;
}

export const DEFAULT_VIEWPORT_CONFIG: ViewportConfig = {
    minZoom: 0.5,
    maxZoom: 16,
    initialZoom: 4,
    wheelZoomBase: 1.125,
    pad: 'auto',
    background: [0x20, 0x20, 0x20, 255],

    idleMarginPx: 160,
    innerTolerancePx: 140,
    edgeTriggerPx: 140,

    zoomLow: 2.5,
    zoomHigh: 10,
    dragMarginLowPx: 260,
    dragMarginHighPx: 420,
    dragQuantLowPx: 32,
    dragQuantHighPx: 64,
    debounceLowMs: 18,
    debounceHighMs: 40,

    freezeEnabled: true,
    escapeThresholdPx: 130,
    escapeMinIntervalLowMs: 0,
    escapeMinIntervalHighMs: 75,

    previewEnabled: true,
    previewMinIntervalMs: 18,
    previewBiasExtra: 0.95,
    previewFilter: 'bilinear',

    fallbackMinIntervalLowMs: 0,
    fallbackMinIntervalHighMs: 55,
    fallbackOutsideMinIntervalMs: 70,

    pyramidMinDimension: 256,
    pyramidMaxLevels: 5,
    pyramidFilter: 'area',
    downscaleFilter: 'area',
    upscaleFilter: 'nearest',
    dragFilter: 'nearest',
    levelBias: 0.55,

    settleDelayMs: 120,
};

export type ViewportConfigOverrides = Partial<Omit<ViewportConfig, 'background'>> & {
    background?: Rgba | string;
};

function nonNegative(name: string, value: number, fallback: number): number {
    if (Number.isFinite(value) && value >= 0) return value;
    log.warn(`Invalid ${name}=${value}, using ${fallback}`);
    return fallback;
}

/**
 * Merge defaults, feature flags and overrides, then repair values that would
 * break the engine (non-finite numbers, inverted zoom range, empty pyramids).
 */
export function resolveViewportConfig(overrides: ViewportConfigOverrides = {}): ViewportConfig {
    const { background, ...rest } = overrides;
    const merged: ViewportConfig = {
        ...DEFAULT_VIEWPORT_CONFIG,
        freezeEnabled: getFlag('dragFreeze'),
        previewEnabled: getFlag('dragPreview'),
        ...rest,
    };

    if (typeof background === 'string') {
        const parsed = parseHexColor(background);
        if (parsed) merged.background = parsed;
        else log.warn(`Invalid background colour "${background}"`);
    } else if (background) {
        merged.background = background;
    }

    const d = DEFAULT_VIEWPORT_CONFIG;
    if (!(merged.minZoom > 0) || !(merged.maxZoom >= merged.minZoom)) {
        log.warn(`Invalid zoom range [${merged.minZoom}, ${merged.maxZoom}], using defaults`);
        merged.minZoom = d.minZoom;
        merged.maxZoom = d.maxZoom;
    }
    if (!(merged.wheelZoomBase > 1)) {
        log.warn(`Invalid wheelZoomBase=${merged.wheelZoomBase}`);
        merged.wheelZoomBase = d.wheelZoomBase;
    }
    if (typeof merged.pad === 'number') {
        merged.pad = nonNegative('pad', merged.pad, 0);
    }
    merged.pyramidMaxLevels = Math.max(1, Math.floor(nonNegative('pyramidMaxLevels', merged.pyramidMaxLevels, d.pyramidMaxLevels)));
    merged.pyramidMinDimension = nonNegative('pyramidMinDimension', merged.pyramidMinDimension, d.pyramidMinDimension);
    merged.idleMarginPx = nonNegative('idleMarginPx', merged.idleMarginPx, d.idleMarginPx);
    merged.innerTolerancePx = nonNegative('innerTolerancePx', merged.innerTolerancePx, d.innerTolerancePx);
    merged.escapeThresholdPx = nonNegative('escapeThresholdPx', merged.escapeThresholdPx, d.escapeThresholdPx);
    merged.previewMinIntervalMs = nonNegative('previewMinIntervalMs', merged.previewMinIntervalMs, d.previewMinIntervalMs);
    merged.settleDelayMs = nonNegative('settleDelayMs', merged.settleDelayMs, d.settleDelayMs);
    if (!(merged.previewBiasExtra > 0)) {
        log.warn('previewBiasExtra must be positive so the preview prefers smaller levels');
        merged.previewBiasExtra = d.previewBiasExtra;
    }
    return merged;
}
