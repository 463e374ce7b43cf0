/**
 * Zoom easing for drag tuning
 *
 * Deep zooms move more screen pixels per image pixel, so tiles get larger
 * margins, coarser quantisation and longer throttles as zoom grows.
 */

export interface ZoomCurve {
    zoomLow: number;
    zoomHigh: number;
}

export interface DragTuning extends ZoomCurve {
    dragMarginLowPx: number;
    dragMarginHighPx: number;
    dragQuantLowPx: number;
    dragQuantHighPx: number;
    debounceLowMs: number;
    debounceHighMs: number;
}

export interface DragParams {
    marginPx: number;
    quantPx: number;
    debounceMs: number;
}

export function clamp(v: number, lo: number, hi: number): number {
    return Math.max(lo, Math.min(hi, v));
}

export function lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
}

/** Smoothstep of zoom between zoomLow (0) and zoomHigh (1) */
export function zoomT(zoom: number, curve: ZoomCurve): number {
    const span = curve.zoomHigh - curve.zoomLow;
    if (span <= 0) return zoom >= curve.zoomHigh ? 1 : 0;
    const t = clamp((zoom - curve.zoomLow) / span, 0, 1);
    return t * t * (3 - 2 * t);
}

export function scaledDragParams(zoom: number, tuning: DragTuning): DragParams {
    const t = zoomT(zoom, tuning);
    return {
        marginPx: clamp(Math.round(lerp(tuning.dragMarginLowPx, tuning.dragMarginHighPx, t)), 80, 900),
        quantPx: clamp(Math.round(lerp(tuning.dragQuantLowPx, tuning.dragQuantHighPx, t)), 8, 256),
        debounceMs: clamp(Math.round(lerp(tuning.debounceLowMs, tuning.debounceHighMs, t)), 8, 200),
    };
}

/** Interval eased between two endpoints by zoom */
export function easedInterval(zoom: number, curve: ZoomCurve, lowMs: number, highMs: number): number {
    return lerp(lowMs, highMs, zoomT(zoom, curve));
}
