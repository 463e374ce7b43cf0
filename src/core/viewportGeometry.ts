/**
 * Viewport geometry
 *
 * Three coordinate spaces:
 *   screen - canvas pixels, origin at the canvas' top-left
 *   world  - the scroll region: `pad` screen px of margin, then the image at `zoom`
 *   image  - source pixels
 *
 * world = pad + image * zoom, screen = world - scroll
 */

import type { Rect } from './types';

export type PadMode = 'auto' | number;

export interface ViewportMetrics {
    zoom: number;
    scrollX: number;
    scrollY: number;
    canvasWidth: number;
    canvasHeight: number;
    pad: number;
    imageWidth: number;
    imageHeight: number;
}

export interface Point {
    x: number;
    y: number;
}

// ============================================================================
// Rect helpers
// ============================================================================

export function isEmptyRect(r: Rect): boolean {
    return r.right <= r.left || r.bottom <= r.top;
}

export function clipRect(r: Rect, width: number, height: number): Rect {
    return {
        left: Math.max(0, Math.min(width, r.left)),
        top: Math.max(0, Math.min(height, r.top)),
        right: Math.max(0, Math.min(width, r.right)),
        bottom: Math.max(0, Math.min(height, r.bottom)),
    };
}

export function containsRect(outer: Rect, inner: Rect): boolean {
    return inner.left >= outer.left
        && inner.top >= outer.top
        && inner.right <= outer.right
        && inner.bottom <= outer.bottom;
}

export function shrinkRect(r: Rect, by: number): Rect {
    return { left: r.left + by, top: r.top + by, right: r.right - by, bottom: r.bottom - by };
}

/** Largest distance by which `inner` pokes out of `outer` on any side (0 if contained) */
export function overflowBeyond(outer: Rect, inner: Rect): number {
    return Math.max(
        0,
        outer.left - inner.left,
        outer.top - inner.top,
        inner.right - outer.right,
        inner.bottom - outer.bottom
    );
}

// ============================================================================
// Scroll region
// ============================================================================

export function computePad(canvasWidth: number, canvasHeight: number, mode: PadMode): number {
    if (mode === 'auto') return Math.max(1, Math.max(canvasWidth, canvasHeight));
    return Math.max(0, Math.floor(mode));
}

export function scrollRegionSize(m: ViewportMetrics): { width: number; height: number } {
    return {
        width: Math.max(1, Math.floor(m.imageWidth * m.zoom)) + 2 * m.pad,
        height: Math.max(1, Math.floor(m.imageHeight * m.zoom)) + 2 * m.pad,
    };
}

/** Keep the canvas inside the scroll region */
export function clampScroll(m: ViewportMetrics, x: number, y: number): Point {
    const region = scrollRegionSize(m);
    return {
        x: Math.max(0, Math.min(Math.max(0, region.width - m.canvasWidth), x)),
        y: Math.max(0, Math.min(Math.max(0, region.height - m.canvasHeight), y)),
    };
}

export function centeredScroll(m: ViewportMetrics): Point {
    const cx = m.pad + (m.imageWidth * m.zoom) / 2;
    const cy = m.pad + (m.imageHeight * m.zoom) / 2;
    return clampScroll(m, cx - m.canvasWidth / 2, cy - m.canvasHeight / 2);
}

// ============================================================================
// Coordinate conversion
// ============================================================================

export function worldToImage(m: ViewportMetrics, wx: number, wy: number): Point {
    return { x: (wx - m.pad) / m.zoom, y: (wy - m.pad) / m.zoom };
}

export function imageToWorld(m: ViewportMetrics, ix: number, iy: number): Point {
    return { x: m.pad + ix * m.zoom, y: m.pad + iy * m.zoom };
}

export function screenToImage(m: ViewportMetrics, sx: number, sy: number): Point {
    return worldToImage(m, m.scrollX + sx, m.scrollY + sy);
}

export function imageToScreen(m: ViewportMetrics, ix: number, iy: number): Point {
    const w = imageToWorld(m, ix, iy);
    return { x: w.x - m.scrollX, y: w.y - m.scrollY };
}

/** A distance in screen pixels expressed in whole image pixels, at least 1 */
export function screenToImagePx(px: number, zoom: number): number {
    return Math.max(1, Math.floor(px / zoom));
}

// ============================================================================
// Visible area
// ============================================================================

/** Visible area in image space, not clipped to the image */
export function idealViewRect(m: ViewportMetrics): Rect {
    const left = (m.scrollX - m.pad) / m.zoom;
    const top = (m.scrollY - m.pad) / m.zoom;
    return {
        left,
        top,
        right: left + m.canvasWidth / m.zoom,
        bottom: top + m.canvasHeight / m.zoom,
    };
}

/** Visible area clipped to the image; null when there is no image */
export function visibleImageRect(m: ViewportMetrics): Rect | null {
    if (m.imageWidth <= 0 || m.imageHeight <= 0) return null;
    return clipRect(idealViewRect(m), m.imageWidth, m.imageHeight);
}

// ============================================================================
// Zoom
// ============================================================================

export function clampZoom(zoom: number, min: number, max: number): number {
    if (!Number.isFinite(zoom)) return min;
    return Math.max(min, Math.min(max, zoom));
}

export function fitZoom(
    imageWidth: number,
    imageHeight: number,
    canvasWidth: number,
    canvasHeight: number,
    min: number,
    max: number
): number {
    const iw = Math.max(1, imageWidth);
    const ih = Math.max(1, imageHeight);
    return clampZoom(Math.min(canvasWidth / iw, canvasHeight / ih), min, max);
}

/**
 * Scroll position that keeps the image point under (screenX, screenY) in place
 * when switching from `m.zoom` to `newZoom`. The result is clamped to the new region.
 */
export function scrollForZoomAbout(
    m: ViewportMetrics,
    screenX: number,
    screenY: number,
    newZoom: number
): Point {
    const anchor = screenToImage(m, screenX, screenY);
    const next: ViewportMetrics = { ...m, zoom: newZoom };
    const world = imageToWorld(next, anchor.x, anchor.y);
    return clampScroll(next, world.x - screenX, world.y - screenY);
}
