/**
 * RGBA raster primitives
 */

import type { Raster, Rect, Rgba } from './types';

export const TRANSPARENT: Rgba = [0, 0, 0, 0];

export function createRaster(width: number, height: number, fill: Rgba = TRANSPARENT): Raster {
    const w = Math.max(0, Math.floor(width));
    const h = Math.max(0, Math.floor(height));
    const raster: Raster = { width: w, height: h, data: new Uint8ClampedArray(w * h * 4) };
    if (fill[0] || fill[1] || fill[2] || fill[3]) {
        fillRaster(raster, fill);
    }
    return raster;
}

export function fillRaster(raster: Raster, color: Rgba): void {
    const { data } = raster;
    for (let i = 0; i < data.length; i += 4) {
        data[i] = color[0];
        data[i + 1] = color[1];
        data[i + 2] = color[2];
        data[i + 3] = color[3];
    }
}

export function getPixel(raster: Raster, x: number, y: number): Rgba {
    const i = (y * raster.width + x) * 4;
    const d = raster.data;
    return [d[i], d[i + 1], d[i + 2], d[i + 3]];
}

export function setPixel(raster: Raster, x: number, y: number, color: Rgba): void {
    const i = (y * raster.width + x) * 4;
    raster.data[i] = color[0];
    raster.data[i + 1] = color[1];
    raster.data[i + 2] = color[2];
    raster.data[i + 3] = color[3];
}

/**
 * Copy an integer rectangle out of a raster.
 * The rectangle is clipped to the source; an empty intersection yields null.
 */
export function cropRaster(src: Raster, rect: Rect): Raster | null {
    const left = Math.max(0, Math.floor(rect.left));
    const top = Math.max(0, Math.floor(rect.top));
    const right = Math.min(src.width, Math.ceil(rect.right));
    const bottom = Math.min(src.height, Math.ceil(rect.bottom));
    if (right <= left || bottom <= top) return null;

    const out = createRaster(right - left, bottom - top);
    const rowBytes = out.width * 4;
    for (let y = 0; y < out.height; y++) {
        const from = ((top + y) * src.width + left) * 4;
        out.data.set(src.data.subarray(from, from + rowBytes), y * rowBytes);
    }
    return out;
}

/**
 * Overwrite `dst` with `src` placed at (dx, dy). Pixels falling outside `dst` are dropped.
 */
export function pasteRaster(dst: Raster, src: Raster, dx: number, dy: number): void {
    const x0 = Math.max(0, dx);
    const y0 = Math.max(0, dy);
    const x1 = Math.min(dst.width, dx + src.width);
    const y1 = Math.min(dst.height, dy + src.height);
    if (x1 <= x0 || y1 <= y0) return;

    const span = (x1 - x0) * 4;
    for (let y = y0; y < y1; y++) {
        const from = ((y - dy) * src.width + (x0 - dx)) * 4;
        dst.data.set(src.data.subarray(from, from + span), (y * dst.width + x0) * 4);
    }
}

/**
 * Alpha-composite a raster over an opaque colour, producing an opaque raster.
 */
export function flattenOnto(src: Raster, background: Rgba): Raster {
    const out = createRaster(src.width, src.height);
    const s = src.data;
    const d = out.data;
    for (let i = 0; i < s.length; i += 4) {
        const a = s[i + 3] / 255;
        d[i] = Math.round(s[i] * a + background[0] * (1 - a));
        d[i + 1] = Math.round(s[i + 1] * a + background[1] * (1 - a));
        d[i + 2] = Math.round(s[i + 2] * a + background[2] * (1 - a));
        d[i + 3] = 255;
    }
    return out;
}

const identities = new WeakMap<Raster, number>();
let nextIdentity = 1;

/** Stable per-object identity, used in cache keys */
export function rasterIdentity(raster: Raster): number {
    let id = identities.get(raster);
    if (id === undefined) {
        id = nextIdentity++;
        identities.set(raster, id);
    }
    return id;
}

export function parseHexColor(hex: string): Rgba | null {
    const m = /^#?([0-9a-f]{6})$/i.exec(hex.trim());
    if (!m) return null;
    const v = parseInt(m[1], 16);
    return [(v >> 16) & 0xff, (v >> 8) & 0xff, v & 0xff, 255];
}
