/**
 * Software resampling of RGBA rasters
 *
 * nearest  - pixel replication, used while dragging and for pixel-art upscales
 * bilinear - 2x2 interpolation, used by the preview proxy
 * area     - exact box coverage, used for downscales and pyramid levels
 *
 * bilinear and area blend with premultiplied alpha so transparent texels do not
 * bleed black into their neighbours.
 */

import { createRaster } from './raster';
import type { Raster, ResampleFilter } from './types';

interface AxisTap {
    index: number;
    weight: number;
}

export function resampleRaster(
    src: Raster,
    targetWidth: number,
    targetHeight: number,
    filter: ResampleFilter
): Raster | null {
    const tw = Math.floor(targetWidth);
    const th = Math.floor(targetHeight);
    if (tw <= 0 || th <= 0 || src.width <= 0 || src.height <= 0) return null;
    if (tw === src.width && th === src.height) {
        return { width: tw, height: th, data: new Uint8ClampedArray(src.data) };
    }

    switch (filter) {
        case 'nearest':
            return resampleNearest(src, tw, th);
        case 'bilinear':
            return resampleSeparable(src, tw, th, bilinearTaps);
        case 'area':
            return resampleSeparable(src, tw, th, areaTaps);
    }
}

function resampleNearest(src: Raster, tw: number, th: number): Raster {
    const out = createRaster(tw, th);
    const xs = new Int32Array(tw);
    for (let x = 0; x < tw; x++) {
        xs[x] = Math.min(src.width - 1, Math.floor(((x + 0.5) * src.width) / tw));
    }
    const s = src.data;
    const d = out.data;
    let o = 0;
    for (let y = 0; y < th; y++) {
        const sy = Math.min(src.height - 1, Math.floor(((y + 0.5) * src.height) / th));
        const row = sy * src.width;
        for (let x = 0; x < tw; x++) {
            const i = (row + xs[x]) * 4;
            d[o++] = s[i];
            d[o++] = s[i + 1];
            d[o++] = s[i + 2];
            d[o++] = s[i + 3];
        }
    }
    return out;
}

function bilinearTaps(srcLen: number, dstLen: number): AxisTap[][] {
    const taps: AxisTap[][] = [];
    for (let i = 0; i < dstLen; i++) {
        const f = Math.min(srcLen - 1, Math.max(0, ((i + 0.5) * srcLen) / dstLen - 0.5));
        const i0 = Math.floor(f);
        const i1 = Math.min(srcLen - 1, i0 + 1);
        const w1 = f - i0;
        taps.push(w1 > 0 && i1 !== i0
            ? [{ index: i0, weight: 1 - w1 }, { index: i1, weight: w1 }]
            : [{ index: i0, weight: 1 }]);
    }
    return taps;
}

function areaTaps(srcLen: number, dstLen: number): AxisTap[][] {
    const ratio = srcLen / dstLen;
    const taps: AxisTap[][] = [];
    for (let i = 0; i < dstLen; i++) {
        const start = i * ratio;
        const end = (i + 1) * ratio;
        const list: AxisTap[] = [];
        for (let s = Math.floor(start); s < Math.min(srcLen, Math.ceil(end)); s++) {
            const cover = Math.min(end, s + 1) - Math.max(start, s);
            if (cover > 1e-9) list.push({ index: s, weight: cover / ratio });
        }
        taps.push(list);
    }
    return taps;
}

/**
 * Two-pass filter: horizontal into a float buffer of premultiplied values,
 * then vertical into the output.
 */
function resampleSeparable(
    src: Raster,
    tw: number,
    th: number,
    makeTaps: (srcLen: number, dstLen: number) => AxisTap[][]
): Raster {
    const xTaps = makeTaps(src.width, tw);
    const yTaps = makeTaps(src.height, th);
    const s = src.data;

    const mid = new Float64Array(tw * src.height * 4);
    for (let y = 0; y < src.height; y++) {
        const row = y * src.width;
        for (let x = 0; x < tw; x++) {
            let r = 0, g = 0, b = 0, a = 0;
            for (const tap of xTaps[x]) {
                const i = (row + tap.index) * 4;
                const wa = s[i + 3] * tap.weight;
                r += s[i] * wa;
                g += s[i + 1] * wa;
                b += s[i + 2] * wa;
                a += wa;
            }
            const o = (y * tw + x) * 4;
            mid[o] = r;
            mid[o + 1] = g;
            mid[o + 2] = b;
            mid[o + 3] = a;
        }
    }

    const out = createRaster(tw, th);
    const d = out.data;
    for (let y = 0; y < th; y++) {
        for (let x = 0; x < tw; x++) {
            let r = 0, g = 0, b = 0, a = 0;
            for (const tap of yTaps[y]) {
                const i = (tap.index * tw + x) * 4;
                r += mid[i] * tap.weight;
                g += mid[i + 1] * tap.weight;
                b += mid[i + 2] * tap.weight;
                a += mid[i + 3] * tap.weight;
            }
            const o = (y * tw + x) * 4;
            if (a > 0) {
                d[o] = Math.round(r / a);
                d[o + 1] = Math.round(g / a);
                d[o + 2] = Math.round(b / a);
                d[o + 3] = Math.round(a);
            }
        }
    }
    return out;
}
