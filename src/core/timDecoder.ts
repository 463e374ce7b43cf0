/**
 * TIM pixel decoding
 * Indexed modes go through a CLUT row; direct modes decode colour words/bytes.
 */

import { createRaster } from './raster';
import { ps1ColorToRgba } from './ps1Color';
import { isIndexed, pixelWidth } from './timParser';
import type { Clut, Raster, Rgba, TimImage } from './types';

/** Shown for indices past the end of the applied palette */
export const OUT_OF_PALETTE: Rgba = [255, 0, 255, 255];

export class UnsupportedPixelModeError extends Error {
    constructor(operation: string, mode: number) {
        super(`${operation} is not supported for TIM pixel mode ${mode}`);
        this.name = 'UnsupportedPixelModeError';
    }
}

/**
 * Palette indices, row-major. 4bpp packs two pixels per byte, low nibble first.
 * Short pixel data leaves the remaining indices at 0.
 */
export function decodeIndices(tim: TimImage): Uint8Array {
    if (!isIndexed(tim)) {
        throw new UnsupportedPixelModeError('Index decoding', tim.bppMode);
    }
    const count = pixelWidth(tim) * tim.height;
    const out = new Uint8Array(count);
    const src = tim.pixelData;

    if (tim.bppMode === 1) {
        out.set(src.subarray(0, Math.min(count, src.byteLength)));
        return out;
    }

    let o = 0;
    for (let i = 0; i < src.byteLength && o < count; i++) {
        const b = src[i];
        out[o++] = b & 0x0f;
        if (o < count) out[o++] = (b >> 4) & 0x0f;
    }
    return out;
}

/**
 * Render a TIM to RGBA. Indexed images without a CLUT show the raw index as grey.
 */
export function renderTim(tim: TimImage, clut: Clut | null): Raster {
    const width = pixelWidth(tim);
    const height = tim.height;
    const raster = createRaster(width, height);
    const d = raster.data;

    if (isIndexed(tim)) {
        const indices = decodeIndices(tim);
        if (!clut) {
            for (let i = 0; i < indices.length; i++) {
                const v = indices[i];
                d.set([v, v, v, 255], i * 4);
            }
            return raster;
        }
        const palette = clut.colors;
        const size = clut.width;
        for (let i = 0; i < indices.length; i++) {
            const idx = indices[i];
            if (idx < size) {
                d.set(palette.subarray(idx * 4, idx * 4 + 4), i * 4);
            } else {
                d.set(OUT_OF_PALETTE, i * 4);
            }
        }
        return raster;
    }

    const src = tim.pixelData;
    const view = new DataView(src.buffer, src.byteOffset, src.byteLength);
    const count = width * height;

    if (tim.bppMode === 2) {
        const words = Math.floor(src.byteLength / 2);
        for (let i = 0; i < count && i < words; i++) {
            d.set(ps1ColorToRgba(view.getUint16(i * 2, true)), i * 4);
        }
        return raster;
    }

    // 24bpp: rows are padded to whole 16-bit words
    const rowBytes = tim.widthWords * 2;
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const s = y * rowBytes + x * 3;
            if (s + 2 >= src.byteLength) continue;
            d.set([src[s], src[s + 1], src[s + 2], 255], (y * width + x) * 4);
        }
    }
    return raster;
}
