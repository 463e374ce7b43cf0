/**
 * Image export helpers
 * BMP is written by hand (24-bit, bottom-up, flattened on a background); PNG goes through the canvas.
 */

import { flattenOnto } from './raster';
import type { Raster, Rgba } from './types';

export type ExportFormat = 'png' | 'bmp';

const BMP_HEADER_SIZE = 14 + 40;

export function encodeBmp(raster: Raster, background: Rgba = [0, 0, 0, 255]): Uint8Array {
    const flat = flattenOnto(raster, background);
    const rowSize = Math.ceil((raster.width * 3) / 4) * 4;
    const imageSize = rowSize * raster.height;
    const out = new Uint8Array(BMP_HEADER_SIZE + imageSize);
    const view = new DataView(out.buffer);

    // BITMAPFILEHEADER
    out[0] = 0x42; // 'B'
    out[1] = 0x4d; // 'M'
    view.setUint32(2, out.byteLength, true);
    view.setUint32(10, BMP_HEADER_SIZE, true);

    // BITMAPINFOHEADER
    view.setUint32(14, 40, true);
    view.setInt32(18, raster.width, true);
    view.setInt32(22, raster.height, true);
    view.setUint16(26, 1, true);
    view.setUint16(28, 24, true);
    view.setUint32(30, 0, true);
    view.setUint32(34, imageSize, true);
    view.setInt32(38, 2835, true); // 72 dpi
    view.setInt32(42, 2835, true);

    const d = flat.data;
    for (let y = 0; y < raster.height; y++) {
        const rowStart = BMP_HEADER_SIZE + (raster.height - 1 - y) * rowSize;
        for (let x = 0; x < raster.width; x++) {
            const s = (y * raster.width + x) * 4;
            const o = rowStart + x * 3;
            out[o] = d[s + 2];
            out[o + 1] = d[s + 1];
            out[o + 2] = d[s];
        }
    }
    return out;
}

function stripExtension(name: string): string {
    const dot = name.lastIndexOf('.');
    return dot > 0 ? name.slice(0, dot) : name;
}

/** e.g. "hero.tim" frame 3 -> "hero_frame003.png" */
export function exportFileName(sourceName: string, format: ExportFormat, frameIndex: number | null): string {
    const base = stripExtension(sourceName) || 'image';
    const suffix = frameIndex === null ? '' : `_frame${String(frameIndex).padStart(3, '0')}`;
    return `${base}${suffix}.${format}`;
}

export function indexExportFileNames(sourceName: string): { image: string; meta: string } {
    const base = `${stripExtension(sourceName) || 'image'}_indices`;
    return { image: `${base}.png`, meta: `${base}.json` };
}

export function editedTimFileName(sourceName: string): string {
    return `${stripExtension(sourceName) || 'image'}_edited.tim`;
}
