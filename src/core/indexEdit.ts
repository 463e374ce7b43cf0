/**
 * Index export/import round-trip
 *
 * Indexed TIMs are exported as a grey ramp image (index i of n maps to
 * round(i * 255 / (n - 1))) plus a JSON sidecar. After editing elsewhere the
 * image comes back, is mapped back to indices, and may have new dimensions.
 */

import { createRaster } from './raster';
import { decodeIndices } from './timDecoder';
import { isIndexed, pixelWidth } from './timParser';
import type { BppMode, Raster, TimImage } from './types';

export const INDEX_EDIT_FORMAT = 'tim_index_edit_v2';
const ACCEPTED_FORMATS = new Set(['tim_index_edit_v1', INDEX_EDIT_FORMAT]);

const META_NOTE =
    'Pixel values are palette indices on a grey ramp. You may resize the image; ' +
    'on import the TIM takes the new size. Avoid anti-aliasing and colour edits.';

export class IndexEditError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'IndexEditError';
    }
}

export interface IndexEditMeta {
    format: string;
    sourceTim: string;
    bppMode: BppMode;
    width: number;
    height: number;
    note: string;
}

export function paletteSize(bppMode: BppMode): number {
    return bppMode === 0 ? 16 : 256;
}

export function indexToGray(index: number, size: number): number {
    return size > 1 ? Math.round((index * 255) / (size - 1)) : 0;
}

/** Inverse of indexToGray; null when the grey is not on the ramp */
export function grayToIndex(gray: number, size: number): number | null {
    if (size <= 1) return gray === 0 ? 0 : null;
    const index = Math.round((gray * (size - 1)) / 255);
    return indexToGray(index, size) === gray ? index : null;
}

function requireIndexed(tim: TimImage, action: string): asserts tim is TimImage & { bppMode: 0 | 1 } {
    if (!isIndexed(tim)) {
        throw new IndexEditError(`${action} only applies to 4bpp/8bpp TIMs`);
    }
}

export function buildIndexExport(tim: TimImage): { raster: Raster; meta: IndexEditMeta } {
    requireIndexed(tim, 'Index export');
    const width = pixelWidth(tim);
    const height = tim.height;
    const size = paletteSize(tim.bppMode);
    const indices = decodeIndices(tim);

    const raster = createRaster(width, height);
    for (let i = 0; i < indices.length; i++) {
        const v = indexToGray(Math.min(indices[i], size - 1), size);
        raster.data.set([v, v, v, 255], i * 4);
    }

    return {
        raster,
        meta: {
            format: INDEX_EDIT_FORMAT,
            sourceTim: tim.name,
            bppMode: tim.bppMode,
            width,
            height,
            note: META_NOTE,
        },
    };
}

/** Sidecar JSON, snake_case on disk */
export function serializeIndexMeta(meta: IndexEditMeta): string {
    return JSON.stringify({
        format: meta.format,
        source_tim: meta.sourceTim,
        bpp_mode: meta.bppMode,
        width: meta.width,
        height: meta.height,
        note: meta.note,
    }, null, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseIndexMeta(text: string): IndexEditMeta {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (e) {
        throw new IndexEditError(`Meta JSON is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!isRecord(parsed)) {
        throw new IndexEditError('Meta JSON must be an object');
    }

    const format = parsed.format;
    if (typeof format !== 'string' || !ACCEPTED_FORMATS.has(format)) {
        throw new IndexEditError('Meta JSON format not recognized');
    }
    const bpp = Number(parsed.bpp_mode);
    const bppMode = bpp === 0 ? 0 : bpp === 1 ? 1 : null;
    if (bppMode === null) {
        throw new IndexEditError(`Meta bpp_mode ${String(parsed.bpp_mode)} is not an indexed mode`);
    }

    return {
        format,
        sourceTim: typeof parsed.source_tim === 'string' ? parsed.source_tim : '',
        bppMode,
        width: Number(parsed.width) || 0,
        height: Number(parsed.height) || 0,
        note: typeof parsed.note === 'string' ? parsed.note : '',
    };
}

/**
 * Map an edited grey-ramp image back to palette indices.
 */
export function rasterToIndices(raster: Raster, bppMode: BppMode): Uint8Array {
    const size = paletteSize(bppMode);
    const out = new Uint8Array(raster.width * raster.height);
    const d = raster.data;
    for (let i = 0; i < out.length; i++) {
        const r = d[i * 4];
        const g = d[i * 4 + 1];
        const b = d[i * 4 + 2];
        const x = i % raster.width;
        const y = Math.floor(i / raster.width);
        if (r !== g || g !== b) {
            throw new IndexEditError(`Pixel (${x}, ${y}) is not grey; keep the image greyscale`);
        }
        const index = grayToIndex(r, size);
        if (index === null) {
            throw new IndexEditError(
                `Pixel (${x}, ${y}) value ${r} is not one of the ${size} index levels; avoid anti-aliasing`
            );
        }
        out[i] = index;
    }
    return out;
}

export function wordsForWidth(bppMode: BppMode, widthPx: number): number {
    switch (bppMode) {
        case 0:
            if (widthPx % 4 !== 0) throw new IndexEditError('4bpp TIM width must be a multiple of 4 pixels');
            return widthPx / 4;
        case 1:
            if (widthPx % 2 !== 0) throw new IndexEditError('8bpp TIM width must be a multiple of 2 pixels');
            return widthPx / 2;
        case 2:
            return widthPx;
        case 3:
            throw new IndexEditError('Resizing 24bpp TIMs is not supported');
    }
}

/** Pack indices into TIM pixel data; 4bpp puts the first pixel in the low nibble */
export function packIndices(indices: Uint8Array, bppMode: BppMode, width: number, height: number): Uint8Array {
    const expected = width * height;
    if (indices.length !== expected) {
        throw new IndexEditError(`Index pixel count mismatch: expected ${expected}, got ${indices.length}`);
    }
    if (bppMode === 1) return Uint8Array.from(indices);
    if (bppMode !== 0) throw new IndexEditError('Only 4bpp/8bpp indices can be packed');

    const out = new Uint8Array(Math.ceil(indices.length / 2));
    for (let i = 0; i < indices.length; i += 2) {
        const lo = indices[i] & 0x0f;
        const hi = i + 1 < indices.length ? indices[i + 1] & 0x0f : 0;
        out[i >> 1] = lo | (hi << 4);
    }
    return out;
}

/**
 * Produce the TIM with its pixels replaced by the edited image. The CLUT and
 * header stay as they were; width and height follow the edited image.
 */
export function applyIndexImport(tim: TimImage, edited: Raster, meta: IndexEditMeta | null): TimImage {
    requireIndexed(tim, 'Index import');
    if (meta && meta.bppMode !== tim.bppMode) {
        throw new IndexEditError('Meta bpp_mode does not match the selected TIM');
    }
    if (edited.width <= 0 || edited.height <= 0) {
        throw new IndexEditError('Edited image is empty');
    }

    const indices = rasterToIndices(edited, tim.bppMode);
    return {
        ...tim,
        widthWords: wordsForWidth(tim.bppMode, edited.width),
        height: edited.height,
        pixelData: packIndices(indices, tim.bppMode, edited.width, edited.height),
    };
}
