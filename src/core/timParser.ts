/**
 * TIM parser / encoder
 *
 * TIM file structure (little-endian):
 * - u32 magic 0x10
 * - u32 flags: bits 0-2 pixel mode, bit 3 CLUT present
 * - CLUT block (optional): u32 length, u16 x, u16 y, u16 width, u16 height, 15-bit colours
 * - Image block: u32 length, u16 x, u16 y, u16 width in 16-bit words, u16 height, data
 */

import { ps1ColorToRgba } from './ps1Color';
import type { BppMode, Clut, TimImage } from './types';

export const TIM_MAGIC = 0x10;
const BLOCK_HEADER_SIZE = 12;

export class TimParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TimParseError';
    }
}

let nextTimId = 1;

export function createTimId(name: string): string {
    return `${name}#${nextTimId++}`;
}

function isBppMode(v: number): v is BppMode {
    return v === 0 || v === 1 || v === 2 || v === 3;
}

/**
 * Quick check on the magic word only
 */
export function isTimData(bytes: Uint8Array): boolean {
    if (bytes.byteLength < 8) return false;
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return view.getUint32(0, true) === TIM_MAGIC;
}

export function parseTim(bytes: Uint8Array, name: string, id: string = createTimId(name)): TimImage {
    if (bytes.byteLength < 8) {
        throw new TimParseError('File too small to be a TIM');
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

    if (view.getUint32(0, true) !== TIM_MAGIC) {
        throw new TimParseError('Not a TIM (magic != 0x10)');
    }

    const flags = view.getUint32(4, true);
    const mode = flags & 0x7;
    if (!isBppMode(mode)) {
        throw new TimParseError(`Unsupported TIM pixel mode ${mode}`);
    }
    const hasClut = (flags & 0x8) !== 0;

    let offset = 8;
    let clutBlock: Uint8Array | null = null;

    if (hasClut) {
        if (bytes.byteLength < offset + BLOCK_HEADER_SIZE) {
            throw new TimParseError('TIM CLUT block truncated');
        }
        const clutLen = view.getUint32(offset, true);
        if (clutLen < BLOCK_HEADER_SIZE) {
            throw new TimParseError(`TIM CLUT block length ${clutLen} is smaller than its header`);
        }
        if (bytes.byteLength < offset + clutLen) {
            throw new TimParseError('TIM CLUT block truncated (declared length too large)');
        }
        clutBlock = bytes.slice(offset, offset + clutLen);
        offset += clutLen;
    }

    if (bytes.byteLength < offset + BLOCK_HEADER_SIZE) {
        throw new TimParseError('TIM image block truncated');
    }
    const imageLen = view.getUint32(offset, true);
    if (imageLen < BLOCK_HEADER_SIZE) {
        throw new TimParseError(`TIM image block length ${imageLen} is smaller than its header`);
    }
    if (bytes.byteLength < offset + imageLen) {
        throw new TimParseError('TIM image block truncated (declared length too large)');
    }

    return {
        id,
        name,
        flags,
        bppMode: mode,
        hasClut,
        clutBlock,
        imageX: view.getUint16(offset + 4, true),
        imageY: view.getUint16(offset + 6, true),
        widthWords: view.getUint16(offset + 8, true),
        height: view.getUint16(offset + 10, true),
        pixelData: bytes.slice(offset + BLOCK_HEADER_SIZE, offset + imageLen),
    };
}

/** Image width in pixels, from the width in 16-bit words */
export function pixelWidth(tim: Pick<TimImage, 'bppMode' | 'widthWords'>): number {
    switch (tim.bppMode) {
        case 0: return tim.widthWords * 4;
        case 1: return tim.widthWords * 2;
        case 2: return tim.widthWords;
        case 3: return Math.floor((tim.widthWords * 2) / 3);
    }
}

export function isIndexed(tim: Pick<TimImage, 'bppMode'>): boolean {
    return tim.bppMode === 0 || tim.bppMode === 1;
}

export function bppLabel(mode: BppMode): string {
    return ['4bpp', '8bpp', '16bpp', '24bpp'][mode];
}

/**
 * Split the CLUT block into palette rows. A block shorter than width*height
 * words yields as many full rows as it holds (at least one).
 */
export function extractCluts(tim: TimImage): Clut[] {
    const block = tim.clutBlock;
    if (!tim.hasClut || !block || block.byteLength < BLOCK_HEADER_SIZE) return [];

    const view = new DataView(block.buffer, block.byteOffset, block.byteLength);
    const declared = Math.min(block.byteLength, view.getUint32(0, true));
    const width = view.getUint16(8, true);
    let height = view.getUint16(10, true);
    if (width <= 0) return [];

    const wordCount = Math.floor((declared - BLOCK_HEADER_SIZE) / 2);
    if (wordCount < 1) return [];
    if (wordCount < width * height) {
        height = Math.max(1, Math.floor(wordCount / width));
    }

    const cluts: Clut[] = [];
    for (let row = 0; row < height; row++) {
        const raw15 = new Uint16Array(width);
        const colors = new Uint8ClampedArray(width * 4);
        for (let i = 0; i < width; i++) {
            const wordIndex = row * width + i;
            const c = wordIndex < wordCount ? view.getUint16(BLOCK_HEADER_SIZE + wordIndex * 2, true) : 0;
            raw15[i] = c;
            colors.set(ps1ColorToRgba(c), i * 4);
        }
        cluts.push({
            id: `${tim.id}/clut${row}`,
            sourceId: tim.id,
            sourceName: tim.name,
            row,
            width,
            height,
            raw15,
            colors,
        });
    }
    return cluts;
}

export function clutLabel(clut: Clut): string {
    return `${clut.sourceName} | CLUT #${clut.row} (row ${clut.row}, ${clut.width} cols)`;
}

/**
 * Re-encode a TIM: header, the CLUT block as read, then the (possibly edited) image block.
 */
export function buildTimBytes(tim: TimImage): Uint8Array {
    if (tim.hasClut && !tim.clutBlock) {
        throw new TimParseError('TIM claims to have a CLUT but the CLUT block is missing');
    }
    const clutBytes = tim.hasClut && tim.clutBlock ? tim.clutBlock : new Uint8Array(0);
    const imageLen = BLOCK_HEADER_SIZE + tim.pixelData.byteLength;
    const out = new Uint8Array(8 + clutBytes.byteLength + imageLen);
    const view = new DataView(out.buffer);

    view.setUint32(0, TIM_MAGIC, true);
    view.setUint32(4, tim.flags >>> 0, true);
    out.set(clutBytes, 8);

    const offset = 8 + clutBytes.byteLength;
    view.setUint32(offset, imageLen, true);
    view.setUint16(offset + 4, tim.imageX, true);
    view.setUint16(offset + 6, tim.imageY, true);
    view.setUint16(offset + 8, tim.widthWords, true);
    view.setUint16(offset + 10, tim.height, true);
    out.set(tim.pixelData, offset + BLOCK_HEADER_SIZE);
    return out;
}
