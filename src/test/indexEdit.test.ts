/**
 * Tests for the index export/import round-trip
 */

import { describe, it, expect } from 'vitest';
import {
    INDEX_EDIT_FORMAT,
    IndexEditError,
    applyIndexImport,
    buildIndexExport,
    grayToIndex,
    indexToGray,
    packIndices,
    parseIndexMeta,
    rasterToIndices,
    serializeIndexMeta,
    wordsForWidth,
} from '../core/indexEdit';
import { createRaster, setPixel } from '../core/raster';
import { decodeIndices } from '../core/timDecoder';
import { makeTim, small4bpp } from './timFixtures';

function greyRow(values: number[]) {
    const raster = createRaster(values.length, 1);
    values.forEach((v, x) => setPixel(raster, x, 0, [v, v, v, 255]));
    return raster;
}

describe('grey ramp', () => {
    it('spreads indices evenly over 0-255', () => {
        expect(indexToGray(0, 16)).toBe(0);
        expect(indexToGray(1, 16)).toBe(17);
        expect(indexToGray(15, 16)).toBe(255);
        expect(indexToGray(128, 256)).toBe(128);
    });

    it('maps only exact ramp values back', () => {
        expect(grayToIndex(17, 16)).toBe(1);
        expect(grayToIndex(18, 16)).toBeNull();
        expect(grayToIndex(255, 256)).toBe(255);
    });
});

describe('buildIndexExport', () => {
    it('writes indices as greys with a sidecar', () => {
        const { raster, meta } = buildIndexExport(small4bpp());
        const reds: number[] = [];
        for (let i = 0; i < raster.data.length; i += 4) reds.push(raster.data[i]);
        expect(reds).toEqual([0, 17, 34, 51, 17, 0, 51, 34]);
        expect(meta).toMatchObject({ format: INDEX_EDIT_FORMAT, sourceTim: 'sprite.tim', bppMode: 0, width: 4, height: 2 });
    });

    it('rejects direct-colour TIMs', () => {
        const tim = makeTim({ mode: 2, widthWords: 1, height: 1, pixels: [0, 0] });
        expect(() => buildIndexExport(tim)).toThrow('Index export only applies to 4bpp/8bpp TIMs');
    });
});

describe('index meta', () => {
    it('stores snake_case keys and reads them back', () => {
        const { meta } = buildIndexExport(small4bpp());
        const json = serializeIndexMeta(meta);
        expect(JSON.parse(json)).toMatchObject({ source_tim: 'sprite.tim', bpp_mode: 0 });
        expect(parseIndexMeta(json)).toEqual(meta);
    });

    it('accepts the first format version', () => {
        const meta = parseIndexMeta(JSON.stringify({ format: 'tim_index_edit_v1', source_tim: 'a.tim', bpp_mode: 1, width: 8, height: 4 }));
        expect(meta.bppMode).toBe(1);
        expect(meta.note).toBe('');
    });

    it('rejects malformed sidecars', () => {
        expect(() => parseIndexMeta('{')).toThrow(/^Meta JSON is not valid JSON: /);
        expect(() => parseIndexMeta('[]')).toThrow('Meta JSON must be an object');
        expect(() => parseIndexMeta('{"format":"other","bpp_mode":0}')).toThrow('Meta JSON format not recognized');
        expect(() => parseIndexMeta(`{"format":"${INDEX_EDIT_FORMAT}","bpp_mode":2}`)).toThrow(
            'Meta bpp_mode 2 is not an indexed mode'
        );
    });
});

describe('rasterToIndices', () => {
    it('rejects coloured pixels', () => {
        const raster = greyRow([0, 17]);
        setPixel(raster, 1, 0, [17, 0, 17, 255]);
        expect(() => rasterToIndices(raster, 0)).toThrow('Pixel (1, 0) is not grey; keep the image greyscale');
    });

    it('rejects greys between ramp steps', () => {
        expect(() => rasterToIndices(greyRow([18]), 0)).toThrow(
            'Pixel (0, 0) value 18 is not one of the 16 index levels; avoid anti-aliasing'
        );
    });

    it('reads every 8bpp grey as its own index', () => {
        expect(Array.from(rasterToIndices(greyRow([0, 7, 255]), 1))).toEqual([0, 7, 255]);
    });
});

describe('packing', () => {
    it('checks widths against the pixel mode', () => {
        expect(wordsForWidth(0, 8)).toBe(2);
        expect(wordsForWidth(1, 6)).toBe(3);
        expect(wordsForWidth(2, 5)).toBe(5);
        expect(() => wordsForWidth(0, 6)).toThrow('4bpp TIM width must be a multiple of 4 pixels');
        expect(() => wordsForWidth(1, 5)).toThrow('8bpp TIM width must be a multiple of 2 pixels');
        expect(() => wordsForWidth(3, 6)).toThrow(IndexEditError);
    });

    it('packs 4bpp low nibble first', () => {
        expect(Array.from(packIndices(Uint8Array.from([1, 2, 3, 4]), 0, 4, 1))).toEqual([0x21, 0x43]);
        expect(Array.from(packIndices(Uint8Array.from([1, 2, 3]), 0, 3, 1))).toEqual([0x21, 0x03]);
    });

    it('refuses a pixel count that does not match the size', () => {
        expect(() => packIndices(new Uint8Array(3), 1, 2, 2)).toThrow('Index pixel count mismatch: expected 4, got 3');
    });
});

describe('applyIndexImport', () => {
    it('restores the original pixels from an unedited export', () => {
        const tim = small4bpp();
        const { raster, meta } = buildIndexExport(tim);
        const imported = applyIndexImport(tim, raster, meta);
        expect(Array.from(imported.pixelData)).toEqual(Array.from(tim.pixelData));
        expect(imported.widthWords).toBe(1);
        expect(imported.height).toBe(2);
    });

    it('takes the size of a resized image and leaves the source TIM alone', () => {
        const tim = small4bpp();
        const edited = greyRow([255, 0, 17, 34, 51, 68, 85, 102]);
        const imported = applyIndexImport(tim, edited, null);

        expect(imported.widthWords).toBe(2);
        expect(imported.height).toBe(1);
        expect(Array.from(decodeIndices(imported))).toEqual([15, 0, 1, 2, 3, 4, 5, 6]);
        expect(imported.clutBlock).toBe(tim.clutBlock);
        expect(tim.widthWords).toBe(1);
        expect(Array.from(tim.pixelData)).toEqual([0x10, 0x32, 0x01, 0x23]);
    });

    it('refuses a sidecar for another pixel mode', () => {
        const tim = small4bpp();
        const { raster, meta } = buildIndexExport(tim);
        expect(() => applyIndexImport(tim, raster, { ...meta, bppMode: 1 })).toThrow(
            'Meta bpp_mode does not match the selected TIM'
        );
    });

    it('refuses direct-colour TIMs', () => {
        const tim = makeTim({ mode: 2, widthWords: 1, height: 1, pixels: [0, 0] });
        expect(() => applyIndexImport(tim, greyRow([0]), null)).toThrow('Index import only applies to 4bpp/8bpp TIMs');
    });
});
