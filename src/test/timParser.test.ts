/**
 * Tests for TIM parsing, CLUT extraction and re-encoding
 */

import { describe, it, expect } from 'vitest';
import {
    TimParseError,
    bppLabel,
    buildTimBytes,
    clutLabel,
    extractCluts,
    isIndexed,
    isTimData,
    parseTim,
    pixelWidth,
} from '../core/timParser';
import { small4bpp, timBytes } from './timFixtures';

describe('parseTim', () => {
    it('reads header fields and both blocks', () => {
        const tim = small4bpp();
        expect(tim.name).toBe('sprite.tim');
        expect(tim.bppMode).toBe(0);
        expect(tim.hasClut).toBe(true);
        expect(tim.flags).toBe(0x8);
        expect(tim.clutBlock?.byteLength).toBe(28);
        expect(tim.imageX).toBe(320);
        expect(tim.imageY).toBe(0);
        expect(tim.widthWords).toBe(1);
        expect(tim.height).toBe(2);
        expect(Array.from(tim.pixelData)).toEqual([0x10, 0x32, 0x01, 0x23]);
    });

    it('uses the given id', () => {
        const bytes = timBytes({ mode: 2, widthWords: 1, height: 1, pixels: [0, 0] });
        expect(parseTim(bytes, 'a.tim', 'fixed-id').id).toBe('fixed-id');
    });

    it('assigns distinct ids to files with the same name', () => {
        const bytes = timBytes({ mode: 2, widthWords: 1, height: 1, pixels: [0, 0] });
        expect(parseTim(bytes, 'a.tim').id).not.toBe(parseTim(bytes, 'a.tim').id);
    });

    it('rejects files too small for a header', () => {
        expect(() => parseTim(new Uint8Array(4), 'x.tim')).toThrow('File too small to be a TIM');
    });

    it('rejects a wrong magic word', () => {
        const bytes = timBytes({ mode: 2, widthWords: 1, height: 1, pixels: [0, 0] });
        bytes[0] = 0x11;
        expect(() => parseTim(bytes, 'x.tim')).toThrow(TimParseError);
        expect(isTimData(bytes)).toBe(false);
    });

    it('rejects unknown pixel modes', () => {
        const bytes = timBytes({ mode: 2, widthWords: 1, height: 1, pixels: [0, 0] });
        bytes[4] = 0x5;
        expect(() => parseTim(bytes, 'x.tim')).toThrow('Unsupported TIM pixel mode 5');
    });

    it('rejects a truncated image block', () => {
        const bytes = timBytes({ mode: 1, widthWords: 2, height: 2, pixels: [1, 2, 3, 4, 5, 6, 7, 8] });
        expect(() => parseTim(bytes.slice(0, bytes.byteLength - 1), 'x.tim')).toThrow(
            'TIM image block truncated (declared length too large)'
        );
        expect(() => parseTim(bytes.slice(0, 12), 'x.tim')).toThrow('TIM image block truncated');
    });

    it('rejects a CLUT block shorter than its header', () => {
        const bytes = timBytes({ mode: 1, widthWords: 1, height: 1, pixels: [0, 0], clut: { width: 1, height: 1, words: [0] } });
        bytes[8] = 4;
        expect(() => parseTim(bytes, 'x.tim')).toThrow('TIM CLUT block length 4 is smaller than its header');
    });

    it('accepts direct-colour files with the magic word', () => {
        const bytes = timBytes({ mode: 3, widthWords: 3, height: 1, pixels: [1, 2, 3, 4, 5, 6] });
        expect(isTimData(bytes)).toBe(true);
        expect(parseTim(bytes, 'rgb.tim').hasClut).toBe(false);
    });
});

describe('pixel modes', () => {
    it('derives the pixel width from the word width', () => {
        expect(pixelWidth({ bppMode: 0, widthWords: 6 })).toBe(24);
        expect(pixelWidth({ bppMode: 1, widthWords: 6 })).toBe(12);
        expect(pixelWidth({ bppMode: 2, widthWords: 6 })).toBe(6);
        expect(pixelWidth({ bppMode: 3, widthWords: 6 })).toBe(4);
    });

    it('labels and classifies modes', () => {
        expect(bppLabel(0)).toBe('4bpp');
        expect(bppLabel(3)).toBe('24bpp');
        expect(isIndexed({ bppMode: 1 })).toBe(true);
        expect(isIndexed({ bppMode: 2 })).toBe(false);
    });
});

describe('extractCluts', () => {
    it('splits the CLUT block into rows of RGBA colours', () => {
        const tim = small4bpp();
        const cluts = extractCluts(tim);
        expect(cluts).toHaveLength(2);

        const [first, second] = cluts;
        expect(first.id).toBe(`${tim.id}/clut0`);
        expect(first.width).toBe(4);
        expect(first.height).toBe(2);
        expect(Array.from(first.raw15)).toEqual([0x0000, 0x001f, 0x03e0, 0x7c00]);
        expect(Array.from(first.colors)).toEqual([
            0, 0, 0, 0,
            255, 0, 0, 255,
            0, 255, 0, 255,
            0, 0, 255, 255,
        ]);
        expect(second.row).toBe(1);
        expect(Array.from(second.colors.subarray(0, 12))).toEqual([255, 255, 255, 255, 8, 8, 8, 255, 0, 0, 0, 0]);
    });

    it('keeps only the full rows a short block holds', () => {
        const bytes = timBytes({
            mode: 0,
            widthWords: 1,
            height: 1,
            pixels: [0, 0],
            clut: { width: 4, height: 3, words: [1, 2, 3, 4, 5] },
        });
        const cluts = extractCluts(parseTim(bytes, 'short.tim'));
        expect(cluts).toHaveLength(1);
        expect(Array.from(cluts[0].raw15)).toEqual([1, 2, 3, 4]);
    });

    it('returns nothing for a TIM without a CLUT', () => {
        const bytes = timBytes({ mode: 2, widthWords: 1, height: 1, pixels: [0, 0] });
        expect(extractCluts(parseTim(bytes, 'd.tim'))).toEqual([]);
    });

    it('labels a row with its source', () => {
        const [, second] = extractCluts(small4bpp('hero.tim'));
        expect(clutLabel(second)).toBe('hero.tim | CLUT #1 (row 1, 4 cols)');
    });
});

describe('buildTimBytes', () => {
    it('reproduces the file it was parsed from', () => {
        const bytes = timBytes({
            mode: 0,
            widthWords: 1,
            height: 2,
            pixels: [0x10, 0x32, 0x01, 0x23],
            clut: { width: 4, height: 1, words: [0, 1, 2, 3] },
            imageX: 512,
            imageY: 256,
        });
        expect(Array.from(buildTimBytes(parseTim(bytes, 'a.tim')))).toEqual(Array.from(bytes));
    });

    it('writes edited pixel data with an updated block length', () => {
        const tim = small4bpp();
        const edited = { ...tim, pixelData: new Uint8Array([0xff, 0xff, 0xff, 0xff, 0xff, 0xff]) };
        const reparsed = parseTim(buildTimBytes(edited), 'edited.tim');
        expect(Array.from(reparsed.pixelData)).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
        expect(extractCluts(reparsed)).toHaveLength(2);
    });

    it('refuses a TIM whose CLUT block went missing', () => {
        const tim = { ...small4bpp(), clutBlock: null };
        expect(() => buildTimBytes(tim)).toThrow(TimParseError);
    });
});
