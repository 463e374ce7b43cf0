/**
 * Tests for pyramid level selection
 */

import { describe, it, expect } from 'vitest';
import { levelScore, selectLevel } from '../core/levelSelector';
import { createRaster } from '../core/raster';
import type { Pyramid } from '../core/types';

const pyramid: Pyramid = [1, 0.5, 0.25, 0.125].map((scale) => ({
    scale,
    image: createRaster(Math.round(64 * scale), Math.round(64 * scale)),
}));

describe('levelScore', () => {
    it('is zero for the level matching the zoom with no bias', () => {
        expect(levelScore(0.5, 0.5, 0)).toBe(0);
    });

    it('rewards smaller levels by the bias', () => {
        expect(levelScore(2, 0.5, 0.55)).toBeCloseTo(1.45, 10);
    });
});

describe('selectLevel', () => {
    it('uses the full-resolution level when magnifying', () => {
        const choice = selectLevel(pyramid, 2, 0.55);
        expect(choice?.index).toBe(0);
        expect(choice?.rel).toBe(2);
    });

    it('prefers the full-resolution level at 1:1', () => {
        expect(selectLevel(pyramid, 1, 0.55)?.index).toBe(0);
    });

    it('picks the matching half level when minifying', () => {
        const choice = selectLevel(pyramid, 0.5, 0.55);
        expect(choice?.index).toBe(1);
        expect(choice?.scale).toBe(0.5);
        expect(choice?.rel).toBe(1);
        expect(choice?.image).toBe(pyramid[1].image);
    });

    it('moves to smaller levels with a larger bias', () => {
        expect(selectLevel(pyramid, 2, 1.5)?.index).toBe(3);
    });

    it('keeps the first level on ties', () => {
        const twins: Pyramid = [
            { scale: 1, image: createRaster(2, 2) },
            { scale: 1, image: createRaster(2, 2) },
        ];
        expect(selectLevel(twins, 1, 0)?.index).toBe(0);
    });

    it('returns null for an empty pyramid or a bad zoom', () => {
        expect(selectLevel([], 1, 0.55)).toBeNull();
        expect(selectLevel(pyramid, 0, 0.55)).toBeNull();
        expect(selectLevel(pyramid, Number.NaN, 0.55)).toBeNull();
    });
});
