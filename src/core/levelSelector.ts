/**
 * Pick the pyramid level to resample from for a given zoom.
 *
 * score = |log2(zoom / scale)| - bias * (-log2(scale))
 *
 * The first term prefers the level closest to the zoom; the second lowers the
 * score of smaller levels, so a larger bias trades sharpness for speed.
 */

import type { Pyramid, Raster } from './types';

export interface LevelChoice {
    index: number;
    scale: number;
    image: Raster;
    /** Scale factor from the chosen level to the screen */
    rel: number;
}

export function levelScore(zoom: number, scale: number, bias: number): number {
    return Math.abs(Math.log2(zoom / scale)) - bias * -Math.log2(scale);
}

export function selectLevel(pyramid: Pyramid, zoom: number, bias: number): LevelChoice | null {
    if (pyramid.length === 0 || !(zoom > 0)) return null;

    let best = 0;
    let bestScore = Infinity;
    pyramid.forEach((level, i) => {
        const score = levelScore(zoom, level.scale, bias);
        if (score < bestScore) {
            bestScore = score;
            best = i;
        }
    });

    const level = pyramid[best];
    return { index: best, scale: level.scale, image: level.image, rel: zoom / level.scale };
}
