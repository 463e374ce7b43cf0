/**
 * Resolution pyramid: the source plus successive half-resolution copies
 */

import { resampleRaster } from './resample';
import { createLogger } from './logger';
import type { Pyramid, Raster, ResampleFilter } from './types';

const log = createLogger('Pyramid');

export interface PyramidOptions {
    maxLevels: number;
    /** Stop halving once a level's smaller side is at or below this */
    minDimension: number;
    filter: ResampleFilter;
}

export function buildPyramid(source: Raster, options: PyramidOptions): Pyramid {
    const levels: Pyramid = [{ scale: 1, image: source }];
    let current = source;
    let scale = 1;

    while (levels.length < options.maxLevels) {
        if (Math.min(current.width, current.height) <= options.minDimension) break;

        const w = Math.max(1, Math.floor(current.width / 2));
        const h = Math.max(1, Math.floor(current.height / 2));
        const next = resampleRaster(current, w, h, options.filter);
        if (!next) break;

        scale *= 0.5;
        levels.push({ scale, image: next });
        current = next;
    }

    log.debug(
        `Built ${levels.length} level(s) for ${source.width}x${source.height}`,
        levels.map((l) => `${l.image.width}x${l.image.height}@${l.scale}`)
    );
    return levels;
}
