/**
 * What the viewport shows for the current selection:
 * TIM + CLUT -> rendered sheet -> frames -> the sheet or the current frame
 */

import { detectFrameLayout, sliceFrames } from './frameStrip';
import { clampFrameIndex } from './animation';
import { renderTim } from './timDecoder';
import { bppLabel, clutLabel, pixelWidth } from './timParser';
import type { RasterCache } from './rasterCache';
import type { AnimationSettings, Clut, Raster, TimImage } from './types';

export interface DisplayImage {
    sheet: Raster;
    frames: Raster[];
    frameIndex: number;
    /** The raster handed to the viewport */
    raster: Raster;
}

export function renderSheet(tim: TimImage, clut: Clut | null, cache: RasterCache): Raster {
    return cache.getOrCreate(tim.id, clut?.id ?? null, () => renderTim(tim, clut));
}

export function resolveDisplayImage(
    sheet: Raster,
    animation: Pick<AnimationSettings, 'enabled' | 'frameWidth' | 'frameHeight' | 'direction' | 'frameIndex'>
): DisplayImage {
    let { frameWidth, frameHeight, direction } = animation;
    if (frameWidth <= 0 || frameHeight <= 0) {
        const layout = detectFrameLayout(sheet.width, sheet.height);
        frameWidth = layout.frameWidth;
        frameHeight = layout.frameHeight;
        direction = layout.direction;
    }

    const frames = sliceFrames(sheet, frameWidth, frameHeight, direction);
    const frameIndex = clampFrameIndex(animation.frameIndex, frames.length);
    return {
        sheet,
        frames,
        frameIndex,
        raster: animation.enabled ? frames[frameIndex] : sheet,
    };
}

/**
 * Frame settings to adopt when a TIM is selected: the detected strip layout
 * when it finds several frames or no frame size is set yet, otherwise nothing.
 */
export function autoFrameSettings(
    sheet: Pick<Raster, 'width' | 'height'>,
    current: Pick<AnimationSettings, 'frameWidth' | 'frameHeight'>
): Partial<AnimationSettings> | null {
    const layout = detectFrameLayout(sheet.width, sheet.height);
    if (layout.frameCount > 1 || current.frameWidth === 0 || current.frameHeight === 0) {
        return {
            frameWidth: layout.frameWidth,
            frameHeight: layout.frameHeight,
            direction: layout.direction,
            frameIndex: 0,
        };
    }
    return null;
}

export function describeSelection(tim: TimImage, clut: Clut | null, frameCount: number | null): string {
    const frames = frameCount !== null ? ` | frames ${frameCount}` : '';
    const palette = clut ? clutLabel(clut) : '(no CLUT)';
    return `${tim.name} | ${bppLabel(tim.bppMode)} | ${pixelWidth(tim)}×${tim.height}${frames} | CLUT: ${palette}`;
}
