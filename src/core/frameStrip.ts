/**
 * Frame strips
 * Animation sheets are stored as a single row or column of equally sized frames.
 */

import { createRaster, cropRaster, pasteRaster } from './raster';
import type { FrameDirection, Raster } from './types';

export interface FrameLayout {
    frameWidth: number;
    frameHeight: number;
    direction: FrameDirection;
    frameCount: number;
}

export interface FrameRect {
    x: number;
    y: number;
    w: number;
    h: number;
}

/**
 * Guess the strip layout: a tall sheet whose height divides by its width is a
 * vertical strip of square frames, a wide one the horizontal equivalent,
 * anything else a single frame.
 */
export function detectFrameLayout(sheetWidth: number, sheetHeight: number): FrameLayout {
    if (sheetWidth > 0 && sheetHeight > 0) {
        if (sheetHeight >= sheetWidth && sheetHeight % sheetWidth === 0) {
            return {
                frameWidth: sheetWidth,
                frameHeight: sheetWidth,
                direction: 'vertical',
                frameCount: Math.max(1, sheetHeight / sheetWidth),
            };
        }
        if (sheetWidth >= sheetHeight && sheetWidth % sheetHeight === 0) {
            return {
                frameWidth: sheetHeight,
                frameHeight: sheetHeight,
                direction: 'horizontal',
                frameCount: Math.max(1, sheetWidth / sheetHeight),
            };
        }
    }
    return { frameWidth: sheetWidth, frameHeight: sheetHeight, direction: 'horizontal', frameCount: 1 };
}

export function countFrames(
    sheetWidth: number,
    sheetHeight: number,
    frameWidth: number,
    frameHeight: number,
    direction: FrameDirection
): number {
    if (frameWidth <= 0 || frameHeight <= 0) return 1;
    const n = direction === 'vertical'
        ? Math.floor(sheetHeight / frameHeight)
        : Math.floor(sheetWidth / frameWidth);
    return Math.max(1, n);
}

export function computeFrameRect(
    frameWidth: number,
    frameHeight: number,
    direction: FrameDirection,
    index: number
): FrameRect {
    const i = Math.max(0, Math.floor(index));
    return direction === 'vertical'
        ? { x: 0, y: i * frameHeight, w: frameWidth, h: frameHeight }
        : { x: i * frameWidth, y: 0, w: frameWidth, h: frameHeight };
}

/**
 * Cut a sheet into frames. Frames reaching past the sheet are padded with transparency.
 * Invalid frame sizes return the sheet itself as the only frame.
 */
export function sliceFrames(
    sheet: Raster,
    frameWidth: number,
    frameHeight: number,
    direction: FrameDirection
): Raster[] {
    const fw = Math.floor(frameWidth);
    const fh = Math.floor(frameHeight);
    if (fw <= 0 || fh <= 0) return [sheet];

    const count = countFrames(sheet.width, sheet.height, fw, fh, direction);
    const frames: Raster[] = [];
    for (let i = 0; i < count; i++) {
        const r = computeFrameRect(fw, fh, direction, i);
        const frame = createRaster(fw, fh);
        const part = cropRaster(sheet, { left: r.x, top: r.y, right: r.x + r.w, bottom: r.y + r.h });
        if (part) pasteRaster(frame, part, 0, 0);
        frames.push(frame);
    }
    return frames.length > 0 ? frames : [sheet];
}
