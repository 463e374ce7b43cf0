/**
 * Browser file I/O: reading picked files, saving downloads, PNG via canvas
 */

import { rasterToCanvas } from './canvasCompositor';
import { createLogger } from './logger';
import type { Raster } from './types';

const log = createLogger('FileIO');

export const TIM_EXTENSION = /\.tim$/i;

export async function readFileBytes(file: Blob): Promise<Uint8Array> {
    return new Uint8Array(await file.arrayBuffer());
}

export function downloadBlob(blob: Blob, fileName: string): void {
    const url = URL.createObjectURL(blob);
    const a = document.createElement('a');
    a.href = url;
    a.download = fileName;
    a.style.display = 'none';
    document.body.appendChild(a);
    a.click();
    a.remove();
    // Revoke after the click has been handled
    setTimeout(() => URL.revokeObjectURL(url), 0);
    log.info(`Saved ${fileName} (${blob.size} bytes)`);
}

export function downloadBytes(bytes: Uint8Array, fileName: string, mimeType: string): void {
    const copy = new Uint8Array(bytes.byteLength);
    copy.set(bytes);
    downloadBlob(new Blob([copy], { type: mimeType }), fileName);
}

export function downloadText(text: string, fileName: string, mimeType = 'application/json'): void {
    downloadBlob(new Blob([text], { type: mimeType }), fileName);
}

export function rasterToPngBlob(raster: Raster): Promise<Blob> {
    const canvas = rasterToCanvas(raster);
    if (!canvas) return Promise.reject(new Error('Canvas 2D is not available'));
    return new Promise((resolve, reject) => {
        canvas.toBlob((blob) => {
            if (blob) resolve(blob);
            else reject(new Error('PNG encoding failed'));
        }, 'image/png');
    });
}

/** Decode an image file (PNG, BMP, ...) to RGBA through the browser's decoder */
export async function decodeImageFile(file: Blob): Promise<Raster> {
    const bitmap = await createImageBitmap(file, { premultiplyAlpha: 'none', colorSpaceConversion: 'none' });
    try {
        const canvas = document.createElement('canvas');
        canvas.width = bitmap.width;
        canvas.height = bitmap.height;
        const ctx = canvas.getContext('2d');
        if (!ctx) throw new Error('Canvas 2D is not available');
        ctx.drawImage(bitmap, 0, 0);
        const imageData = ctx.getImageData(0, 0, bitmap.width, bitmap.height);
        return { width: imageData.width, height: imageData.height, data: imageData.data };
    } finally {
        bitmap.close();
    }
}
