/**
 * Core types for the TIM viewer
 */

// ============================================================================
// Raster & geometry
// ============================================================================

/** RGBA pixel buffer, row-major, 4 bytes per pixel */
export interface Raster {
    width: number;
    height: number;
    data: Uint8ClampedArray;
}

export type Rgba = readonly [number, number, number, number];

/** Axis-aligned rectangle; right/bottom are exclusive */
export interface Rect {
    left: number;
    top: number;
    right: number;
    bottom: number;
}

export type ResampleFilter = 'nearest' | 'bilinear' | 'area';

export interface PyramidLevel {
    /** Fraction of the source resolution (1, 0.5, 0.25, ...) */
    scale: number;
    image: Raster;
}

export type Pyramid = PyramidLevel[];

// ============================================================================
// Viewport
// ============================================================================

export interface ViewportState {
    zoom: number;
    /** World coordinate of the canvas' left edge */
    scrollX: number;
    /** World coordinate of the canvas' top edge */
    scrollY: number;
    canvasWidth: number;
    canvasHeight: number;
    /** Set once the user pans or wheel-zooms; cleared by recentering operations */
    userPanned: boolean;
}

/** A finished layer bitmap anchored in world space */
export interface LayerBitmap {
    raster: Raster;
    worldX: number;
    worldY: number;
}

/** Everything a render target needs to paint one frame */
export interface CompositeFrame {
    canvasWidth: number;
    canvasHeight: number;
    scrollX: number;
    scrollY: number;
    background: Rgba;
    /** Drawn first */
    preview: LayerBitmap | null;
    /** Drawn over the preview */
    sharp: LayerBitmap | null;
    /** Current tile in screen space, for the debug overlay */
    tileOutline: Rect | null;
}

export interface RenderTarget {
    present(frame: CompositeFrame): void;
}

export type DragPhase = 'idle' | 'frozen' | 'escaped';

// ============================================================================
// TIM data model
// ============================================================================

/** 0 = 4bpp, 1 = 8bpp, 2 = 16bpp, 3 = 24bpp */
export type BppMode = 0 | 1 | 2 | 3;

export interface TimImage {
    id: string;
    name: string;
    flags: number;
    bppMode: BppMode;
    hasClut: boolean;
    /** Raw CLUT block including its length field, kept for re-encoding */
    clutBlock: Uint8Array | null;
    imageX: number;
    imageY: number;
    /** Image width in 16-bit words as stored in the file */
    widthWords: number;
    height: number;
    pixelData: Uint8Array;
}

/** One palette row taken from a TIM's CLUT block */
export interface Clut {
    id: string;
    sourceId: string;
    sourceName: string;
    row: number;
    width: number;
    /** Rows in the block this row came from */
    height: number;
    raw15: Uint16Array;
    /** RGBA, `width` entries */
    colors: Uint8ClampedArray;
}

export type FrameDirection = 'horizontal' | 'vertical';

export interface AnimationSettings {
    enabled: boolean;
    frameWidth: number;
    frameHeight: number;
    direction: FrameDirection;
    fps: number;
    loop: boolean;
    frameIndex: number;
    playing: boolean;
}

// ============================================================================
// App
// ============================================================================

/** Error surfaced to the user as a toast */
export interface AppError {
    id: string;
    message: string;
    details?: string;
    stack?: string;
    timestamp: number;
}
