/**
 * Frame-strip playback
 */

import { TimerTable, browserTimerHost, type TimerHost } from './timerTable';

export const MIN_FPS = 0.5;
export const MAX_FPS = 60;
export const DEFAULT_FPS = 8;

export function clampFps(fps: number): number {
    if (!Number.isFinite(fps) || fps <= 0) return DEFAULT_FPS;
    return Math.max(MIN_FPS, Math.min(MAX_FPS, fps));
}

export function frameDelayMs(fps: number): number {
    return Math.round(1000 / clampFps(fps));
}

/**
 * Index after `current`, or null when playback should stop on the last frame
 */
export function nextFrameIndex(current: number, total: number, loop: boolean): number | null {
    if (total <= 0) return null;
    const next = current + 1;
    if (next < total) return next;
    return loop ? 0 : null;
}

export function clampFrameIndex(index: number, total: number): number {
    if (total <= 0 || !Number.isFinite(index)) return 0;
    return Math.max(0, Math.min(total - 1, Math.floor(index)));
}

/**
 * Step a frame index by `step`, clamped to the strip
 */
export function stepFrame(current: number, total: number, step: number): number {
    if (total <= 0) return 0;
    return clampFrameIndex(current + step, total);
}

export interface AnimationPlayerOptions {
    frameCount: number;
    fps?: number;
    loop?: boolean;
    timers?: TimerHost;
    onFrame: (index: number) => void;
    onStop?: () => void;
}

/**
 * Advances immediately on play, then once per frame delay. Without looping,
 * playback stops when it would move past the last frame.
 */
export class AnimationPlayer {
    private readonly timers: TimerTable<'tick'>;
    private frameCount: number;
    private fps: number;
    private loop: boolean;
    private index = 0;
    private playing = false;

    constructor(private readonly options: AnimationPlayerOptions) {
        this.timers = new TimerTable<'tick'>(options.timers ?? browserTimerHost);
        this.frameCount = Math.max(0, Math.floor(options.frameCount));
        this.fps = clampFps(options.fps ?? DEFAULT_FPS);
        this.loop = options.loop ?? true;
    }

    get isPlaying(): boolean {
        return this.playing;
    }

    get currentIndex(): number {
        return this.index;
    }

    play(): void {
        if (this.frameCount <= 0) return;
        this.playing = true;
        this.tick();
    }

    pause(): void {
        this.timers.cancel('tick');
        if (this.playing) {
            this.playing = false;
            this.options.onStop?.();
        }
    }

    /** Jump to a frame without starting playback */
    seek(index: number): void {
        this.index = clampFrameIndex(index, this.frameCount);
    }

    setFps(fps: number): void {
        this.fps = clampFps(fps);
    }

    setLoop(loop: boolean): void {
        this.loop = loop;
    }

    setFrameCount(count: number): void {
        this.frameCount = Math.max(0, Math.floor(count));
        this.index = clampFrameIndex(this.index, this.frameCount);
        if (this.frameCount === 0) this.pause();
    }

    dispose(): void {
        this.timers.cancelAll();
        this.playing = false;
    }

    private tick(): void {
        if (!this.playing) return;
        const next = nextFrameIndex(this.index, this.frameCount, this.loop);
        if (next === null) {
            this.pause();
            return;
        }
        this.index = next;
        this.options.onFrame(next);
        this.timers.schedule('tick', frameDelayMs(this.fps), () => this.tick());
    }
}
