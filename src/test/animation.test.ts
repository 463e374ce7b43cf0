/**
 * Tests for frame stepping and playback
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import {
    AnimationPlayer,
    clampFps,
    clampFrameIndex,
    frameDelayMs,
    nextFrameIndex,
    stepFrame,
    type AnimationPlayerOptions,
} from '../core/animation';
import { fakeTimerHost } from './timerHost';

describe('frame helpers', () => {
    it('clamps fps into the playable range', () => {
        expect(clampFps(0)).toBe(8);
        expect(clampFps(Number.NaN)).toBe(8);
        expect(clampFps(0.1)).toBe(0.5);
        expect(clampFps(240)).toBe(60);
        expect(clampFps(12)).toBe(12);
    });

    it('turns fps into a whole-millisecond delay', () => {
        expect(frameDelayMs(8)).toBe(125);
        expect(frameDelayMs(60)).toBe(17);
    });

    it('wraps or stops at the last frame', () => {
        expect(nextFrameIndex(1, 3, false)).toBe(2);
        expect(nextFrameIndex(2, 3, true)).toBe(0);
        expect(nextFrameIndex(2, 3, false)).toBeNull();
        expect(nextFrameIndex(0, 0, true)).toBeNull();
    });

    it('steps and clamps to the strip', () => {
        expect(stepFrame(0, 5, -1)).toBe(0);
        expect(stepFrame(4, 5, 1)).toBe(4);
        expect(stepFrame(2, 5, 1)).toBe(3);
        expect(stepFrame(3, 0, 1)).toBe(0);
        expect(clampFrameIndex(2.7, 5)).toBe(2);
        expect(clampFrameIndex(Number.POSITIVE_INFINITY, 5)).toBe(0);
    });
});

describe('AnimationPlayer', () => {
    let onFrame: Mock<(index: number) => void>;
    let onStop: Mock<() => void>;

    const create = (options: Partial<AnimationPlayerOptions> = {}) =>
        new AnimationPlayer({ frameCount: 3, fps: 10, timers: fakeTimerHost, onFrame, onStop, ...options });

    beforeEach(() => {
        vi.useFakeTimers();
        onFrame = vi.fn<(index: number) => void>();
        onStop = vi.fn<() => void>();
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('advances on play and then once per frame delay', () => {
        const player = create({ loop: true });
        player.play();
        expect(onFrame.mock.calls.map((c) => c[0])).toEqual([1]);
        vi.advanceTimersByTime(300);
        expect(onFrame.mock.calls.map((c) => c[0])).toEqual([1, 2, 0, 1]);
        expect(player.currentIndex).toBe(1);
        player.dispose();
    });

    it('stops on the last frame without looping', () => {
        const player = create({ loop: false });
        player.play();
        vi.advanceTimersByTime(1000);
        expect(onFrame.mock.calls.map((c) => c[0])).toEqual([1, 2]);
        expect(onStop).toHaveBeenCalledTimes(1);
        expect(player.isPlaying).toBe(false);
    });

    it('continues from the seek position', () => {
        const player = create();
        player.seek(2);
        player.play();
        expect(onFrame).toHaveBeenLastCalledWith(0);
        player.dispose();
    });

    it('picks up a new fps on the next frame', () => {
        const player = create();
        player.play();
        player.setFps(2);
        vi.advanceTimersByTime(100);
        expect(onFrame).toHaveBeenCalledTimes(2);
        vi.advanceTimersByTime(499);
        expect(onFrame).toHaveBeenCalledTimes(2);
        vi.advanceTimersByTime(1);
        expect(onFrame).toHaveBeenCalledTimes(3);
        player.dispose();
    });

    it('pauses when the strip becomes empty', () => {
        const player = create();
        player.play();
        player.setFrameCount(0);
        expect(onStop).toHaveBeenCalledTimes(1);
        vi.advanceTimersByTime(500);
        expect(onFrame).toHaveBeenCalledTimes(1);
    });

    it('does nothing for an empty strip', () => {
        create({ frameCount: 0 }).play();
        expect(onFrame).not.toHaveBeenCalled();
    });

    it('stops ticking after dispose without reporting a stop', () => {
        const player = create();
        player.play();
        player.dispose();
        vi.advanceTimersByTime(500);
        expect(onFrame).toHaveBeenCalledTimes(1);
        expect(onStop).not.toHaveBeenCalled();
    });
});
