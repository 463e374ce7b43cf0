/**
 * AnimationBar - frame-strip settings, playback and the frame scrubber
 */

import type { ChangeEvent } from 'react';
import { Button } from '../ui/Button';
import { Icon } from '../ui/Icon';
import { Toggle } from '../ui/Toggle';
import { MAX_FPS, MIN_FPS } from '../core/animation';
import { useAppDispatch, useAppState } from '../state/store';
import type { AnimationSettings, FrameDirection } from '../core/types';
import './AnimationBar.css';

interface AnimationBarProps {
    frameCount: number;
    disabled?: boolean;
    /** Re-run frame detection on the current sheet */
    onAutoDetect: () => void;
}

function readNumber(e: ChangeEvent<HTMLInputElement>): number | null {
    const value = parseFloat(e.target.value);
    return Number.isFinite(value) ? value : null;
}

export function AnimationBar({ frameCount, disabled, onAutoDetect }: AnimationBarProps) {
    const { animation } = useAppState();
    const dispatch = useAppDispatch();

    const update = (settings: Partial<AnimationSettings>) => dispatch({ type: 'SET_ANIMATION', settings });
    const setSize = (key: 'frameWidth' | 'frameHeight') => (e: ChangeEvent<HTMLInputElement>) => {
        const value = readNumber(e);
        if (value === null || value < 0) return;
        const size = Math.floor(value);
        update(key === 'frameWidth' ? { frameWidth: size, frameIndex: 0 } : { frameHeight: size, frameIndex: 0 });
    };

    const controlsDisabled = disabled || !animation.enabled;
    const lastFrame = Math.max(0, frameCount - 1);

    return (
        <div className="animation-bar">
            <Toggle
                label="Animate"
                checked={animation.enabled}
                disabled={disabled}
                onChange={(e) => update({ enabled: e.target.checked, frameIndex: 0 })}
            />

            <label className="animation-bar__field">
                W
                <input
                    type="number"
                    min={0}
                    value={animation.frameWidth}
                    disabled={controlsDisabled}
                    onChange={setSize('frameWidth')}
                    aria-label="Frame width"
                />
            </label>
            <label className="animation-bar__field">
                H
                <input
                    type="number"
                    min={0}
                    value={animation.frameHeight}
                    disabled={controlsDisabled}
                    onChange={setSize('frameHeight')}
                    aria-label="Frame height"
                />
            </label>
            <select
                value={animation.direction}
                disabled={controlsDisabled}
                aria-label="Frame direction"
                onChange={(e) => {
                    const direction: FrameDirection = e.target.value === 'vertical' ? 'vertical' : 'horizontal';
                    update({ direction, frameIndex: 0 });
                }}
            >
                <option value="horizontal">Horizontal</option>
                <option value="vertical">Vertical</option>
            </select>
            <Button size="sm" onClick={onAutoDetect} disabled={controlsDisabled}>
                Auto
            </Button>

            <label className="animation-bar__field">
                FPS
                <input
                    type="number"
                    min={MIN_FPS}
                    max={MAX_FPS}
                    step={0.5}
                    value={animation.fps}
                    disabled={disabled}
                    onChange={(e) => {
                        const fps = readNumber(e);
                        if (fps !== null) update({ fps });
                    }}
                    aria-label="Frames per second"
                />
            </label>
            <Toggle
                label="Loop"
                checked={animation.loop}
                disabled={disabled}
                onChange={(e) => update({ loop: e.target.checked })}
            />

            <Button
                size="sm"
                variant="primary"
                disabled={controlsDisabled || frameCount < 2}
                onClick={() => update({ playing: !animation.playing })}
                aria-label={animation.playing ? 'Pause' : 'Play'}
            >
                <Icon name={animation.playing ? 'pause' : 'play'} size={14} />
            </Button>
            <input
                type="range"
                className="animation-bar__scrub"
                min={0}
                max={lastFrame}
                value={Math.min(animation.frameIndex, lastFrame)}
                disabled={controlsDisabled || frameCount < 2}
                aria-label="Frame"
                onChange={(e) => dispatch({ type: 'SET_FRAME_INDEX', index: Number(e.target.value) })}
            />
            <span className="animation-bar__counter" data-testid="frame-counter">
                {animation.enabled ? `${Math.min(animation.frameIndex, lastFrame) + 1} / ${frameCount}` : `${frameCount} frames`}
            </span>
        </div>
    );
}
