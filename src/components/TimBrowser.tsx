/**
 * TimBrowser - loaded files and every CLUT row found in them
 */

import { useState } from 'react';
import { Icon } from '../ui/Icon';
import { useAppState, useAppDispatch, selectAppliedClut, selectSelectedTim } from '../state/store';
import { bppLabel, clutLabel, isIndexed, pixelWidth } from '../core/timParser';
import { cssColor } from '../core/canvasCompositor';
import type { Clut, TimImage } from '../core/types';
import './TimBrowser.css';

type Tab = 'files' | 'cluts';

const SWATCH_LIMIT = 16;

function ClutSwatches({ clut }: { clut: Clut }) {
    const count = Math.min(clut.width, SWATCH_LIMIT);
    const swatches = [];
    for (let i = 0; i < count; i++) {
        const o = i * 4;
        const c = clut.colors;
        swatches.push(
            <span
                key={i}
                className="clut-item__swatch"
                style={{ background: cssColor([c[o], c[o + 1], c[o + 2], c[o + 3]]) }}
            />
        );
    }
    return <span className="clut-item__swatches">{swatches}</span>;
}

interface TimItemProps {
    tim: TimImage;
    isSelected: boolean;
    onSelect: () => void;
}

function TimItem({ tim, isSelected, onSelect }: TimItemProps) {
    return (
        <li className="tim-item">
            <button
                type="button"
                className={`tim-item__btn ${isSelected ? 'tim-item__btn--selected' : ''}`}
                onClick={onSelect}
                aria-current={isSelected}
            >
                <span className="tim-item__name">{tim.name}</span>
                <span className="tim-item__meta">
                    {bppLabel(tim.bppMode)} · {pixelWidth(tim)}×{tim.height}
                </span>
            </button>
        </li>
    );
}

export function TimBrowser() {
    const state = useAppState();
    const dispatch = useAppDispatch();
    const [tab, setTab] = useState<Tab>('files');

    const { tims, cluts } = state;
    const selected = selectSelectedTim(state);
    const applied = selectAppliedClut(state);
    const palettesApply = selected !== null && isIndexed(selected);

    return (
        <aside className="tim-browser">
            <header className="tim-browser__header" role="tablist">
                <button
                    type="button"
                    role="tab"
                    aria-selected={tab === 'files'}
                    className={`tim-browser__tab ${tab === 'files' ? 'tim-browser__tab--active' : ''}`}
                    onClick={() => setTab('files')}
                >
                    Files ({tims.length})
                </button>
                <button
                    type="button"
                    role="tab"
                    aria-selected={tab === 'cluts'}
                    className={`tim-browser__tab ${tab === 'cluts' ? 'tim-browser__tab--active' : ''}`}
                    onClick={() => setTab('cluts')}
                >
                    CLUTs ({cluts.length})
                </button>
            </header>

            <div className="tim-browser__content">
                {tims.length === 0 ? (
                    <div className="tim-browser__empty">
                        <Icon name="open" size={32} />
                        <p>No TIMs loaded</p>
                        <p className="tim-browser__hint">Use &quot;Open TIMs&quot; or drop files here</p>
                    </div>
                ) : tab === 'files' ? (
                    <ul className="tim-list">
                        {tims.map((tim) => (
                            <TimItem
                                key={tim.id}
                                tim={tim}
                                isSelected={tim.id === selected?.id}
                                onSelect={() => dispatch({ type: 'SELECT_TIM', id: tim.id })}
                            />
                        ))}
                    </ul>
                ) : (
                    <ul className="clut-list">
                        {!palettesApply && (
                            <li className="tim-browser__hint">The selected TIM uses direct colour.</li>
                        )}
                        <li className="clut-item">
                            <button
                                type="button"
                                className={`clut-item__btn ${palettesApply && !applied ? 'clut-item__btn--selected' : ''}`}
                                disabled={!palettesApply}
                                onClick={() => dispatch({ type: 'APPLY_CLUT', clutId: null })}
                            >
                                (no CLUT)
                            </button>
                        </li>
                        {cluts.map((clut) => (
                            <li key={clut.id} className="clut-item">
                                <button
                                    type="button"
                                    className={`clut-item__btn ${applied?.id === clut.id ? 'clut-item__btn--selected' : ''}`}
                                    disabled={!palettesApply}
                                    onClick={() => dispatch({ type: 'APPLY_CLUT', clutId: clut.id })}
                                >
                                    <span className="clut-item__label">{clutLabel(clut)}</span>
                                    <ClutSwatches clut={clut} />
                                </button>
                            </li>
                        ))}
                    </ul>
                )}
            </div>
        </aside>
    );
}
