/**
 * StatusBar - current selection summary, zoom and file counts
 */

import { useAppState } from '../state/store';
import './StatusBar.css';

export function StatusBar() {
    const { statusMessage, tims, cluts, zoom, animation } = useAppState();

    return (
        <footer className="status-bar">
            <div className="status-bar__left">
                <span className="status-bar__message" data-testid="status-message">{statusMessage}</span>
            </div>

            <div className="status-bar__right">
                {animation.enabled && (
                    <span className="status-bar__badge">{animation.playing ? 'PLAYING' : 'ANIM'}</span>
                )}
                <span className="status-bar__stat">{Math.round(zoom * 100)}%</span>
                {tims.length > 0 ? (
                    <span className="status-bar__stat">
                        {tims.length} {tims.length === 1 ? 'file' : 'files'} · {cluts.length} CLUTs
                    </span>
                ) : (
                    <span className="status-bar__stat">No files</span>
                )}
            </div>
        </footer>
    );
}
