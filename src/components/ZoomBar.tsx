/**
 * ZoomBar - zoom buttons and the current zoom as a percentage
 */

import { Button } from '../ui/Button';
import { Icon } from '../ui/Icon';

interface ZoomBarProps {
    zoom: number;
    disabled?: boolean;
    onZoomIn: () => void;
    onZoomOut: () => void;
    onFit: () => void;
    onActualSize: () => void;
}

export function ZoomBar({ zoom, disabled, onZoomIn, onZoomOut, onFit, onActualSize }: ZoomBarProps) {
    return (
        <div className="zoom-bar" role="group" aria-label="Zoom">
            <Button variant="ghost" size="sm" onClick={onZoomOut} disabled={disabled} aria-label="Zoom out">
                <Icon name="zoomOut" size={16} />
            </Button>
            <span className="zoom-bar__value" data-testid="zoom-value">{Math.round(zoom * 100)}%</span>
            <Button variant="ghost" size="sm" onClick={onZoomIn} disabled={disabled} aria-label="Zoom in">
                <Icon name="zoomIn" size={16} />
            </Button>
            <Button variant="ghost" size="sm" onClick={onFit} disabled={disabled} title="Zoom to fit (F)">
                <Icon name="fit" size={16} /> Fit
            </Button>
            <Button variant="ghost" size="sm" onClick={onActualSize} disabled={disabled} title="Actual size (0)">
                1:1
            </Button>
        </div>
    );
}
