/**
 * DropZone - accepts dropped .tim files anywhere over its children
 */

import { useState, useCallback, useRef, type DragEvent, type ReactNode } from 'react';
import { createLogger } from '../core/logger';
import { TIM_EXTENSION } from '../core/fileIO';
import './DropZone.css';

const log = createLogger('DropZone');

interface DropZoneProps {
    onFiles: (files: File[]) => void;
    disabled?: boolean;
    children: ReactNode;
    className?: string;
}

export function DropZone({ onFiles, disabled, children, className = '' }: DropZoneProps) {
    const [isDragOver, setIsDragOver] = useState(false);
    const dragCounter = useRef(0);

    const handleDragEnter = useCallback(
        (e: DragEvent) => {
            e.preventDefault();
            e.stopPropagation();
            if (disabled) return;
            dragCounter.current++;
            if (e.dataTransfer.types.includes('Files')) {
                setIsDragOver(true);
            }
        },
        [disabled]
    );

    const handleDragLeave = useCallback((e: DragEvent) => {
        e.preventDefault();
        e.stopPropagation();
        dragCounter.current = Math.max(0, dragCounter.current - 1);
        if (dragCounter.current === 0) {
            setIsDragOver(false);
        }
    }, []);

    const handleDragOver = useCallback((e: DragEvent) => {
        e.preventDefault();
        e.stopPropagation();
    }, []);

    const handleDrop = useCallback(
        (e: DragEvent) => {
            e.preventDefault();
            e.stopPropagation();
            dragCounter.current = 0;
            setIsDragOver(false);
            if (disabled) return;

            const dropped = Array.from(e.dataTransfer.files);
            const files = dropped.filter((f) => TIM_EXTENSION.test(f.name));
            const skipped = dropped.length - files.length;
            if (skipped > 0) log.info(`Skipped ${skipped} non-TIM file(s)`);
            if (files.length === 0) return;

            log.info(`Dropped ${files.length} TIM file(s)`);
            onFiles(files);
        },
        [disabled, onFiles]
    );

    const classes = ['dropzone', isDragOver ? 'dropzone--active' : '', disabled ? 'dropzone--disabled' : '', className]
        .filter(Boolean)
        .join(' ');

    return (
        <div
            className={classes}
            data-testid="dropzone"
            onDragEnter={handleDragEnter}
            onDragLeave={handleDragLeave}
            onDragOver={handleDragOver}
            onDrop={handleDrop}
        >
            {children}
            {isDragOver && (
                <div className="dropzone__overlay">
                    <div className="dropzone__overlay-content">Drop .tim files here</div>
                </div>
            )}
        </div>
    );
}
