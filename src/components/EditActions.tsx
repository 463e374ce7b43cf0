/**
 * EditActions - image export, index round-trip and TIM save
 */

import { useRef, type ChangeEvent } from 'react';
import { Button } from '../ui/Button';
import { Icon } from '../ui/Icon';
import { createLogger } from '../core/logger';
import { buildTimBytes, isIndexed } from '../core/timParser';
import { applyIndexImport, buildIndexExport, parseIndexMeta, serializeIndexMeta } from '../core/indexEdit';
import { editedTimFileName, encodeBmp, exportFileName, indexExportFileNames, type ExportFormat } from '../core/imageExport';
import { decodeImageFile, downloadBlob, downloadBytes, downloadText, rasterToPngBlob } from '../core/fileIO';
import { getRasterCache } from '../core/rasterCache';
import { useAppDispatch } from '../state/store';
import type { DisplayImage } from '../core/displayImage';
import type { TimImage } from '../core/types';

const log = createLogger('EditActions');

const JSON_FILE = /\.json$/i;

interface EditActionsProps {
    tim: TimImage | null;
    display: DisplayImage | null;
    /** Whether the viewport shows a single animation frame */
    showingFrame: boolean;
}

export function EditActions({ tim, display, showingFrame }: EditActionsProps) {
    const dispatch = useAppDispatch();
    const importRef = useRef<HTMLInputElement>(null);

    const report = (context: string) => (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        log.error(`${context} failed:`, err);
        dispatch({
            type: 'ADD_ERROR',
            error: {
                id: `${Date.now()}-${Math.random().toString(36).slice(2)}`,
                message: `${context} failed: ${message}`,
                stack: err instanceof Error ? err.stack : undefined,
                timestamp: Date.now(),
            },
        });
        dispatch({ type: 'SET_STATUS', message: `${context} failed.` });
    };

    const exportImage = async (format: ExportFormat) => {
        if (!tim || !display) return;
        const raster = display.raster;
        const frameIndex = showingFrame ? display.frameIndex : null;
        const fileName = exportFileName(tim.name, format, frameIndex);
        if (format === 'bmp') {
            downloadBytes(encodeBmp(raster), fileName, 'image/bmp');
        } else {
            downloadBlob(await rasterToPngBlob(raster), fileName);
        }
        dispatch({ type: 'SET_STATUS', message: `Exported ${fileName}` });
    };

    const exportIndices = async () => {
        if (!tim) return;
        const { raster, meta } = buildIndexExport(tim);
        const names = indexExportFileNames(tim.name);
        downloadBlob(await rasterToPngBlob(raster), names.image);
        downloadText(serializeIndexMeta(meta), names.meta);
        dispatch({ type: 'SET_STATUS', message: `Exported ${names.image} and ${names.meta}` });
    };

    const importIndices = async (files: File[]) => {
        if (!tim) return;
        const metaFile = files.find((f) => JSON_FILE.test(f.name)) ?? null;
        const imageFile = files.find((f) => !JSON_FILE.test(f.name));
        if (!imageFile) {
            throw new Error('Choose the edited index image (and optionally its .json)');
        }

        const meta = metaFile ? parseIndexMeta(await metaFile.text()) : null;
        if (meta && meta.sourceTim !== tim.name) {
            log.warn(`Meta was exported from ${meta.sourceTim}, importing into ${tim.name}`);
        }
        const edited = await decodeImageFile(imageFile);
        const updated = applyIndexImport(tim, edited, meta);

        getRasterCache().evictTim(tim.id);
        dispatch({ type: 'REPLACE_TIM', tim: updated });
        dispatch({ type: 'SET_STATUS', message: `Imported indices from ${imageFile.name} (${edited.width}×${edited.height})` });
    };

    const handleImportChange = (e: ChangeEvent<HTMLInputElement>) => {
        const files = Array.from(e.target.files ?? []);
        e.target.value = '';
        if (files.length > 0) importIndices(files).catch(report('Index import'));
    };

    const saveTim = () => {
        if (!tim) return;
        try {
            const fileName = editedTimFileName(tim.name);
            downloadBytes(buildTimBytes(tim), fileName, 'application/octet-stream');
            dispatch({ type: 'SET_STATUS', message: `Saved ${fileName}` });
        } catch (err) {
            report('Save TIM')(err);
        }
    };

    const hasImage = tim !== null && display !== null;
    const indexed = tim !== null && isIndexed(tim);

    return (
        <div className="edit-actions" role="group" aria-label="Export and edit">
            <Button size="sm" disabled={!hasImage} onClick={() => exportImage('png').catch(report('PNG export'))}>
                <Icon name="download" size={14} /> PNG
            </Button>
            <Button size="sm" disabled={!hasImage} onClick={() => exportImage('bmp').catch(report('BMP export'))}>
                <Icon name="download" size={14} /> BMP
            </Button>
            <Button
                size="sm"
                disabled={!indexed}
                onClick={() => exportIndices().catch(report('Index export'))}
                title="Export palette indices as a grey ramp image with a .json sidecar"
            >
                <Icon name="download" size={14} /> Indices
            </Button>
            <input
                ref={importRef}
                type="file"
                accept=".png,.bmp,.json"
                multiple
                hidden
                data-testid="index-import-input"
                onChange={handleImportChange}
            />
            <Button size="sm" disabled={!indexed} onClick={() => importRef.current?.click()}>
                <Icon name="upload" size={14} /> Import indices
            </Button>
            <Button size="sm" disabled={!tim} onClick={saveTim}>
                <Icon name="save" size={14} /> Save TIM
            </Button>
        </div>
    );
}
