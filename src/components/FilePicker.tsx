/**
 * FilePicker - opens one or more .tim files through a hidden file input
 */

import { useRef, type ChangeEvent } from 'react';
import { Button } from '../ui/Button';
import { Icon } from '../ui/Icon';

interface FilePickerProps {
    onFilesSelected: (files: File[]) => void;
    disabled?: boolean;
}

export function FilePicker({ onFilesSelected, disabled }: FilePickerProps) {
    const inputRef = useRef<HTMLInputElement>(null);

    const handleChange = (e: ChangeEvent<HTMLInputElement>) => {
        const files = Array.from(e.target.files ?? []);
        // Allow picking the same files again
        e.target.value = '';
        if (files.length > 0) onFilesSelected(files);
    };

    return (
        <>
            <input
                ref={inputRef}
                type="file"
                accept=".tim,.TIM"
                multiple
                hidden
                data-testid="tim-file-input"
                onChange={handleChange}
            />
            <Button variant="primary" onClick={() => inputRef.current?.click()} disabled={disabled}>
                <Icon name="open" size={16} /> Open TIMs
            </Button>
        </>
    );
}
