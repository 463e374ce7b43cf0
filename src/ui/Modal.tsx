/**
 * Modal dialog; Escape and the backdrop close it
 */

import { useEffect, useId, type ReactNode } from 'react';
import { Icon } from './Icon';
import { Button } from './Button';
import './Modal.css';

interface ModalProps {
    isOpen: boolean;
    onClose: () => void;
    title: string;
    children: ReactNode;
}

export function Modal({ isOpen, onClose, title, children }: ModalProps) {
    const titleId = useId();

    useEffect(() => {
        if (!isOpen) return;
        const handleKeyDown = (e: KeyboardEvent) => {
            if (e.key === 'Escape') onClose();
        };
        document.addEventListener('keydown', handleKeyDown);
        return () => document.removeEventListener('keydown', handleKeyDown);
    }, [isOpen, onClose]);

    if (!isOpen) return null;

    return (
        <div className="modal-overlay" onClick={onClose}>
            <div
                className="modal"
                onClick={(e) => e.stopPropagation()}
                role="dialog"
                aria-modal="true"
                aria-labelledby={titleId}
            >
                <header className="modal__header">
                    <h2 id={titleId} className="modal__title">
                        {title}
                    </h2>
                    <Button variant="ghost" size="sm" onClick={onClose} aria-label="Close">
                        <Icon name="close" size={18} />
                    </Button>
                </header>
                <div className="modal__content">{children}</div>
            </div>
        </div>
    );
}
