/**
 * Toast notifications for load, import and export errors
 */

import { useEffect, useState } from 'react';
import { Icon } from './Icon';
import { Button } from './Button';
import { createLogger } from '../core/logger';
import './Toast.css';

const log = createLogger('Toast');

export type ToastKind = 'error' | 'warning' | 'info';

export interface ToastItem {
    id: string;
    message: string;
    details?: string;
    type?: ToastKind;
}

interface ToastProps extends ToastItem {
    onDismiss: (id: string) => void;
    /** ms; 0 keeps the toast until dismissed */
    autoDismiss?: number;
}

export function Toast({ id, message, details, type = 'error', onDismiss, autoDismiss = 0 }: ToastProps) {
    const [showDetails, setShowDetails] = useState(false);
    const [copied, setCopied] = useState(false);

    useEffect(() => {
        if (autoDismiss <= 0) return;
        const timer = setTimeout(() => onDismiss(id), autoDismiss);
        return () => clearTimeout(timer);
    }, [id, autoDismiss, onDismiss]);

    useEffect(() => {
        if (!copied) return;
        const timer = setTimeout(() => setCopied(false), 2000);
        return () => clearTimeout(timer);
    }, [copied]);

    const handleCopy = () => {
        const text = details ? `${message}\n\n${details}` : message;
        navigator.clipboard.writeText(text).then(
            () => setCopied(true),
            (err: unknown) => log.warn('Clipboard write failed', err)
        );
    };

    return (
        <div className={`toast toast--${type}`} role="alert">
            <Icon name={type} size={20} className="toast__icon" />
            <div className="toast__content">
                <p className="toast__message">{message}</p>
                {details && showDetails && <pre className="toast__details">{details}</pre>}
            </div>
            <div className="toast__actions">
                {details && (
                    <>
                        <Button variant="ghost" size="sm" onClick={() => setShowDetails(!showDetails)}>
                            {showDetails ? 'Hide' : 'Details'}
                        </Button>
                        <Button variant="ghost" size="sm" onClick={handleCopy} aria-label="Copy">
                            <Icon name={copied ? 'check' : 'copy'} size={14} />
                        </Button>
                    </>
                )}
                <Button variant="ghost" size="sm" onClick={() => onDismiss(id)} aria-label="Dismiss">
                    <Icon name="close" size={14} />
                </Button>
            </div>
        </div>
    );
}

interface ToastContainerProps {
    toasts: ToastItem[];
    onDismiss: (id: string) => void;
}

export function ToastContainer({ toasts, onDismiss }: ToastContainerProps) {
    if (toasts.length === 0) return null;

    return (
        <div className="toast-container">
            {toasts.map((toast) => (
                <Toast key={toast.id} {...toast} onDismiss={onDismiss} />
            ))}
        </div>
    );
}
