/**
 * Error Boundary - reports render errors as toasts and offers a reset
 */

import { Component, type ErrorInfo, type ReactNode } from 'react';
import { createLogger } from '../core/logger';

const log = createLogger('ErrorBoundary');

interface Props {
    children: ReactNode;
    onError?: (error: Error, errorInfo: ErrorInfo) => void;
    fallback?: ReactNode;
}

interface State {
    error: Error | null;
}

export class ErrorBoundary extends Component<Props, State> {
    state: State = { error: null };

    static getDerivedStateFromError(error: Error): State {
        return { error };
    }

    componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
        log.error('Uncaught render error:', error, errorInfo.componentStack);
        this.props.onError?.(error, errorInfo);
    }

    render() {
        const { error } = this.state;
        if (!error) return this.props.children;
        if (this.props.fallback) return this.props.fallback;

        return (
            <div className="error-boundary-fallback" role="alert">
                <h2>The viewer stopped rendering</h2>
                <p>{error.message || 'Unknown error'}</p>
                <button type="button" onClick={() => this.setState({ error: null })}>
                    Try again
                </button>
            </div>
        );
    }
}
