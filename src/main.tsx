import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { App } from './app/App';
import { createLogger } from './core/logger';

const log = createLogger('Main');

const container = document.getElementById('root');
if (container) {
    createRoot(container).render(
        <StrictMode>
            <App />
        </StrictMode>
    );
} else {
    log.error('Missing #root element; nothing to mount');
}
