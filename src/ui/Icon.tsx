/**
 * Inline SVG icons
 */

export type IconName =
    | 'open'
    | 'close'
    | 'warning'
    | 'error'
    | 'info'
    | 'copy'
    | 'check'
    | 'keyboard'
    | 'play'
    | 'pause'
    | 'zoomIn'
    | 'zoomOut'
    | 'fit'
    | 'download'
    | 'upload'
    | 'save';

interface IconProps {
    name: IconName;
    size?: number;
    className?: string;
}

const STROKE = 'stroke="currentColor" stroke-width="2" fill="none"';
const ROUND = `${STROKE} stroke-linecap="round" stroke-linejoin="round"`;

const icons: Record<IconName, string> = {
    open: `<path d="M4 4h5l2 2h9a1 1 0 0 1 1 1v11a1 1 0 0 1-1 1H4a1 1 0 0 1-1-1V5a1 1 0 0 1 1-1z" ${STROKE}/>`,
    close: `<path d="M6 6l12 12M6 18L18 6" ${ROUND}/>`,
    warning: `<path d="M12 2L2 20h20L12 2z" ${STROKE}/><path d="M12 9v4M12 16v1" ${ROUND}/>`,
    error: `<circle cx="12" cy="12" r="10" ${STROKE}/><path d="M12 7v5M12 15v1" ${ROUND}/>`,
    info: `<circle cx="12" cy="12" r="10" ${STROKE}/><path d="M12 11v5M12 8v1" ${ROUND}/>`,
    copy: `<rect x="8" y="8" width="12" height="12" rx="1" ${STROKE}/><path d="M16 4H6a2 2 0 0 0-2 2v10" ${STROKE}/>`,
    check: `<path d="M5 12l5 5L20 7" ${ROUND}/>`,
    keyboard: `<rect x="2" y="5" width="20" height="14" rx="2" ${STROKE}/><path d="M6 9h.01M10 9h.01M14 9h.01M18 9h.01M8 13h8" ${ROUND}/>`,
    play: '<path d="M7 4l13 8-13 8z" fill="currentColor"/>',
    pause: '<path d="M6 4h4v16H6zM14 4h4v16h-4z" fill="currentColor"/>',
    zoomIn: `<circle cx="10" cy="10" r="7" ${STROKE}/><path d="M21 21l-6-6M7 10h6M10 7v6" ${ROUND}/>`,
    zoomOut: `<circle cx="10" cy="10" r="7" ${STROKE}/><path d="M21 21l-6-6M7 10h6" ${ROUND}/>`,
    fit: `<path d="M4 9V4h5M20 9V4h-5M4 15v5h5M20 15v5h-5" ${ROUND}/>`,
    download: `<path d="M12 4v11M7 10l5 5 5-5M4 20h16" ${ROUND}/>`,
    upload: `<path d="M12 20V9M7 14l5-5 5 5M4 4h16" ${ROUND}/>`,
    save: `<path d="M5 3h11l3 3v15H5z" ${STROKE}/><path d="M8 3v5h7V3M8 21v-7h8v7" ${STROKE}/>`,
};

export function Icon({ name, size = 24, className = '' }: IconProps) {
    return (
        <svg
            width={size}
            height={size}
            viewBox="0 0 24 24"
            className={`icon icon--${name} ${className}`}
            dangerouslySetInnerHTML={{ __html: icons[name] }}
            aria-hidden="true"
        />
    );
}
