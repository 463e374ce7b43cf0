/**
 * Keyboard Shortcuts
 * Single source of truth for shortcut mapping and help display
 */

export type ShortcutAction =
    | 'PREV_FRAME'
    | 'NEXT_FRAME'
    | 'FIRST_FRAME'
    | 'LAST_FRAME'
    | 'TOGGLE_PLAY'
    | 'TOGGLE_ANIMATION'
    | 'PREV_FILE'
    | 'NEXT_FILE'
    | 'ZOOM_IN'
    | 'ZOOM_OUT'
    | 'ZOOM_FIT'
    | 'ZOOM_ACTUAL'
    | 'TOGGLE_TILE_OUTLINE'
    | 'TOGGLE_HELP'
    | 'CLOSE_DIALOG'
    | null;

/** Shortcut definition for help display */
export interface ShortcutDefinition {
    /** Display key (e.g., "Space", "←/→") */
    key: string;
    modifier?: string;
    description: string;
    category: 'navigation' | 'animation' | 'view' | 'general';
}

/** All implemented shortcuts */
export const SHORTCUT_DEFINITIONS: ShortcutDefinition[] = [
    // Navigation
    { key: 'Space + drag', description: 'Pan the image', category: 'navigation' },
    { key: 'Middle-drag', description: 'Pan the image', category: 'navigation' },
    { key: 'Wheel', description: 'Zoom about the cursor', category: 'navigation' },
    { key: '↑ / ↓', description: 'Previous / Next file', category: 'navigation' },

    // Animation
    { key: '← / →', description: 'Previous / Next frame', category: 'animation' },
    { key: 'Home / End', description: 'First / Last frame', category: 'animation' },
    { key: 'P', description: 'Play / Pause', category: 'animation' },
    { key: 'A', description: 'Toggle animation mode', category: 'animation' },

    // View
    { key: 'F', description: 'Zoom to fit', category: 'view' },
    { key: '+ / -', description: 'Zoom in / out', category: 'view' },
    { key: '0', description: 'Actual size (100%)', category: 'view' },
    { key: 'T', description: 'Toggle tile outline', category: 'view' },

    // General
    { key: '?', description: 'Show controls', category: 'general' },
    { key: 'Escape', description: 'Close dialogs', category: 'general' },
];

/** The parts of a keyboard event the mapping looks at */
export interface KeyInput {
    key: string;
    shiftKey: boolean;
    ctrlKey: boolean;
    altKey: boolean;
    metaKey: boolean;
    target: EventTarget | null;
}

function isTextEntry(target: EventTarget | null): boolean {
    if (typeof HTMLElement === 'undefined' || !(target instanceof HTMLElement)) return false;
    return target.tagName === 'INPUT'
        || target.tagName === 'TEXTAREA'
        || target.tagName === 'SELECT'
        || target.isContentEditable;
}

/**
 * Map keyboard event to action
 */
export function mapKeyToAction(e: KeyInput): ShortcutAction {
    if (isTextEntry(e.target)) return null;

    // Ignore Ctrl/Alt/Meta to avoid browser conflicts
    if (e.ctrlKey || e.altKey || e.metaKey) return null;

    switch (e.key) {
        case 'ArrowLeft': return 'PREV_FRAME';
        case 'ArrowRight': return 'NEXT_FRAME';
        case 'ArrowUp': return 'PREV_FILE';
        case 'ArrowDown': return 'NEXT_FILE';
        case 'Home': return 'FIRST_FRAME';
        case 'End': return 'LAST_FRAME';

        case 'p':
        case 'P': return 'TOGGLE_PLAY';

        case 'a':
        case 'A': return 'TOGGLE_ANIMATION';

        case 'f':
        case 'F': return 'ZOOM_FIT';

        case '+':
        case '=': return 'ZOOM_IN';
        case '-':
        case '_': return 'ZOOM_OUT';
        case '0': return 'ZOOM_ACTUAL';

        case 't':
        case 'T': return 'TOGGLE_TILE_OUTLINE';

        case '?': return 'TOGGLE_HELP';
        case 'Escape': return 'CLOSE_DIALOG';
    }

    return null;
}

const CATEGORY_ORDER: ShortcutDefinition['category'][] = ['navigation', 'animation', 'view', 'general'];

/**
 * Get shortcuts grouped by category for help display
 */
export function getShortcutsByCategory(): Map<string, ShortcutDefinition[]> {
    const groups = new Map<string, ShortcutDefinition[]>();
    for (const cat of CATEGORY_ORDER) {
        groups.set(cat, SHORTCUT_DEFINITIONS.filter((s) => s.category === cat));
    }
    return groups;
}

export function getCategoryDisplayName(category: string): string {
    const names: Record<string, string> = {
        navigation: 'Navigation',
        animation: 'Animation',
        view: 'View',
        general: 'General',
    };
    return names[category] || category;
}
