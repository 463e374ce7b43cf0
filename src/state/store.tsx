/**
 * App state store using React Context + Reducer
 */

import { createContext, useContext, useReducer, type ReactNode, type Dispatch } from 'react';
import { DEFAULT_FPS, clampFps } from '../core/animation';
import { getFlag } from '../core/featureFlags';
import { createLogger } from '../core/logger';
import { isIndexed } from '../core/timParser';
import type { AnimationSettings, AppError, Clut, TimImage } from '../core/types';

const log = createLogger('Store');

const PREFS_KEY = 'tim-viewer-prefs';

export interface UserPreferences {
    fps: number;
    loop: boolean;
    showTileOutline: boolean;
}

const DEFAULT_PREFS: UserPreferences = {
    fps: DEFAULT_FPS,
    loop: true,
    showTileOutline: getFlag('tileDebugOverlay'),
};

function readPrefs(value: unknown): Partial<UserPreferences> {
    if (typeof value !== 'object' || value === null) return {};
    const prefs: Partial<UserPreferences> = {};
    if ('fps' in value && typeof value.fps === 'number') prefs.fps = clampFps(value.fps);
    if ('loop' in value && typeof value.loop === 'boolean') prefs.loop = value.loop;
    if ('showTileOutline' in value && typeof value.showTileOutline === 'boolean') {
        prefs.showTileOutline = value.showTileOutline;
    }
    return prefs;
}

function getInitialPrefs(): UserPreferences {
    try {
        const stored = localStorage.getItem(PREFS_KEY);
        if (stored) {
            return { ...DEFAULT_PREFS, ...readPrefs(JSON.parse(stored)) };
        }
    } catch (e) {
        log.warn('Failed to load prefs', e);
    }
    return DEFAULT_PREFS;
}

function savePrefs(prefs: UserPreferences): void {
    try {
        localStorage.setItem(PREFS_KEY, JSON.stringify(prefs));
    } catch (e) {
        log.error('Failed to save prefs', e);
    }
}

// State shape
export interface AppState {
    /** Loaded TIMs in load order */
    tims: TimImage[];
    /** Every CLUT row from every loaded TIM */
    cluts: Clut[];
    selectedTimId: string | null;
    /** Explicit CLUT choice per TIM; absent means the TIM's own first CLUT */
    appliedCluts: Record<string, string | null>;
    animation: AnimationSettings;
    zoom: number;
    errors: AppError[];
    shortcutsHelpVisible: boolean;
    statusMessage: string;
    preferences: UserPreferences;
}

export function createInitialState(prefs: UserPreferences = getInitialPrefs()): AppState {
    return {
        tims: [],
        cluts: [],
        selectedTimId: null,
        appliedCluts: {},
        animation: {
            enabled: false,
            frameWidth: 0,
            frameHeight: 0,
            direction: 'horizontal',
            fps: prefs.fps,
            loop: prefs.loop,
            frameIndex: 0,
            playing: false,
        },
        zoom: 4,
        errors: [],
        shortcutsHelpVisible: false,
        statusMessage: 'Load TIMs to begin.',
        preferences: prefs,
    };
}

type SetPreferenceAction = {
    [K in keyof UserPreferences]: { type: 'SET_PREFERENCE'; key: K; value: UserPreferences[K] };
}[keyof UserPreferences];

// Actions
export type AppAction =
    | { type: 'LOAD_TIMS'; tims: TimImage[]; cluts: Clut[] }
    | { type: 'CLEAR_TIMS' }
    | { type: 'SELECT_TIM'; id: string }
    | { type: 'APPLY_CLUT'; clutId: string | null }
    | { type: 'REPLACE_TIM'; tim: TimImage }
    | { type: 'SET_ANIMATION'; settings: Partial<AnimationSettings> }
    | { type: 'SET_FRAME_INDEX'; index: number }
    | { type: 'SET_ZOOM'; zoom: number }
    | { type: 'ADD_ERROR'; error: AppError }
    | { type: 'DISMISS_ERROR'; id: string }
    | { type: 'CLEAR_ERRORS' }
    | { type: 'SET_SHORTCUTS_VISIBLE'; visible: boolean }
    | { type: 'SET_STATUS'; message: string }
    | SetPreferenceAction;

// Selectors
export function selectSelectedTim(state: AppState): TimImage | null {
    return state.tims.find((t) => t.id === state.selectedTimId) ?? null;
}

export function selectAppliedClut(state: AppState): Clut | null {
    const tim = selectSelectedTim(state);
    if (!tim || !isIndexed(tim)) return null;
    const chosen = state.appliedCluts[tim.id];
    if (chosen === null) return null;
    if (chosen !== undefined) return state.cluts.find((c) => c.id === chosen) ?? null;
    return state.cluts.find((c) => c.sourceId === tim.id) ?? null;
}

const stopPlayback = (animation: AnimationSettings): AnimationSettings =>
    animation.playing ? { ...animation, playing: false } : animation;

// Reducer
export function reducer(state: AppState, action: AppAction): AppState {
    switch (action.type) {
        case 'LOAD_TIMS':
            return {
                ...state,
                tims: action.tims,
                cluts: action.cluts,
                selectedTimId: action.tims[0]?.id ?? null,
                appliedCluts: {},
                animation: { ...stopPlayback(state.animation), frameWidth: 0, frameHeight: 0, frameIndex: 0 },
            };
        case 'CLEAR_TIMS':
            return {
                ...state,
                tims: [],
                cluts: [],
                selectedTimId: null,
                appliedCluts: {},
                animation: stopPlayback(state.animation),
                statusMessage: 'Load TIMs to begin.',
            };
        case 'SELECT_TIM':
            if (!state.tims.some((t) => t.id === action.id)) return state;
            return {
                ...state,
                selectedTimId: action.id,
                animation: stopPlayback(state.animation),
            };
        case 'APPLY_CLUT': {
            const tim = selectSelectedTim(state);
            if (!tim) return state;
            if (!isIndexed(tim)) {
                return { ...state, statusMessage: 'This TIM uses direct colour; CLUTs do not apply.' };
            }
            return {
                ...state,
                appliedCluts: { ...state.appliedCluts, [tim.id]: action.clutId },
                animation: stopPlayback(state.animation),
            };
        }
        case 'REPLACE_TIM':
            return {
                ...state,
                tims: state.tims.map((t) => (t.id === action.tim.id ? action.tim : t)),
                animation: { ...stopPlayback(state.animation), frameWidth: 0, frameHeight: 0, frameIndex: 0 },
            };

        case 'SET_ANIMATION': {
            const settings = { ...action.settings };
            if (settings.fps !== undefined) settings.fps = clampFps(settings.fps);
            const animation = { ...state.animation, ...settings };
            if (!animation.enabled) animation.playing = false;

            const prefsChanged = animation.fps !== state.preferences.fps || animation.loop !== state.preferences.loop;
            const preferences = prefsChanged
                ? { ...state.preferences, fps: animation.fps, loop: animation.loop }
                : state.preferences;
            if (prefsChanged) savePrefs(preferences);
            return { ...state, animation, preferences };
        }
        case 'SET_FRAME_INDEX':
            return { ...state, animation: { ...state.animation, frameIndex: Math.max(0, Math.floor(action.index)) } };
        case 'SET_ZOOM':
            return state.zoom === action.zoom ? state : { ...state, zoom: action.zoom };

        case 'ADD_ERROR':
            return { ...state, errors: [...state.errors, action.error] };
        case 'DISMISS_ERROR':
            return { ...state, errors: state.errors.filter((e) => e.id !== action.id) };
        case 'CLEAR_ERRORS':
            return { ...state, errors: [] };
        case 'SET_SHORTCUTS_VISIBLE':
            return { ...state, shortcutsHelpVisible: action.visible };
        case 'SET_STATUS':
            return { ...state, statusMessage: action.message };

        case 'SET_PREFERENCE': {
            const preferences = { ...state.preferences, [action.key]: action.value };
            savePrefs(preferences);
            return { ...state, preferences };
        }

        default:
            return state;
    }
}

// Context
const StateContext = createContext<AppState | null>(null);
const DispatchContext = createContext<Dispatch<AppAction> | null>(null);

export function StateProvider({ children, initialState }: { children: ReactNode; initialState?: AppState }) {
    const [state, dispatch] = useReducer(reducer, initialState ?? null, (init) => init ?? createInitialState());

    return (
        <StateContext.Provider value={state}>
            <DispatchContext.Provider value={dispatch}>{children}</DispatchContext.Provider>
        </StateContext.Provider>
    );
}

export function useAppState(): AppState {
    const ctx = useContext(StateContext);
    if (!ctx) throw new Error('useAppState must be used within StateProvider');
    return ctx;
}

export function useAppDispatch(): Dispatch<AppAction> {
    const ctx = useContext(DispatchContext);
    if (!ctx) throw new Error('useAppDispatch must be used within StateProvider');
    return ctx;
}
