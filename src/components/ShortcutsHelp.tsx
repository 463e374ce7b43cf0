/**
 * Controls dialog listing every shortcut from SHORTCUT_DEFINITIONS
 */

import { useCallback } from 'react';
import { Modal } from '../ui/Modal';
import { useAppState, useAppDispatch } from '../state/store';
import { getShortcutsByCategory, getCategoryDisplayName } from '../core/shortcuts';
import './ShortcutsHelp.css';

export function ShortcutsHelp() {
    const { shortcutsHelpVisible } = useAppState();
    const dispatch = useAppDispatch();

    const close = useCallback(() => {
        dispatch({ type: 'SET_SHORTCUTS_VISIBLE', visible: false });
    }, [dispatch]);

    const shortcutsByCategory = getShortcutsByCategory();

    return (
        <Modal isOpen={shortcutsHelpVisible} onClose={close} title="Controls">
            <div className="shortcuts-help">
                {Array.from(shortcutsByCategory.entries()).map(([category, shortcuts]) => (
                    shortcuts.length > 0 && (
                        <div key={category} className="shortcuts-help__category">
                            <h3 className="shortcuts-help__category-title">
                                {getCategoryDisplayName(category)}
                            </h3>
                            <table className="shortcuts-table">
                                <tbody>
                                    {shortcuts.map((s) => (
                                        <tr key={`${s.key}-${s.description}`}>
                                            <td className="shortcuts-table__key">
                                                {s.modifier && <><kbd>{s.modifier}</kbd> + </>}
                                                <kbd>{s.key}</kbd>
                                            </td>
                                            <td className="shortcuts-table__desc">{s.description}</td>
                                        </tr>
                                    ))}
                                </tbody>
                            </table>
                        </div>
                    )
                ))}
            </div>
        </Modal>
    );
}
