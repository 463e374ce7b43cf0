/**
 * Checkbox styled as a switch
 */

import { useId, type InputHTMLAttributes } from 'react';
import './Toggle.css';

export interface ToggleProps extends Omit<InputHTMLAttributes<HTMLInputElement>, 'type'> {
    label?: string;
}

export function Toggle({ label, id, className = '', ...props }: ToggleProps) {
    const generatedId = useId();
    const toggleId = id ?? generatedId;

    return (
        <label htmlFor={toggleId} className={`toggle ${className}`}>
            <input type="checkbox" id={toggleId} className="toggle__input" {...props} />
            <span className="toggle__track">
                <span className="toggle__thumb" />
            </span>
            {label && <span className="toggle__label">{label}</span>}
        </label>
    );
}
