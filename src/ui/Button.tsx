/**
 * Tiny Button component
 */

import type { ButtonHTMLAttributes } from 'react';
import './Button.css';

export interface ButtonProps extends ButtonHTMLAttributes<HTMLButtonElement> {
    variant?: 'primary' | 'secondary' | 'ghost';
    size?: 'sm' | 'md';
    /** Pressed state for toggle-style buttons */
    active?: boolean;
}

export function Button({
    variant = 'secondary',
    size = 'md',
    active,
    className = '',
    type = 'button',
    children,
    ...props
}: ButtonProps) {
    const classes = ['btn', `btn--${variant}`, `btn--${size}`, active ? 'btn--active' : '', className]
        .filter(Boolean)
        .join(' ');
    return (
        <button type={type} className={classes} aria-pressed={active} {...props}>
            {children}
        </button>
    );
}
