/**
 * Color values as they appear in GPML attributes.
 *
 * The model keeps lowercase `rrggbb` (opaque) or `rrggbbaa`. Documents may
 * also use HTML color names, a leading `#`, or the keyword `Transparent`.
 */
import type { ColorHex } from '../types/pathway';

export const TRANSPARENT_KEYWORD = 'Transparent';

const NAMED_COLORS: Record<string, ColorHex> = {
    aqua: '00ffff',
    black: '000000',
    blue: '0000ff',
    fuchsia: 'ff00ff',
    gray: '808080',
    green: '008000',
    lime: '00ff00',
    maroon: '800000',
    navy: '000080',
    olive: '808000',
    purple: '800080',
    red: 'ff0000',
    silver: 'c0c0c0',
    teal: '008080',
    white: 'ffffff',
    yellow: 'ffff00',
    transparent: '00000000',
};

export interface Rgba {
    r: number;
    g: number;
    b: number;
    a: number;
}

/** Normalized hex for a document color, or null when it is not a color. */
export function parseColor(value: string): ColorHex | null {
    const trimmed = value.trim();
    const named = NAMED_COLORS[trimmed.toLowerCase()];
    if (named) return named;

    const hex = (trimmed.startsWith('#') ? trimmed.slice(1) : trimmed).toLowerCase();
    if (!/^[0-9a-f]{6}([0-9a-f]{2})?$/.test(hex)) return null;
    return hex.length === 8 && hex.endsWith('ff') ? hex.slice(0, 6) : hex;
}

export function toRgba(color: ColorHex): Rgba {
    return {
        r: parseInt(color.slice(0, 2), 16),
        g: parseInt(color.slice(2, 4), 16),
        b: parseInt(color.slice(4, 6), 16),
        a: color.length === 8 ? parseInt(color.slice(6, 8), 16) : 255,
    };
}

export function isTransparent(color: ColorHex): boolean {
    return toRgba(color).a === 0;
}

/** Same RGBA, or both fully transparent whatever their RGB. */
export function sameColor(a: ColorHex, b: ColorHex): boolean {
    const left = toRgba(a);
    const right = toRgba(b);
    if (left.a === 0 && right.a === 0) return true;
    return left.r === right.r && left.g === right.g && left.b === right.b && left.a === right.a;
}

/** 2021 form: the normalized hex itself. */
export function formatColor(color: ColorHex): string {
    return color;
}

/**
 * 2013a form: `Transparent` for alpha 0, otherwise opaque `rrggbb`
 * (the older schema has no partial alpha).
 */
export function formatLegacyColor(color: ColorHex): string {
    if (isTransparent(color)) return TRANSPARENT_KEYWORD;
    return color.slice(0, 6);
}
