/**
 * Color space conversion utilities
 * HSL <-> RGB <-> 8-bit hex, plus Euclidean distance in the unit RGB cube
 */

import { SequenceError } from "../errors.js";

/**
 * RGB color, each channel in [0, 1]
 */
export interface RGB {
    r: number;
    g: number;
    b: number;
}

/**
 * HSL color: hue in degrees [0, 360), saturation and lightness in [0, 1]
 */
export interface HSL {
    h: number;
    s: number;
    l: number;
}

const HEX_PATTERN = /^#?[0-9a-fA-F]{6}$/;

/**
 * Converts HSL to RGB using the six 60° hue sectors.
 * Hues outside [0, 360) wrap around the circle.
 */
export function hslToRgb(h: number, s: number, l: number): RGB {
    const hue = h >= 0 && h < 360 ? h : ((h % 360) + 360) % 360;
    const c = (1 - Math.abs(2 * l - 1)) * s;
    const hp = hue / 60;
    const x = c * (1 - Math.abs((hp % 2) - 1));

    let r1: number;
    let g1: number;
    let b1: number;
    if (hp < 1) {
        [r1, g1, b1] = [c, x, 0];
    } else if (hp < 2) {
        [r1, g1, b1] = [x, c, 0];
    } else if (hp < 3) {
        [r1, g1, b1] = [0, c, x];
    } else if (hp < 4) {
        [r1, g1, b1] = [0, x, c];
    } else if (hp < 5) {
        [r1, g1, b1] = [x, 0, c];
    } else {
        [r1, g1, b1] = [c, 0, x];
    }

    const m = l - c / 2;
    return {
        r: r1 + m,
        g: g1 + m,
        b: b1 + m,
    };
}

/**
 * Converts RGB to HSL
 * @param rgb - RGB color (0-1 range)
 * @returns HSL color with hue in [0, 360)
 */
export function rgbToHsl(rgb: RGB): HSL {
    const max = Math.max(rgb.r, rgb.g, rgb.b);
    const min = Math.min(rgb.r, rgb.g, rgb.b);
    const delta = max - min;

    let h = 0;
    if (delta !== 0) {
        if (max === rgb.r) {
            h = 60 * (((rgb.g - rgb.b) / delta) % 6);
        } else if (max === rgb.g) {
            h = 60 * ((rgb.b - rgb.r) / delta + 2);
        } else {
            h = 60 * ((rgb.r - rgb.g) / delta + 4);
        }
    }
    if (h < 0) {
        h += 360;
    }

    const l = (max + min) / 2;
    const s = delta === 0 ? 0 : delta / (1 - Math.abs(2 * l - 1));

    return { h, s, l };
}

function channelToHex(value: number): string {
    const clamped = Math.max(0, Math.min(1, value));
    return Math.round(clamped * 255).toString(16).padStart(2, "0");
}

/**
 * Quantizes an RGB color to `#RRGGBB` (uppercase, channels rounded to the
 * nearest of 256 levels)
 */
export function rgbToHex(rgb: RGB): string {
    return `#${channelToHex(rgb.r)}${channelToHex(rgb.g)}${channelToHex(rgb.b)}`.toUpperCase();
}

/**
 * Checks whether a string is a 6-digit hex color, with or without `#`
 */
export function isHexColor(hex: string): boolean {
    return HEX_PATTERN.test(hex);
}

/**
 * Parses a hex color into RGB (0-1 range)
 * @param hex - Hex color string (e.g., #851BE4 or 851be4)
 * @throws SequenceError(MalformedColor) on wrong length or non-hex characters
 */
export function hexToRgb(hex: string): RGB {
    if (!isHexColor(hex)) {
        throw new SequenceError(
            "MalformedColor",
            `Expected 6-digit hex color (e.g. #851BE4), got "${hex}"`
        );
    }
    const cleaned = hex.replace(/^#/, "");
    return {
        r: parseInt(cleaned.substring(0, 2), 16) / 255,
        g: parseInt(cleaned.substring(2, 4), 16) / 255,
        b: parseInt(cleaned.substring(4, 6), 16) / 255,
    };
}

/**
 * Normalizes a hex color to the `#RRGGBB` wire format
 */
export function normalizeHex(hex: string): string {
    return rgbToHex(hexToRgb(hex));
}

/**
 * Euclidean distance between two colors in the unit RGB cube, range [0, √3]
 */
export function colorDistance(a: RGB, b: RGB): number {
    const dr = a.r - b.r;
    const dg = a.g - b.g;
    const db = a.b - b.b;
    return Math.sqrt(dr * dr + dg * dg + db * db);
}
