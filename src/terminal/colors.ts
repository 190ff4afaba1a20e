/**
 * ANSI Color Utilities
 *
 * Color parsing and ANSI color escape sequence generation.
 */

import { CSI } from './ansi.ts';

// ============================================
// Types
// ============================================

export interface RGB {
  r: number;
  g: number;
  b: number;
}

// ============================================
// Named Colors
// ============================================

/**
 * Standard terminal color names mapped to their SGR color index (0-7).
 * Bright variants add 60 to the resulting code.
 */
const BASIC_COLORS = new Map<string, number>([
  ['black', 0],
  ['red', 1],
  ['green', 2],
  ['yellow', 3],
  ['blue', 4],
  ['magenta', 5],
  ['cyan', 6],
  ['white', 7],
]);

// ============================================
// Color Parsing
// ============================================

/**
 * Parse a hex color string to RGB.
 * Supports formats: #RGB, #RRGGBB
 */
export function hexToRgb(hex: string): RGB | null {
  const short = /^#([a-f\d])([a-f\d])([a-f\d])$/i.exec(hex);
  if (short) {
    return {
      r: parseInt(short[1]! + short[1]!, 16),
      g: parseInt(short[2]! + short[2]!, 16),
      b: parseInt(short[3]! + short[3]!, 16),
    };
  }

  const long = /^#([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i.exec(hex);
  if (long) {
    return {
      r: parseInt(long[1]!, 16),
      g: parseInt(long[2]!, 16),
      b: parseInt(long[3]!, 16),
    };
  }

  return null;
}

/**
 * Resolve a named color to its 16-color SGR offset, or null.
 * Accepts 'cyan' and 'brightCyan' style names.
 */
function namedColorIndex(color: string): number | null {
  const name = color.toLowerCase();
  const basic = BASIC_COLORS.get(name);
  if (basic !== undefined) {
    return basic;
  }
  if (name.startsWith('bright')) {
    const base = BASIC_COLORS.get(name.slice('bright'.length));
    return base === undefined ? null : base + 60;
  }
  return null;
}

// ============================================
// ANSI Color Sequences
// ============================================

/**
 * Reset all attributes.
 */
export function resetColor(): string {
  return `${CSI}0m`;
}

/**
 * Set foreground color from color string.
 * Named colors use the terminal palette, hex colors use 24-bit.
 * Unknown colors and 'default' select the default foreground.
 */
export function fgColor(color: string): string {
  const index = namedColorIndex(color);
  if (index !== null) {
    return `${CSI}${30 + index}m`;
  }

  const rgb = hexToRgb(color);
  if (rgb) {
    return `${CSI}38;2;${rgb.r};${rgb.g};${rgb.b}m`;
  }

  return `${CSI}39m`;
}

/**
 * Set background color from color string.
 */
export function bgColor(color: string): string {
  const index = namedColorIndex(color);
  if (index !== null) {
    return `${CSI}${40 + index}m`;
  }

  const rgb = hexToRgb(color);
  if (rgb) {
    return `${CSI}48;2;${rgb.r};${rgb.g};${rgb.b}m`;
  }

  return `${CSI}49m`;
}
