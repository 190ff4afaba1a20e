/**
 * ANSI Text Styles
 *
 * Text styling escape sequences and utilities for combining styles.
 */

import { CSI } from './ansi.ts';
import { fgColor, bgColor, resetColor } from './colors.ts';

// ============================================
// Individual Style Codes
// ============================================

/** Enable bold (increased intensity) */
export function bold(): string {
  return `${CSI}1m`;
}

// ============================================
// Style Options Interface
// ============================================

export interface StyleOptions {
  fg?: string;
  bg?: string;
  bold?: boolean;
}

/**
 * Build a style sequence from options.
 */
export function buildStyle(options: StyleOptions): string {
  const parts: string[] = [];

  if (options.fg) {
    parts.push(fgColor(options.fg));
  }

  if (options.bg) {
    parts.push(bgColor(options.bg));
  }

  if (options.bold) {
    parts.push(bold());
  }

  return parts.join('');
}

/**
 * Wrap text with style and reset.
 * Unstyled text is returned unchanged.
 */
export function styled(text: string, options: StyleOptions): string {
  const style = buildStyle(options);
  if (!style) return text;
  return style + text + resetColor();
}
