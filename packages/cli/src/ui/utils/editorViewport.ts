/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LineNumberMode } from '../../config/settings.js';
import {
  GUTTER_SEPARATOR,
  MIN_CONTENT_WIDTH,
  MIN_LINE_NUMBER_DIGITS,
  SCROLL_INDICATOR_WIDTH,
} from '../constants.js';

export interface EditorViewport {
  scrollRow: number;
  scrollCol: number;
  /** Total widget width in columns. */
  width: number;
  /** Rows available to text, excluding the mode bar and any search row. */
  height: number;
}

export const INITIAL_VIEWPORT: EditorViewport = {
  scrollRow: 0,
  scrollCol: 0,
  width: 0,
  height: 0,
};

export function getLineNumberDigits(
  lineCount: number,
  mode: LineNumberMode,
): number {
  if (mode === 'wrap') {
    return MIN_LINE_NUMBER_DIGITS;
  }
  return Math.max(MIN_LINE_NUMBER_DIGITS, String(lineCount).length);
}

/**
 * Zero-padded label for a 1-based line number. In 'wrap' mode only the last
 * two digits are shown, so line 100 reads "00".
 */
export function formatLineNumber(
  lineNumber: number,
  digits: number,
  mode: LineNumberMode,
): string {
  if (mode === 'wrap') {
    return String(lineNumber % 100).padStart(MIN_LINE_NUMBER_DIGITS, '0');
  }
  return String(lineNumber).padStart(digits, '0');
}

/** The number column is one wider than the digits, right-aligned. */
export function getGutterWidth(digits: number): number {
  return digits + 1;
}

export function getContentWidth(width: number, digits: number): number {
  return Math.max(
    MIN_CONTENT_WIDTH,
    width -
      getGutterWidth(digits) -
      GUTTER_SEPARATOR.length -
      SCROLL_INDICATOR_WIDTH,
  );
}

export function getScrollMargin(
  contentWidth: number,
  maxMargin: number,
): number {
  return Math.min(maxMargin, Math.floor(contentWidth / 4));
}

/**
 * Returns the viewport scrolled just enough to keep the cursor visible.
 *
 * Vertically the cursor row stays inside [scrollRow, scrollRow + height).
 * Horizontally the view only moves once the cursor enters the margin at
 * either edge. An unsized axis (0) is left alone.
 */
export function scrollIntoView(
  viewport: EditorViewport,
  cursorRow: number,
  cursorCol: number,
  contentWidth: number,
  maxMargin: number,
): EditorViewport {
  let { scrollRow, scrollCol } = viewport;

  if (cursorRow < scrollRow) {
    scrollRow = cursorRow;
  }
  if (viewport.height > 0 && cursorRow >= scrollRow + viewport.height) {
    scrollRow = cursorRow - viewport.height + 1;
  }

  if (viewport.width > 0) {
    const margin = getScrollMargin(contentWidth, maxMargin);
    if (cursorCol < scrollCol) {
      scrollCol = Math.max(0, cursorCol - margin);
    }
    if (cursorCol >= scrollCol + contentWidth - margin) {
      scrollCol = Math.max(0, cursorCol - contentWidth + margin + 1);
    }
  } else {
    scrollCol = 0;
  }

  if (scrollRow === viewport.scrollRow && scrollCol === viewport.scrollCol) {
    return viewport;
  }
  return { ...viewport, scrollRow, scrollCol };
}
