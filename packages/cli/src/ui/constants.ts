/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export const LRU_BUFFER_PERF_CACHE_LIMIT = 20000;

// Editor gutter layout: "NN │ " with at least two digits for the line number.
export const MIN_LINE_NUMBER_DIGITS = 2;
export const GUTTER_SEPARATOR = ' │ ';
// Columns kept free for the ◀ / ▶ horizontal scroll indicators.
export const SCROLL_INDICATOR_WIDTH = 2;
export const MIN_CONTENT_WIDTH = 10;

export const SCROLL_LEFT_INDICATOR = '◀';
export const SCROLL_RIGHT_INDICATOR = '▶';
export const SEARCH_CURSOR_GLYPH = '█';
