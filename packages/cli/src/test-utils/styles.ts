/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  createEditorStyles,
  darkTheme,
  type EditorStyles,
} from '../ui/themes/theme.js';

export const plainStyles: EditorStyles = createEditorStyles(darkTheme, 0);

// Overlays wrapped in visible markers so assertions can see where they land.
export const markerStyles: EditorStyles = {
  ...plainStyles,
  cursorNormal: (s) => `[${s}]`,
  cursorInsert: (s) => `<${s}>`,
  match: (s) => `(${s})`,
  currentMatch: (s) => `*${s}*`,
};
