/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Editor
export * from './ui/components/shared/request-editor.js';
export * from './ui/components/shared/search-input.js';
export * from './ui/components/RequestEditorView.js';
export type {
  EditorMode,
  UndoHistoryEntry,
} from './ui/components/shared/editor-buffer.js';
export type {
  SearchMatch,
  SearchState,
} from './ui/components/shared/editor-search.js';

// Configuration
export * from './config/settings.js';
export * from './config/keyBindings.js';
export {
  createKeyMatchers,
  keyMatchers,
  type KeyMatchers,
} from './ui/keyMatchers.js';
export * from './ui/themes/theme.js';

// Input
export * from './ui/hooks/useKeypress.js';

// Content helpers
export * from './ui/utils/syntaxHighlight.js';
export * from './ui/utils/variablePreview.js';
export * from './ui/utils/jsonFormat.js';
