/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ColorSupportLevel } from 'chalk';
import { assumeExhaustive, debugLogger } from '@reqline/core';
import type { Key } from '../../hooks/useKeypress.js';
import {
  Command,
  createKeyMatchers,
  type KeyMatchers,
} from '../../keyMatchers.js';
import { mergeKeyBindings } from '../../../config/keyBindings.js';
import {
  DEFAULT_EDITOR_SETTINGS,
  type EditorSettings,
} from '../../../config/settings.js';
import {
  createEditorStyles,
  darkTheme,
  type ColorsTheme,
  type EditorStyles,
} from '../../themes/theme.js';
import {
  createInitialState,
  editorBufferReducer,
  getText,
  splitLines,
  type EditorBufferAction,
  type EditorBufferOptions,
  type EditorBufferState,
  type EditorMode,
} from './editor-buffer.js';
import {
  createSearchState,
  getCurrentMatch,
  getMatchCount,
  nextMatch,
  prevMatch,
  setSearchQuery,
  type SearchMatch,
  type SearchState,
} from './editor-search.js';
import { SearchInput, type SearchInputEvent } from './search-input.js';
import {
  getTextAreaHeight,
  hasSearchRow,
  renderEditor,
} from '../../utils/editorRenderer.js';
import { formatJson, type FormatResult } from '../../utils/jsonFormat.js';
import type { SyntaxType } from '../../utils/syntaxHighlight.js';
import {
  findUnresolvedVariables,
  substituteVariables,
  type VariableValues,
} from '../../utils/variablePreview.js';

export type EditorEvent =
  | { type: 'content_changed'; content: string }
  | { type: 'format_result'; success: boolean; error?: string }
  | { type: 'quit' };

export interface RequestEditorOptions {
  settings?: EditorSettings;
  /** Defaults to the level chalk detects for the terminal. */
  colorLevel?: ColorSupportLevel;
  theme?: ColorsTheme;
  /** Replaces the theme-derived styles entirely. */
  styles?: EditorStyles;
}

export interface CursorPosition {
  row: number;
  col: number;
}

export interface ScrollOffset {
  scrollRow: number;
  scrollCol: number;
}

/**
 * A modal, line-based body editor.
 *
 * Keys arrive one at a time through `handleKey`; each call updates the buffer,
 * cursor, search and scroll state before it returns and yields at most one
 * event for the host. Rendering is a pure projection of that state onto a
 * `width` x `height` block of terminal rows.
 */
export class RequestEditor {
  private state: EditorBufferState;
  private search: SearchState = createSearchState();
  private readonly searchInput = new SearchInput();
  private readOnly = false;
  private previewMode = false;
  private variables: VariableValues = {};

  private readonly bufferOptions: EditorBufferOptions;
  private readonly matchers: KeyMatchers;
  private readonly styles: EditorStyles;

  constructor(
    content = '',
    private readonly syntax: SyntaxType = 'text',
    options: RequestEditorOptions = {},
  ) {
    const settings = options.settings ?? DEFAULT_EDITOR_SETTINGS;
    this.state = createInitialState(content);
    this.bufferOptions = {
      tabSize: settings.tabSize,
      undoLimit: settings.undoLimit,
      scrollMargin: settings.scrollMargin,
      lineNumbers: settings.lineNumbers,
    };
    this.matchers = createKeyMatchers(mergeKeyBindings(settings.keyBindings));
    this.styles =
      options.styles ??
      createEditorStyles(options.theme ?? darkTheme, options.colorLevel);
  }

  // --- Content -------------------------------------------------------------

  getContent(): string {
    return getText(this.state);
  }

  /** Replaces the buffer and drops cursor, scroll, search and history. */
  setContent(content: string): void {
    this.dispatch({ type: 'set_text', payload: content, resetHistory: true });
    this.search = createSearchState();
    this.searchInput.hide();
  }

  getSyntax(): SyntaxType {
    return this.syntax;
  }

  getMode(): EditorMode {
    return this.state.mode;
  }

  getCursor(): CursorPosition {
    return { row: this.state.cursorRow, col: this.state.cursorCol };
  }

  getScroll(): ScrollOffset {
    const { scrollRow, scrollCol } = this.state.viewport;
    return { scrollRow, scrollCol };
  }

  setReadOnly(readOnly: boolean): void {
    this.readOnly = readOnly;
  }

  isReadOnly(): boolean {
    return this.readOnly;
  }

  canUndo(): boolean {
    return this.state.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.state.redoStack.length > 0;
  }

  // --- Preview -------------------------------------------------------------

  setVariableValues(values: VariableValues): void {
    this.variables = { ...values };
  }

  togglePreviewMode(): void {
    this.previewMode = !this.previewMode;
  }

  isPreviewMode(): boolean {
    return this.previewMode;
  }

  getPreviewContent(): string {
    return substituteVariables(this.getContent(), this.variables);
  }

  getUnresolvedVariables(): string[] {
    return findUnresolvedVariables(this.getContent(), this.variables);
  }

  // --- Search --------------------------------------------------------------

  isSearching(): boolean {
    return this.searchInput.isVisible();
  }

  /** A query is kept for n/N once the prompt has been closed. */
  hasSearchQuery(): boolean {
    return this.search.query !== '' && !this.isSearching();
  }

  getSearchQuery(): string {
    return this.search.query;
  }

  getSearchMatches(): readonly SearchMatch[] {
    return this.search.matches;
  }

  getMatchCount(): [number, number] {
    return getMatchCount(this.search);
  }

  // --- Formatting ----------------------------------------------------------

  /**
   * Re-indents the buffer as JSON. On success the previous text goes on the
   * undo stack and the cursor returns to the origin; on failure nothing
   * changes. Returns null when the buffer is empty.
   */
  formatJson(): FormatResult | null {
    const result = formatJson(this.getContent());
    if (result === null) {
      return null;
    }
    if (result.success) {
      this.dispatch({
        type: 'set_text',
        payload: result.formatted,
        pushToUndo: true,
      });
      this.refreshSearch();
    } else {
      debugLogger.debug(`JSON format failed: ${result.error}`);
    }
    return result;
  }

  // --- Layout --------------------------------------------------------------

  /**
   * Records the size of the whole widget. The text area is what remains after
   * the mode bar and any search row.
   */
  setViewportSize(width: number, height: number): void {
    const searchRow = hasSearchRow({
      search: this.search,
      searchBar: this.isSearching() ? '' : undefined,
    });
    this.dispatch({
      type: 'set_viewport',
      payload: { width, height: getTextAreaHeight(height, searchRow) },
    });
  }

  render(width: number, height: number, isFocused: boolean): string {
    this.setViewportSize(width, height);
    const [current, total] = this.getMatchCount();
    const { scrollRow, scrollCol } = this.state.viewport;

    return renderEditor(
      {
        lines: this.previewMode
          ? splitLines(this.getPreviewContent())
          : this.state.lines,
        cursorRow: this.state.cursorRow,
        cursorCol: this.state.cursorCol,
        mode: this.state.mode,
        scrollRow,
        scrollCol,
        syntax: this.syntax,
        lineNumbers: this.bufferOptions.lineNumbers,
        search: this.search,
        searchBar: this.isSearching()
          ? this.searchInput.renderCompact(width, current, total, this.styles)
          : undefined,
        preview: this.previewMode
          ? { unresolved: this.getUnresolvedVariables().length }
          : undefined,
      },
      width,
      height,
      isFocused,
      this.styles,
    );
  }

  // --- Keys ----------------------------------------------------------------

  /**
   * @param inputAllowed - false while the host wants the editor browsable but
   *   not editable.
   */
  handleKey(key: Key, inputAllowed = true): EditorEvent | undefined {
    if (this.isSearching()) {
      this.applySearchEvent(this.searchInput.handleKey(key, this.matchers));
      return undefined;
    }

    if (this.readOnly || !inputAllowed || this.previewMode) {
      this.handleNavigationKey(key);
      return undefined;
    }

    const linesBefore = this.state.lines;
    const event =
      this.state.mode === 'INSERT'
        ? this.handleInsertKey(key)
        : this.handleNormalKey(key);
    if (this.state.lines !== linesBefore) {
      this.refreshSearch();
    }
    return event;
  }

  private dispatch(action: EditorBufferAction): void {
    this.state = editorBufferReducer(this.state, action, this.bufferOptions);
  }

  private contentChanged(): EditorEvent {
    return { type: 'content_changed', content: this.getContent() };
  }

  /** Printable text of a key without modifiers, or undefined. */
  private static charOf(key: Key): string | undefined {
    return key.insertable && !key.ctrl && !key.alt && !key.cmd
      ? key.sequence
      : undefined;
  }

  private applySearchEvent(event: SearchInputEvent | undefined): void {
    if (!event) {
      return;
    }
    switch (event.type) {
      case 'update':
        this.search = setSearchQuery(
          this.state.lines,
          event.query,
          this.state.cursorRow,
          this.state.cursorCol,
        );
        this.goToCurrentMatch();
        return;
      case 'close':
        if (event.canceled) {
          this.search = createSearchState();
        }
        return;
      default:
        assumeExhaustive(event);
    }
  }

  private goToCurrentMatch(): void {
    const match = getCurrentMatch(this.search);
    if (match) {
      this.dispatch({
        type: 'set_cursor',
        payload: { cursorRow: match.row, cursorCol: match.colStart },
      });
    }
  }

  /** Recomputes matches against the edited buffer, keeping the query. */
  private refreshSearch(): void {
    if (this.search.query === '') {
      return;
    }
    this.search = setSearchQuery(
      this.state.lines,
      this.search.query,
      this.state.cursorRow,
      this.state.cursorCol,
    );
  }

  /**
   * Motions and search keys shared by NORMAL mode and the read-only editor.
   * Returns false when the key is not one of them.
   */
  private handleNavigationKey(key: Key): boolean {
    if (this.matchers[Command.ESCAPE](key)) {
      if (this.search.query !== '') {
        this.search = createSearchState();
      }
      return true;
    }

    const move = this.arrowAction(key);
    if (move) {
      this.dispatch(move);
      return true;
    }

    switch (RequestEditor.charOf(key)) {
      case 'h':
        this.dispatch({ type: 'vim_move_left' });
        return true;
      case 'l':
        this.dispatch({ type: 'vim_move_right' });
        return true;
      case 'j':
        this.dispatch({ type: 'vim_move_down' });
        return true;
      case 'k':
        this.dispatch({ type: 'vim_move_up' });
        return true;
      case '0':
        this.dispatch({ type: 'vim_move_to_line_start' });
        return true;
      case '$':
        this.dispatch({ type: 'vim_move_to_line_end' });
        return true;
      case 'g':
        this.dispatch({ type: 'vim_move_to_first_line' });
        return true;
      case 'G':
        this.dispatch({ type: 'vim_move_to_last_line' });
        return true;
      case 'w':
        this.dispatch({ type: 'vim_move_word_forward' });
        return true;
      case 'b':
        this.dispatch({ type: 'vim_move_word_backward' });
        return true;
      case '/':
        this.searchInput.show();
        return true;
      case 'n':
        if (this.hasSearchQuery()) {
          this.search = nextMatch(this.search);
          this.goToCurrentMatch();
        }
        return true;
      case 'N':
        if (this.hasSearchQuery()) {
          this.search = prevMatch(this.search);
          this.goToCurrentMatch();
        }
        return true;
      default:
        return false;
    }
  }

  private arrowAction(key: Key): EditorBufferAction | undefined {
    if (this.matchers[Command.MOVE_LEFT](key)) {
      return { type: 'vim_move_left' };
    }
    if (this.matchers[Command.MOVE_RIGHT](key)) {
      return { type: 'vim_move_right' };
    }
    if (this.matchers[Command.MOVE_UP](key)) {
      return { type: 'vim_move_up' };
    }
    if (this.matchers[Command.MOVE_DOWN](key)) {
      return { type: 'vim_move_down' };
    }
    return undefined;
  }

  private handleNormalKey(key: Key): EditorEvent | undefined {
    if (this.handleNavigationKey(key)) {
      return undefined;
    }

    if (this.matchers[Command.REDO](key)) {
      if (!this.canRedo()) {
        return undefined;
      }
      this.dispatch({ type: 'redo' });
      return this.contentChanged();
    }

    switch (RequestEditor.charOf(key)) {
      case 'i':
        this.dispatch({ type: 'vim_insert_at_cursor' });
        return undefined;
      case 'I':
        this.dispatch({ type: 'vim_insert_at_line_start' });
        return undefined;
      case 'a':
        this.dispatch({ type: 'vim_append_at_cursor' });
        return undefined;
      case 'A':
        this.dispatch({ type: 'vim_append_at_line_end' });
        return undefined;
      case 'o':
        this.dispatch({ type: 'vim_open_line_below' });
        return this.contentChanged();
      case 'O':
        this.dispatch({ type: 'vim_open_line_above' });
        return this.contentChanged();
      case 'x': {
        const before = this.state.lines;
        this.dispatch({ type: 'vim_delete_char' });
        return this.state.lines === before ? undefined : this.contentChanged();
      }
      case 'd':
        this.dispatch({ type: 'vim_delete_line' });
        return this.contentChanged();
      case 'u':
        if (!this.canUndo()) {
          return undefined;
        }
        this.dispatch({ type: 'undo' });
        return this.contentChanged();
      case 'Q':
        return { type: 'quit' };
      case 'F': {
        if (this.syntax !== 'json') {
          return undefined;
        }
        const result = this.formatJson();
        if (result === null) {
          return undefined;
        }
        return result.success
          ? { type: 'format_result', success: true }
          : { type: 'format_result', success: false, error: result.error };
      }
      default:
        return undefined;
    }
  }

  private handleInsertKey(key: Key): EditorEvent | undefined {
    if (this.matchers[Command.ESCAPE](key)) {
      this.dispatch({ type: 'vim_escape_insert_mode' });
      return this.contentChanged();
    }

    if (this.matchers[Command.MOVE_LEFT](key)) {
      this.dispatch({ type: 'move', payload: { dir: 'left' } });
    } else if (this.matchers[Command.MOVE_RIGHT](key)) {
      this.dispatch({ type: 'move', payload: { dir: 'right' } });
    } else if (this.matchers[Command.MOVE_UP](key)) {
      this.dispatch({ type: 'move', payload: { dir: 'up' } });
    } else if (this.matchers[Command.MOVE_DOWN](key)) {
      this.dispatch({ type: 'move', payload: { dir: 'down' } });
    } else if (this.matchers[Command.HOME](key)) {
      this.dispatch({ type: 'move', payload: { dir: 'home' } });
    } else if (this.matchers[Command.END](key)) {
      this.dispatch({ type: 'move', payload: { dir: 'end' } });
    } else if (this.matchers[Command.RETURN](key)) {
      this.dispatch({ type: 'newline' });
    } else if (this.matchers[Command.DELETE_CHAR_LEFT](key)) {
      this.dispatch({ type: 'backspace' });
    } else if (this.matchers[Command.DELETE_CHAR_RIGHT](key)) {
      this.dispatch({ type: 'delete' });
    } else if (this.matchers[Command.INSERT_TAB](key)) {
      this.dispatch({ type: 'tab' });
    } else {
      const text = RequestEditor.charOf(key);
      if (text) {
        this.dispatch({ type: 'insert', payload: text });
      }
    }
    return undefined;
  }
}
