/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { assumeExhaustive, debugLogger } from '@reqline/core';
import {
  cpLen,
  cpSlice,
  stripUnsafeCharacters,
  toCodePoints,
} from '../../utils/textUtils.js';
import {
  getContentWidth,
  getLineNumberDigits,
  INITIAL_VIEWPORT,
  scrollIntoView,
  type EditorViewport,
} from '../../utils/editorViewport.js';
import type { EditorSettings } from '../../../config/settings.js';
import { handleVimAction } from './vim-buffer-actions.js';

export type EditorMode = 'NORMAL' | 'INSERT';

export type Direction = 'left' | 'right' | 'up' | 'down' | 'home' | 'end';

// Word motions stop at these as well as at whitespace.
const WORD_SEPARATORS = new Set([
  ' ',
  '\t',
  '{',
  '}',
  '[',
  ']',
  '(',
  ')',
  ':',
  ',',
  '"',
  "'",
]);

export const isWordSeparator = (char: string): boolean =>
  WORD_SEPARATORS.has(char);

/**
 * Start of the next word: skip the rest of the current word, then any
 * separators. Reaching the end of a line that has a successor moves to the
 * start of that line.
 */
export function findNextWordStart(
  lines: string[],
  row: number,
  col: number,
): { row: number; col: number } {
  const chars = toCodePoints(lines[row] ?? '');
  let c = col;
  while (c < chars.length && !isWordSeparator(chars[c])) c++;
  while (c < chars.length && isWordSeparator(chars[c])) c++;

  if (c >= chars.length && row < lines.length - 1) {
    return { row: row + 1, col: 0 };
  }
  return { row, col: c };
}

/**
 * Start of the previous word. At column 0 the search continues from the end
 * of the previous line.
 */
export function findPrevWordStart(
  lines: string[],
  row: number,
  col: number,
): { row: number; col: number } {
  let r = row;
  let c = col;
  if (c === 0 && r > 0) {
    r--;
    c = cpLen(lines[r] ?? '');
  }

  const chars = toCodePoints(lines[r] ?? '');
  while (c > 0 && isWordSeparator(chars[c - 1])) c--;
  while (c > 0 && !isWordSeparator(chars[c - 1])) c--;
  return { row: r, col: c };
}

export function splitLines(text: string): string[] {
  return text.replace(/\r\n?/g, '\n').split('\n');
}

export function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/** Keeps the cursor on an existing line and at most one past its end. */
export function clampCursor(
  lines: string[],
  cursorRow: number,
  cursorCol: number,
): [number, number] {
  const row = clamp(cursorRow, 0, Math.max(0, lines.length - 1));
  const col = clamp(cursorCol, 0, cpLen(lines[row] ?? ''));
  return [row, col];
}

export interface UndoHistoryEntry {
  lines: string[];
  cursorRow: number;
  cursorCol: number;
}

// --- Start of reducer logic ---

export interface EditorBufferState {
  lines: string[];
  cursorRow: number;
  cursorCol: number;
  mode: EditorMode;
  undoStack: UndoHistoryEntry[];
  redoStack: UndoHistoryEntry[];
  viewport: EditorViewport;
}

export type EditorBufferOptions = Pick<
  EditorSettings,
  'tabSize' | 'undoLimit' | 'scrollMargin' | 'lineNumbers'
>;

export const DEFAULT_BUFFER_OPTIONS: EditorBufferOptions = {
  tabSize: 2,
  undoLimit: 100,
  scrollMargin: 5,
  lineNumbers: 'wide',
};

export function createInitialState(text = ''): EditorBufferState {
  return {
    lines: splitLines(text),
    cursorRow: 0,
    cursorCol: 0,
    mode: 'NORMAL',
    undoStack: [],
    redoStack: [],
    viewport: INITIAL_VIEWPORT,
  };
}

const snapshotOf = (state: EditorBufferState): UndoHistoryEntry => ({
  lines: [...state.lines],
  cursorRow: state.cursorRow,
  cursorCol: state.cursorCol,
});

export const pushUndo = (
  currentState: EditorBufferState,
  limit: number = DEFAULT_BUFFER_OPTIONS.undoLimit,
): EditorBufferState => {
  const newStack = [...currentState.undoStack, snapshotOf(currentState)];
  while (newStack.length > limit) {
    newStack.shift();
  }
  return { ...currentState, undoStack: newStack, redoStack: [] };
};

export type EditorBufferAction =
  | { type: 'insert'; payload: string }
  | { type: 'newline' }
  | { type: 'backspace' }
  | { type: 'delete' }
  | { type: 'tab' }
  | { type: 'move'; payload: { dir: Direction } }
  | { type: 'set_cursor'; payload: { cursorRow: number; cursorCol: number } }
  | { type: 'undo' }
  | { type: 'redo' }
  | { type: 'create_undo_snapshot' }
  | {
      type: 'set_text';
      payload: string;
      pushToUndo?: boolean;
      resetHistory?: boolean;
    }
  | { type: 'set_viewport'; payload: { width: number; height: number } }
  | { type: 'vim_move_left' }
  | { type: 'vim_move_right' }
  | { type: 'vim_move_up' }
  | { type: 'vim_move_down' }
  | { type: 'vim_move_to_line_start' }
  | { type: 'vim_move_to_line_end' }
  | { type: 'vim_move_to_first_line' }
  | { type: 'vim_move_to_last_line' }
  | { type: 'vim_move_word_forward' }
  | { type: 'vim_move_word_backward' }
  | { type: 'vim_insert_at_cursor' }
  | { type: 'vim_insert_at_line_start' }
  | { type: 'vim_append_at_cursor' }
  | { type: 'vim_append_at_line_end' }
  | { type: 'vim_open_line_below' }
  | { type: 'vim_open_line_above' }
  | { type: 'vim_delete_char' }
  | { type: 'vim_delete_line' }
  | { type: 'vim_escape_insert_mode' };

/**
 * Cursor position after a single-step movement. Shared by insert-mode arrows
 * and the command-mode h/j/k/l motions.
 */
export function moveCursor(
  lines: string[],
  cursorRow: number,
  cursorCol: number,
  dir: Direction,
): [number, number] {
  const lineLen = cpLen(lines[cursorRow] ?? '');
  switch (dir) {
    case 'left':
      return [cursorRow, Math.max(0, cursorCol - 1)];
    case 'right':
      return [cursorRow, Math.min(lineLen, cursorCol + 1)];
    case 'up':
      return clampCursor(lines, cursorRow - 1, cursorCol);
    case 'down':
      return clampCursor(lines, cursorRow + 1, cursorCol);
    case 'home':
      return [cursorRow, 0];
    case 'end':
      return [cursorRow, lineLen];
    default:
      assumeExhaustive(dir);
      return [cursorRow, cursorCol];
  }
}

function insertText(
  state: EditorBufferState,
  text: string,
): EditorBufferState {
  const str = stripUnsafeCharacters(text.replace(/\r\n?/g, '\n'));
  if (str.length === 0) {
    return state;
  }

  const { lines, cursorRow, cursorCol } = state;
  const line = lines[cursorRow] ?? '';
  const before = cpSlice(line, 0, cursorCol);
  const after = cpSlice(line, cursorCol);
  const parts = str.split('\n');

  const newLines = [...lines];
  if (parts.length === 1) {
    newLines[cursorRow] = before + str + after;
    return {
      ...state,
      lines: newLines,
      cursorCol: cursorCol + cpLen(str),
    };
  }

  const last = parts[parts.length - 1];
  const inserted = [
    before + parts[0],
    ...parts.slice(1, -1),
    last + after,
  ];
  newLines.splice(cursorRow, 1, ...inserted);
  return {
    ...state,
    lines: newLines,
    cursorRow: cursorRow + parts.length - 1,
    cursorCol: cpLen(last),
  };
}

function editorBufferReducerLogic(
  state: EditorBufferState,
  action: EditorBufferAction,
  options: EditorBufferOptions,
): EditorBufferState {
  const currentLine = (r: number): string => state.lines[r] ?? '';
  const currentLineLen = (r: number): number => cpLen(currentLine(r));

  switch (action.type) {
    case 'insert':
      return insertText(state, action.payload);

    case 'tab':
      return insertText(state, ' '.repeat(options.tabSize));

    case 'newline': {
      const { cursorRow, cursorCol } = state;
      const line = currentLine(cursorRow);
      const newLines = [...state.lines];
      newLines.splice(
        cursorRow,
        1,
        cpSlice(line, 0, cursorCol),
        cpSlice(line, cursorCol),
      );
      return {
        ...state,
        lines: newLines,
        cursorRow: cursorRow + 1,
        cursorCol: 0,
      };
    }

    case 'backspace': {
      const { cursorRow, cursorCol } = state;
      const newLines = [...state.lines];
      if (cursorCol > 0) {
        const line = currentLine(cursorRow);
        newLines[cursorRow] =
          cpSlice(line, 0, cursorCol - 1) + cpSlice(line, cursorCol);
        return { ...state, lines: newLines, cursorCol: cursorCol - 1 };
      }
      if (cursorRow > 0) {
        const prevLine = currentLine(cursorRow - 1);
        newLines.splice(cursorRow - 1, 2, prevLine + currentLine(cursorRow));
        return {
          ...state,
          lines: newLines,
          cursorRow: cursorRow - 1,
          cursorCol: cpLen(prevLine),
        };
      }
      return state;
    }

    case 'delete': {
      const { cursorRow, cursorCol } = state;
      const line = currentLine(cursorRow);
      const newLines = [...state.lines];
      if (cursorCol < currentLineLen(cursorRow)) {
        newLines[cursorRow] =
          cpSlice(line, 0, cursorCol) + cpSlice(line, cursorCol + 1);
        return { ...state, lines: newLines };
      }
      if (cursorRow < state.lines.length - 1) {
        newLines.splice(cursorRow, 2, line + currentLine(cursorRow + 1));
        return { ...state, lines: newLines };
      }
      return state;
    }

    case 'move': {
      const [cursorRow, cursorCol] = moveCursor(
        state.lines,
        state.cursorRow,
        state.cursorCol,
        action.payload.dir,
      );
      return { ...state, cursorRow, cursorCol };
    }

    case 'set_cursor': {
      const [cursorRow, cursorCol] = clampCursor(
        state.lines,
        action.payload.cursorRow,
        action.payload.cursorCol,
      );
      return { ...state, cursorRow, cursorCol };
    }

    case 'undo': {
      const stateToRestore = state.undoStack[state.undoStack.length - 1];
      if (!stateToRestore) return state;

      return {
        ...state,
        ...stateToRestore,
        undoStack: state.undoStack.slice(0, -1),
        redoStack: [...state.redoStack, snapshotOf(state)],
      };
    }

    case 'redo': {
      const stateToRestore = state.redoStack[state.redoStack.length - 1];
      if (!stateToRestore) return state;

      return {
        ...state,
        ...stateToRestore,
        redoStack: state.redoStack.slice(0, -1),
        undoStack: [...state.undoStack, snapshotOf(state)],
      };
    }

    case 'create_undo_snapshot':
      return pushUndo(state, options.undoLimit);

    case 'set_text': {
      let nextState = state;
      if (action.resetHistory) {
        nextState = { ...nextState, undoStack: [], redoStack: [] };
      } else if (action.pushToUndo) {
        nextState = pushUndo(nextState, options.undoLimit);
      }
      return {
        ...nextState,
        lines: splitLines(action.payload),
        cursorRow: 0,
        cursorCol: 0,
        viewport: { ...nextState.viewport, scrollRow: 0, scrollCol: 0 },
      };
    }

    case 'set_viewport': {
      const { width, height } = action.payload;
      if (width === state.viewport.width && height === state.viewport.height) {
        return state;
      }
      return { ...state, viewport: { ...state.viewport, width, height } };
    }

    // Command-mode operations
    case 'vim_move_left':
    case 'vim_move_right':
    case 'vim_move_up':
    case 'vim_move_down':
    case 'vim_move_to_line_start':
    case 'vim_move_to_line_end':
    case 'vim_move_to_first_line':
    case 'vim_move_to_last_line':
    case 'vim_move_word_forward':
    case 'vim_move_word_backward':
    case 'vim_insert_at_cursor':
    case 'vim_insert_at_line_start':
    case 'vim_append_at_cursor':
    case 'vim_append_at_line_end':
    case 'vim_open_line_below':
    case 'vim_open_line_above':
    case 'vim_delete_char':
    case 'vim_delete_line':
    case 'vim_escape_insert_mode':
      return handleVimAction(state, action, options);

    default: {
      const unknownAction: never = action;
      debugLogger.debug(
        `Unknown editor buffer action: ${JSON.stringify(unknownAction)}`,
      );
      return state;
    }
  }
}

/**
 * Applies an action and then re-clamps the cursor and scrolls the viewport so
 * the cursor stays visible.
 */
export function editorBufferReducer(
  state: EditorBufferState,
  action: EditorBufferAction,
  options: EditorBufferOptions = DEFAULT_BUFFER_OPTIONS,
): EditorBufferState {
  const newState = editorBufferReducerLogic(state, action, options);
  if (newState === state) {
    return state;
  }

  const [cursorRow, cursorCol] = clampCursor(
    newState.lines,
    newState.cursorRow,
    newState.cursorCol,
  );
  const digits = getLineNumberDigits(
    newState.lines.length,
    options.lineNumbers,
  );
  const viewport = scrollIntoView(
    newState.viewport,
    cursorRow,
    cursorCol,
    getContentWidth(newState.viewport.width, digits),
    options.scrollMargin,
  );

  return { ...newState, cursorRow, cursorCol, viewport };
}

// --- End of reducer logic ---

export function getText(state: EditorBufferState): string {
  return state.lines.join('\n');
}
