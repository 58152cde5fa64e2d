/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  Direction,
  EditorBufferAction,
  EditorBufferOptions,
  EditorBufferState,
} from './editor-buffer.js';
import {
  DEFAULT_BUFFER_OPTIONS,
  findNextWordStart,
  findPrevWordStart,
  moveCursor,
  pushUndo,
} from './editor-buffer.js';
import { cpLen, cpSlice } from '../../utils/textUtils.js';
import { assumeExhaustive } from '@reqline/core';

export type VimAction = Extract<EditorBufferAction, { type: `vim_${string}` }>;

const VIM_MOVE_DIRECTIONS = {
  vim_move_left: 'left',
  vim_move_right: 'right',
  vim_move_up: 'up',
  vim_move_down: 'down',
} as const satisfies Record<string, Direction>;

export function handleVimAction(
  state: EditorBufferState,
  action: VimAction,
  options: EditorBufferOptions = DEFAULT_BUFFER_OPTIONS,
): EditorBufferState {
  const { lines, cursorRow, cursorCol } = state;
  const lineLen = cpLen(lines[cursorRow] ?? '');

  switch (action.type) {
    case 'vim_move_left':
    case 'vim_move_right':
    case 'vim_move_up':
    case 'vim_move_down': {
      const [newRow, newCol] = moveCursor(
        lines,
        cursorRow,
        cursorCol,
        VIM_MOVE_DIRECTIONS[action.type],
      );
      return { ...state, cursorRow: newRow, cursorCol: newCol };
    }

    case 'vim_move_to_line_start':
      return { ...state, cursorCol: 0 };

    case 'vim_move_to_line_end':
      return { ...state, cursorCol: lineLen };

    case 'vim_move_to_first_line':
      return { ...state, cursorRow: 0, cursorCol: 0 };

    case 'vim_move_to_last_line':
      return { ...state, cursorRow: lines.length - 1, cursorCol: 0 };

    case 'vim_move_word_forward': {
      const next = findNextWordStart(lines, cursorRow, cursorCol);
      return { ...state, cursorRow: next.row, cursorCol: next.col };
    }

    case 'vim_move_word_backward': {
      const prev = findPrevWordStart(lines, cursorRow, cursorCol);
      return { ...state, cursorRow: prev.row, cursorCol: prev.col };
    }

    // Every way into INSERT mode records the state it started from.
    case 'vim_insert_at_cursor':
      return { ...pushUndo(state, options.undoLimit), mode: 'INSERT' };

    case 'vim_insert_at_line_start':
      return {
        ...pushUndo(state, options.undoLimit),
        cursorCol: 0,
        mode: 'INSERT',
      };

    case 'vim_append_at_cursor':
      return {
        ...pushUndo(state, options.undoLimit),
        cursorCol: Math.min(cursorCol + 1, lineLen),
        mode: 'INSERT',
      };

    case 'vim_append_at_line_end':
      return {
        ...pushUndo(state, options.undoLimit),
        cursorCol: lineLen,
        mode: 'INSERT',
      };

    case 'vim_open_line_below': {
      const nextState = pushUndo(state, options.undoLimit);
      const newLines = [...lines];
      newLines.splice(cursorRow + 1, 0, '');
      return {
        ...nextState,
        lines: newLines,
        cursorRow: cursorRow + 1,
        cursorCol: 0,
        mode: 'INSERT',
      };
    }

    case 'vim_open_line_above': {
      const nextState = pushUndo(state, options.undoLimit);
      const newLines = [...lines];
      newLines.splice(cursorRow, 0, '');
      return {
        ...nextState,
        lines: newLines,
        cursorCol: 0,
        mode: 'INSERT',
      };
    }

    case 'vim_delete_char': {
      if (cursorCol >= lineLen) {
        return state;
      }
      const nextState = pushUndo(state, options.undoLimit);
      const line = lines[cursorRow] ?? '';
      const newLines = [...lines];
      newLines[cursorRow] =
        cpSlice(line, 0, cursorCol) + cpSlice(line, cursorCol + 1);
      return { ...nextState, lines: newLines };
    }

    case 'vim_delete_line': {
      const nextState = pushUndo(state, options.undoLimit);
      if (lines.length === 1) {
        return { ...nextState, lines: [''], cursorCol: 0 };
      }
      const newLines = [...lines];
      newLines.splice(cursorRow, 1);
      return {
        ...nextState,
        lines: newLines,
        cursorRow: Math.min(cursorRow, newLines.length - 1),
      };
    }

    case 'vim_escape_insert_mode': {
      if (state.mode !== 'INSERT') {
        return state;
      }
      return {
        ...state,
        mode: 'NORMAL',
        cursorCol: cursorCol > 0 ? cursorCol - 1 : 0,
      };
    }

    default:
      // This should never happen if TypeScript is working correctly
      assumeExhaustive(action);
      return state;
  }
}
