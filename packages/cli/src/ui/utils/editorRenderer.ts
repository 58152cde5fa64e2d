/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { LineNumberMode } from '../../config/settings.js';
import type { EditorMode } from '../components/shared/editor-buffer.js';
import {
  getMatchCount,
  type SearchState,
} from '../components/shared/editor-search.js';
import type { EditorStyles, Style } from '../themes/theme.js';
import {
  GUTTER_SEPARATOR,
  SCROLL_LEFT_INDICATOR,
  SCROLL_RIGHT_INDICATOR,
} from '../constants.js';
import {
  formatLineNumber,
  getContentWidth,
  getGutterWidth,
  getLineNumberDigits,
} from './editorViewport.js';
import {
  getLineRoles,
  SYNTAX_LABELS,
  type SyntaxType,
  type TokenRole,
} from './syntaxHighlight.js';
import { padToWidth, toCodePoints } from './textUtils.js';

export interface EditorRenderModel {
  lines: readonly string[];
  cursorRow: number;
  cursorCol: number;
  mode: EditorMode;
  scrollRow: number;
  scrollCol: number;
  syntax: SyntaxType;
  lineNumbers: LineNumberMode;
  search: SearchState;
  /** The rendered search prompt, present while a query is being typed. */
  searchBar?: string;
  /** Present while variables are substituted for display. */
  preview?: { unresolved: number };
}

const NORMAL_HINT = ' i:insert  /:search  F:format  u:undo  ^R:redo ';
const SEARCH_HINT = ' n:next  N:prev  esc:clear  /:search ';
const INSERT_HINT = ' Esc:normal  Type to insert ';

/** Whether a row above the text is taken by the search prompt or filter. */
export function hasSearchRow(
  model: Pick<EditorRenderModel, 'search' | 'searchBar'>,
): boolean {
  return model.searchBar !== undefined || model.search.query !== '';
}

/** Rows left for text once the mode bar and any search row are placed. */
export function getTextAreaHeight(height: number, searchRow: boolean): number {
  return Math.max(0, height - 1 - (searchRow ? 1 : 0));
}

type CellStyle = TokenRole | 'match' | 'currentMatch' | 'cursor';

function renderLineContent(
  model: EditorRenderModel,
  row: number,
  contentWidth: number,
  isCursorLine: boolean,
  styles: EditorStyles,
): { content: string; hasMore: boolean } {
  const line = model.lines[row] ?? '';
  const chars = toCodePoints(line);
  const roles = getLineRoles(line, model.syntax);

  const start = Math.min(model.scrollCol, chars.length);
  const end = Math.min(chars.length, model.scrollCol + contentWidth);
  const cursorIndex = isCursorLine
    ? Math.min(model.cursorCol, chars.length)
    : -1;

  // Match offsets refer to the buffer, not to substituted preview text.
  const matches = model.preview
    ? []
    : model.search.matches
        .map((match, index) => ({ match, index }))
        .filter(({ match }) => match.row === row);

  const cellStyleAt = (i: number): CellStyle => {
    if (i === cursorIndex) {
      return 'cursor';
    }
    const hit = matches.filter(
      ({ match }) => i >= match.colStart && i < match.colEnd,
    );
    if (hit.some(({ index }) => index === model.search.currentMatchIndex)) {
      return 'currentMatch';
    }
    if (hit.length > 0) {
      return 'match';
    }
    return roles[i];
  };

  const styleOf = (cell: CellStyle): Style => {
    if (cell === 'cursor') {
      return model.mode === 'INSERT' ? styles.cursorInsert : styles.cursorNormal;
    }
    return styles[cell];
  };

  const runs: Array<{ cell: CellStyle; text: string }> = [];
  for (let i = start; i < end; i++) {
    const cell = cellStyleAt(i);
    const last = runs[runs.length - 1];
    if (last && last.cell === cell) {
      last.text += chars[i];
    } else {
      runs.push({ cell, text: chars[i] });
    }
  }

  let content = runs.map(({ cell, text }) => styleOf(cell)(text)).join('');
  if (isCursorLine && cursorIndex >= end) {
    content += styleOf('cursor')(' ');
  }

  return { content, hasMore: chars.length > model.scrollCol + contentWidth };
}

function renderSearchRow(
  model: EditorRenderModel,
  styles: EditorStyles,
): string | undefined {
  if (model.searchBar !== undefined) {
    return model.searchBar;
  }
  if (model.search.query === '') {
    return undefined;
  }
  const [current, total] = getMatchCount(model.search);
  return (
    styles.filter(`/${model.search.query}`) +
    styles.count(` ${current}/${total}`) +
    styles.escHint(' esc')
  );
}

export function renderModeBar(
  model: EditorRenderModel,
  width: number,
  isFocused: boolean,
  styles: EditorStyles,
): string {
  if (!isFocused) {
    const label = styles.dimLabel(`── ${SYNTAX_LABELS[model.syntax]} Editor ──`);
    return styles.bar(padToWidth(label, width));
  }

  let content =
    model.mode === 'INSERT'
      ? styles.modeInsert(' INSERT ')
      : styles.modeNormal(' NORMAL ');

  if (model.preview) {
    content += styles.modePreview(' PREVIEW ');
    if (model.preview.unresolved > 0) {
      content += styles.hint(` ${model.preview.unresolved} unresolved `);
    }
  }

  if (model.mode === 'INSERT') {
    content += styles.hint(INSERT_HINT);
  } else if (model.searchBar === undefined && model.search.query !== '') {
    content += styles.hint(SEARCH_HINT);
  } else {
    content += styles.hint(NORMAL_HINT);
  }

  return styles.bar(padToWidth(content, width));
}

/**
 * Projects the editor onto `height` rows of `width` columns: an optional
 * search row, the visible text with a line number gutter, and the mode bar.
 */
export function renderEditor(
  model: EditorRenderModel,
  width: number,
  height: number,
  isFocused: boolean,
  styles: EditorStyles,
): string {
  const output: string[] = [];

  const searchRow = renderSearchRow(model, styles);
  if (searchRow !== undefined) {
    output.push(searchRow);
  }

  const textHeight = getTextAreaHeight(height, searchRow !== undefined);
  const digits = getLineNumberDigits(model.lines.length, model.lineNumbers);
  const gutterWidth = getGutterWidth(digits);
  const contentWidth = getContentWidth(width, digits);
  const end = Math.min(model.lines.length, model.scrollRow + textHeight);

  for (let row = model.scrollRow; row < end; row++) {
    const isCursorLine = isFocused && row === model.cursorRow;
    const { content, hasMore } = renderLineContent(
      model,
      row,
      contentWidth,
      isCursorLine,
      styles,
    );
    const lineNumber = styles.lineNumber(
      formatLineNumber(row + 1, digits, model.lineNumbers).padStart(
        gutterWidth,
      ),
    );
    const line =
      (model.scrollCol > 0 ? SCROLL_LEFT_INDICATOR : '') +
      lineNumber +
      GUTTER_SEPARATOR +
      content +
      (hasMore ? SCROLL_RIGHT_INDICATOR : '');

    output.push(
      isCursorLine ? styles.cursorLine(padToWidth(line, width)) : line,
    );
  }

  for (let row = Math.max(0, end - model.scrollRow); row < textHeight; row++) {
    output.push(
      styles.lineNumber(' '.repeat(gutterWidth)) + GUTTER_SEPARATOR,
    );
  }

  output.push(renderModeBar(model, width, isFocused, styles));
  return output.join('\n');
}
