/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Key } from '../../hooks/useKeypress.js';
import { Command, keyMatchers, type KeyMatchers } from '../../keyMatchers.js';
import type { EditorStyles } from '../../themes/theme.js';
import { SEARCH_CURSOR_GLYPH } from '../../constants.js';
import {
  cpLen,
  cpSlice,
  getCachedStringWidth,
  stripUnsafeCharacters,
} from '../../utils/textUtils.js';

export type SearchInputEvent =
  | { type: 'update'; query: string }
  | { type: 'close'; canceled: boolean };

/**
 * Single-line query prompt shown while searching the editor buffer.
 */
export class SearchInput {
  private visible = false;
  private value = '';
  private cursorPos = 0;

  show(): void {
    this.visible = true;
    this.value = '';
    this.cursorPos = 0;
  }

  hide(): void {
    this.visible = false;
  }

  isVisible(): boolean {
    return this.visible;
  }

  getValue(): string {
    return this.value;
  }

  getCursorPos(): number {
    return this.cursorPos;
  }

  handleKey(
    key: Key,
    matchers: KeyMatchers = keyMatchers,
  ): SearchInputEvent | undefined {
    if (!this.visible) {
      return undefined;
    }

    if (matchers[Command.ESCAPE](key)) {
      this.hide();
      this.value = '';
      this.cursorPos = 0;
      return { type: 'close', canceled: true };
    }

    if (matchers[Command.RETURN](key)) {
      this.hide();
      return { type: 'close', canceled: false };
    }

    if (matchers[Command.DELETE_CHAR_LEFT](key)) {
      if (this.value === '' || this.cursorPos === 0) {
        return undefined;
      }
      this.value =
        cpSlice(this.value, 0, this.cursorPos - 1) +
        cpSlice(this.value, this.cursorPos);
      this.cursorPos--;
      return this.update();
    }

    if (matchers[Command.MOVE_LEFT](key)) {
      this.cursorPos = Math.max(0, this.cursorPos - 1);
      return undefined;
    }

    if (matchers[Command.MOVE_RIGHT](key)) {
      this.cursorPos = Math.min(cpLen(this.value), this.cursorPos + 1);
      return undefined;
    }

    if (matchers[Command.HOME](key)) {
      this.cursorPos = 0;
      return undefined;
    }

    if (matchers[Command.END](key)) {
      this.cursorPos = cpLen(this.value);
      return undefined;
    }

    if (matchers[Command.CLEAR_INPUT](key)) {
      this.value = '';
      this.cursorPos = 0;
      return this.update();
    }

    const char = stripUnsafeCharacters(key.sequence);
    if (key.insertable && !key.ctrl && !key.alt && cpLen(char) === 1) {
      this.value =
        cpSlice(this.value, 0, this.cursorPos) +
        char +
        cpSlice(this.value, this.cursorPos);
      this.cursorPos++;
      return this.update();
    }

    return undefined;
  }

  /**
   * One-row rendering: `/` and the query with a block cursor, then
   * ` current/total` pushed to the right edge when there is anything to count.
   * The result is exactly `width` columns wide unless the content is longer.
   */
  renderCompact(
    width: number,
    current: number,
    total: number,
    styles: EditorStyles,
  ): string {
    const before = cpSlice(this.value, 0, this.cursorPos);
    const after = cpSlice(this.value, this.cursorPos);
    const prompt = `/${before}${SEARCH_CURSOR_GLYPH}${after}`;
    const count = total > 0 || current > 0 ? ` ${current}/${total}` : '';

    const padding = Math.max(
      0,
      width - getCachedStringWidth(prompt) - getCachedStringWidth(count),
    );

    return (
      styles.searchPrefix('/') +
      before +
      styles.searchCursor(SEARCH_CURSOR_GLYPH) +
      after +
      ' '.repeat(padding) +
      (count === '' ? '' : styles.count(count))
    );
  }

  private update(): SearchInputEvent {
    return { type: 'update', query: this.value };
  }
}
