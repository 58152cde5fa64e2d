/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  RequestEditor,
  type EditorEvent,
  type RequestEditorOptions,
} from './request-editor.js';
import type { SyntaxType } from '../../utils/syntaxHighlight.js';
import type { Key } from '../../hooks/useKeypress.js';
import {
  DEFAULT_EDITOR_SETTINGS,
  parseEditorSettings,
} from '../../../config/settings.js';
import {
  charKey,
  ctrlKey,
  namedKey,
  typeKeys,
} from '../../../test-utils/keys.js';
import { plainStyles } from '../../../test-utils/styles.js';
import { cpLen } from '../../utils/textUtils.js';

const createEditor = (
  content = '',
  syntax: SyntaxType = 'text',
  options: RequestEditorOptions = {},
) => new RequestEditor(content, syntax, { styles: plainStyles, ...options });

const press = (
  editor: RequestEditor,
  keys: string | Key[],
  inputAllowed = true,
): Array<EditorEvent | undefined> =>
  (typeof keys === 'string' ? typeKeys(keys) : keys).map((key) =>
    editor.handleKey(key, inputAllowed),
  );

describe('RequestEditor', () => {
  describe('construction', () => {
    it('should start in NORMAL mode at the origin with no history', () => {
      const editor = createEditor('{"a": 1}\n{"b": 2}', 'json');
      expect(editor.getMode()).toBe('NORMAL');
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });
      expect(editor.canUndo()).toBe(false);
      expect(editor.canRedo()).toBe(false);
      expect(editor.isSearching()).toBe(false);
      expect(editor.getSearchQuery()).toBe('');
      expect(editor.getContent()).toBe('{"a": 1}\n{"b": 2}');
      expect(editor.getSyntax()).toBe('json');
    });

    it('should hold a single empty line for empty content', () => {
      const editor = createEditor();
      expect(editor.getContent()).toBe('');
      press(editor, 'jl$G');
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });
    });
  });

  describe('navigation', () => {
    it('should keep the cursor in bounds for any sequence of motions', () => {
      const contents = ['', 'x', '\nab\n', '{"a": [1, 2]}\n  }\n'];
      const keys = [
        ...typeKeys('lwj$wkbGhbg0hkjjll'),
        namedKey('right'),
        namedKey('down'),
        namedKey('left'),
        namedKey('up'),
      ];

      for (const content of contents) {
        for (const inputAllowed of [true, false]) {
          const editor = createEditor(content);
          const lines = content.split('\n');
          for (let round = 0; round < 3; round++) {
            for (const key of keys) {
              editor.handleKey(key, inputAllowed);
              const { row, col } = editor.getCursor();
              expect(row).toBeGreaterThanOrEqual(0);
              expect(row).toBeLessThan(lines.length);
              expect(col).toBeGreaterThanOrEqual(0);
              expect(col).toBeLessThanOrEqual(cpLen(lines[row]));
            }
          }
          expect(editor.getContent()).toBe(content);
        }
      }
    });

    it('should move by words and to line edges', () => {
      const editor = createEditor('"id": 1\nnext');
      press(editor, 'w');
      expect(editor.getCursor()).toEqual({ row: 0, col: 1 });
      press(editor, '$');
      expect(editor.getCursor()).toEqual({ row: 0, col: 7 });
      press(editor, 'G');
      expect(editor.getCursor()).toEqual({ row: 1, col: 0 });
      press(editor, 'g');
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });
    });
  });

  describe('NORMAL mode edits', () => {
    it('should emit content changes for o, O, x and d', () => {
      const editor = createEditor('abc');
      expect(press(editor, 'x')).toEqual([
        { type: 'content_changed', content: 'bc' },
      ]);
      expect(press(editor, 'o')).toEqual([
        { type: 'content_changed', content: 'bc\n' },
      ]);
      expect(editor.getMode()).toBe('INSERT');
      press(editor, [namedKey('escape')]);
      expect(press(editor, 'O')).toEqual([
        { type: 'content_changed', content: 'bc\n\n' },
      ]);
      press(editor, [namedKey('escape')]);
      expect(press(editor, 'd')).toEqual([
        { type: 'content_changed', content: 'bc\n' },
      ]);
    });

    it('should not emit or snapshot when x has nothing to delete', () => {
      const editor = createEditor('');
      expect(press(editor, 'x')).toEqual([undefined]);
      expect(editor.canUndo()).toBe(false);
    });

    it('should leave one empty line when deleting the last line', () => {
      const editor = createEditor('only');
      expect(press(editor, 'd')).toEqual([
        { type: 'content_changed', content: '' },
      ]);
      press(editor, 'd');
      expect(editor.getContent()).toBe('');
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });
    });

    it('should enter INSERT mode with a snapshot and no event', () => {
      const editor = createEditor('abc');
      expect(press(editor, 'a')).toEqual([undefined]);
      expect(editor.getMode()).toBe('INSERT');
      expect(editor.getCursor()).toEqual({ row: 0, col: 1 });
      expect(editor.canUndo()).toBe(true);
    });

    it('should emit quit on Q', () => {
      expect(press(createEditor('abc'), 'Q')).toEqual([{ type: 'quit' }]);
    });
  });

  describe('undo and redo', () => {
    it('should restore content and cursor exactly', () => {
      const editor = createEditor('abc\ndef');
      press(editor, 'xjdx');
      expect(editor.getContent()).toBe('c');
      const after = editor.getCursor();

      expect(press(editor, 'uuu')).toEqual([
        { type: 'content_changed', content: 'bc' },
        { type: 'content_changed', content: 'bc\ndef' },
        { type: 'content_changed', content: 'abc\ndef' },
      ]);
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });
      expect(editor.canUndo()).toBe(false);
      expect(press(editor, 'u')).toEqual([undefined]);

      const redo = [ctrlKey('r'), ctrlKey('r'), ctrlKey('r')];
      expect(press(editor, redo)).toEqual([
        { type: 'content_changed', content: 'bc\ndef' },
        { type: 'content_changed', content: 'bc' },
        { type: 'content_changed', content: 'c' },
      ]);
      expect(editor.getCursor()).toEqual(after);
      expect(editor.canRedo()).toBe(false);
      expect(press(editor, [ctrlKey('r')])).toEqual([undefined]);
    });

    it('should clear redo after a fresh edit', () => {
      const editor = createEditor('abc');
      press(editor, 'xu');
      expect(editor.canRedo()).toBe(true);
      press(editor, 'x');
      expect(editor.canRedo()).toBe(false);
      expect(press(editor, [ctrlKey('r')])).toEqual([undefined]);
      expect(editor.getContent()).toBe('bc');
    });

    it('should undo a whole insert session at once', () => {
      const editor = createEditor('ab');
      press(editor, 'A');
      press(editor, typeKeys('cd'));
      press(editor, [namedKey('escape')]);
      expect(editor.getContent()).toBe('abcd');
      press(editor, 'u');
      expect(editor.getContent()).toBe('ab');
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });
    });
  });

  describe('INSERT mode', () => {
    it('should insert text and split lines', () => {
      const editor = createEditor('');
      press(editor, 'i');
      expect(press(editor, 'hi')).toEqual([undefined, undefined]);
      press(editor, [namedKey('return')]);
      press(editor, 'x');
      expect(editor.getContent()).toBe('hi\nx');
      expect(editor.getCursor()).toEqual({ row: 1, col: 1 });
    });

    it('should return to NORMAL one column back and emit the content', () => {
      const editor = createEditor('');
      press(editor, 'i');
      press(editor, 'ab');
      expect(press(editor, [namedKey('escape')])).toEqual([
        { type: 'content_changed', content: 'ab' },
      ]);
      expect(editor.getMode()).toBe('NORMAL');
      expect(editor.getCursor()).toEqual({ row: 0, col: 1 });
    });

    it('should treat command letters as text', () => {
      const editor = createEditor('');
      press(editor, 'i');
      press(editor, 'dQx u');
      expect(editor.getContent()).toBe('dQx u');
    });

    it('should merge with the previous line on backspace at column 0', () => {
      const editor = createEditor('ab\ncd');
      press(editor, 'ji');
      press(editor, [namedKey('backspace')]);
      expect(editor.getContent()).toBe('abcd');
      expect(editor.getCursor()).toEqual({ row: 0, col: 2 });
    });

    it('should merge the next line on delete at the line end', () => {
      const editor = createEditor('ab\ncd');
      press(editor, '$i');
      press(editor, [namedKey('delete')]);
      expect(editor.getContent()).toBe('abcd');
      expect(editor.getCursor()).toEqual({ row: 0, col: 2 });
    });

    it('should insert tabSize spaces on tab', () => {
      const defaults = createEditor('x');
      press(defaults, 'i');
      press(defaults, [namedKey('tab')]);
      expect(defaults.getContent()).toBe('  x');

      const wide = createEditor('x', 'text', {
        settings: { ...DEFAULT_EDITOR_SETTINGS, tabSize: 4 },
      });
      press(wide, 'i');
      press(wide, [namedKey('tab')]);
      expect(wide.getContent()).toBe('    x');
      expect(wide.getCursor()).toEqual({ row: 0, col: 4 });
    });

    it('should move with arrows and line edges', () => {
      const editor = createEditor('abc\nd');
      press(editor, 'i');
      press(editor, [namedKey('right'), namedKey('down')]);
      expect(editor.getCursor()).toEqual({ row: 1, col: 1 });
      press(editor, [namedKey('up'), ctrlKey('e')]);
      expect(editor.getCursor()).toEqual({ row: 0, col: 3 });
      press(editor, [ctrlKey('a'), namedKey('left')]);
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });
    });

    it('should honour overridden key bindings', () => {
      const editor = createEditor('', 'text', {
        settings: parseEditorSettings({
          keyBindings: { 'basic.cancel': [{ key: 'q', ctrl: true }] },
        }),
      });
      press(editor, 'i');
      press(editor, [namedKey('escape')]);
      expect(editor.getMode()).toBe('INSERT');
      expect(press(editor, [ctrlKey('q')])).toEqual([
        { type: 'content_changed', content: '' },
      ]);
      expect(editor.getMode()).toBe('NORMAL');
    });
  });

  describe('read-only', () => {
    it('should allow navigation but block edits', () => {
      const editor = createEditor('abc\ndef');
      editor.setReadOnly(true);
      expect(editor.isReadOnly()).toBe(true);
      expect(press(editor, 'xdiuQoO')).toEqual(new Array(7).fill(undefined));
      expect(editor.getContent()).toBe('abc\ndef');
      expect(editor.getMode()).toBe('NORMAL');
      press(editor, 'j$');
      expect(editor.getCursor()).toEqual({ row: 1, col: 3 });
    });

    it('should behave the same when the host disallows input', () => {
      const editor = createEditor('abc');
      press(editor, 'xl', false);
      expect(editor.getContent()).toBe('abc');
      expect(editor.getCursor()).toEqual({ row: 0, col: 1 });
    });

    it('should still search', () => {
      const editor = createEditor('abc\nxbz');
      editor.setReadOnly(true);
      press(editor, '/b');
      press(editor, [namedKey('return')]);
      expect(editor.getSearchMatches()).toHaveLength(2);
      press(editor, 'n');
      expect(editor.getCursor()).toEqual({ row: 1, col: 1 });
      press(editor, [namedKey('escape')]);
      expect(editor.getSearchQuery()).toBe('');
    });
  });

  describe('search', () => {
    it('should find the single match and move to it while typing', () => {
      const editor = createEditor('hello world test');
      press(editor, '/');
      expect(editor.isSearching()).toBe(true);
      press(editor, 'test');
      expect(editor.getSearchMatches()).toEqual([
        { row: 0, colStart: 12, colEnd: 16 },
      ]);
      expect(editor.getCursor()).toEqual({ row: 0, col: 12 });
      expect(editor.hasSearchQuery()).toBe(false);

      press(editor, [namedKey('return')]);
      expect(editor.isSearching()).toBe(false);
      expect(editor.hasSearchQuery()).toBe(true);
      expect(editor.getSearchQuery()).toBe('test');
    });

    it('should cycle through matches with n and N', () => {
      const editor = createEditor('id\nx id\nid');
      press(editor, '/id');
      press(editor, [namedKey('return')]);
      expect(editor.getMatchCount()).toEqual([1, 3]);

      press(editor, 'n');
      expect(editor.getCursor()).toEqual({ row: 1, col: 2 });
      press(editor, 'n');
      expect(editor.getCursor()).toEqual({ row: 2, col: 0 });
      press(editor, 'n');
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });
      press(editor, 'N');
      expect(editor.getCursor()).toEqual({ row: 2, col: 0 });
      expect(editor.getMatchCount()).toEqual([3, 3]);
    });

    it('should route every key to the prompt while it is open', () => {
      const editor = createEditor('abc');
      press(editor, '/xdQ');
      expect(editor.getContent()).toBe('abc');
      expect(editor.getSearchQuery()).toBe('xdQ');
      expect(editor.getSearchMatches()).toEqual([]);
    });

    it('should clear the query when the prompt is canceled', () => {
      const editor = createEditor('a a');
      press(editor, '/a');
      press(editor, [namedKey('escape')]);
      expect(editor.getSearchQuery()).toBe('');
      expect(editor.getSearchMatches()).toEqual([]);
      expect(editor.isSearching()).toBe(false);
    });

    it('should clear a kept query on escape', () => {
      const editor = createEditor('a a');
      press(editor, '/a');
      press(editor, [namedKey('return'), namedKey('escape')]);
      expect(editor.getSearchQuery()).toBe('');
      expect(press(editor, 'n')).toEqual([undefined]);
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });
    });

    it('should refresh matches after an edit', () => {
      const editor = createEditor('ab ab');
      press(editor, '/ab');
      press(editor, [namedKey('return')]);
      expect(editor.getSearchMatches()).toHaveLength(2);
      press(editor, 'x');
      expect(editor.getContent()).toBe('b ab');
      expect(editor.getSearchMatches()).toEqual([
        { row: 0, colStart: 2, colEnd: 4 },
      ]);
    });
  });

  describe('formatJson', () => {
    it('should reformat valid JSON and reset the cursor', () => {
      const editor = createEditor('{"a":1,"b":[1,2]}', 'json');
      press(editor, 'll');
      expect(press(editor, 'F')).toEqual([
        { type: 'format_result', success: true },
      ]);
      expect(editor.getContent()).toBe(
        '{\n  "a": 1,\n  "b": [\n    1,\n    2\n  ]\n}',
      );
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });

      press(editor, 'u');
      expect(editor.getContent()).toBe('{"a":1,"b":[1,2]}');
    });

    it('should report a parse failure and leave the buffer alone', () => {
      const editor = createEditor('{"a":', 'json');
      const [event] = press(editor, 'F');
      expect(event?.type).toBe('format_result');
      if (event?.type === 'format_result') {
        expect(event.success).toBe(false);
        expect(event.error).toBeTruthy();
      }
      expect(editor.getContent()).toBe('{"a":');
      expect(editor.canUndo()).toBe(false);
    });

    it('should do nothing for empty content or other syntaxes', () => {
      expect(press(createEditor('', 'json'), 'F')).toEqual([undefined]);
      const text = createEditor('{"a":1}', 'javascript');
      expect(press(text, 'F')).toEqual([undefined]);
      expect(text.getContent()).toBe('{"a":1}');
    });
  });

  describe('setContent', () => {
    it('should reset cursor, scroll, search and history', () => {
      const editor = createEditor('abc\ndef');
      press(editor, 'jx/e');
      press(editor, [namedKey('return')]);

      editor.setContent('new\ntext');
      expect(editor.getContent()).toBe('new\ntext');
      expect(editor.getCursor()).toEqual({ row: 0, col: 0 });
      expect(editor.getScroll()).toEqual({ scrollRow: 0, scrollCol: 0 });
      expect(editor.canUndo()).toBe(false);
      expect(editor.canRedo()).toBe(false);
      expect(editor.getSearchQuery()).toBe('');
    });

    it('should split on any line break', () => {
      const editor = createEditor();
      editor.setContent('a\r\nb\rc');
      expect(editor.getContent()).toBe('a\nb\nc');
    });
  });

  describe('preview mode', () => {
    it('should substitute variables without touching the buffer', () => {
      const content = '{"url": "{{base_url}}/api"}';
      const editor = createEditor(content, 'json');
      editor.setVariableValues({ base_url: 'https://api.test.com' });
      editor.togglePreviewMode();
      expect(editor.isPreviewMode()).toBe(true);
      expect(editor.getPreviewContent()).toBe(
        '{"url": "https://api.test.com/api"}',
      );
      expect(editor.getContent()).toBe(content);
      editor.togglePreviewMode();
      expect(editor.isPreviewMode()).toBe(false);
    });

    it('should leave unresolved placeholders literal', () => {
      const content = '{"token": "{{auth_token}}"}';
      const editor = createEditor(content, 'json');
      editor.setVariableValues({ other_var: 'value' });
      editor.togglePreviewMode();
      expect(editor.getPreviewContent()).toBe(content);
      expect(editor.getUnresolvedVariables()).toEqual(['auth_token']);
    });

    it('should block edits while previewing', () => {
      const editor = createEditor('abc');
      editor.togglePreviewMode();
      press(editor, 'xl');
      expect(editor.getContent()).toBe('abc');
      expect(editor.getCursor()).toEqual({ row: 0, col: 1 });
    });

    it('should render the substituted text', () => {
      const editor = createEditor('{"url": "{{base_url}}/api"}', 'json');
      editor.setVariableValues({ base_url: 'https://api.test.com' });
      editor.togglePreviewMode();
      expect(editor.render(50, 2, false).split('\n')[0]).toBe(
        ' 01 │ {"url": "https://api.test.com/api"}',
      );
    });
  });

  describe('render', () => {
    const twentyLines = Array.from(
      { length: 20 },
      (_, i) => `line${i + 1}`,
    ).join('\n');

    it('should scroll to keep the cursor visible', () => {
      const editor = createEditor(twentyLines);
      editor.render(30, 5, true);
      press(editor, 'G');
      expect(editor.getScroll()).toEqual({ scrollRow: 16, scrollCol: 0 });

      const rows = editor.render(30, 5, true).split('\n');
      expect(rows).toHaveLength(5);
      expect(rows[0]).toBe(' 17 │ line17');
      expect(rows[3]).toBe(' 20 │ line20' + ' '.repeat(18));
    });

    it('should give a row to the search prompt', () => {
      const editor = createEditor(twentyLines);
      press(editor, '/line5');
      const rows = editor.render(30, 5, false).split('\n');
      expect(rows).toHaveLength(5);
      expect(rows[0]).toBe('/line5█' + ' '.repeat(19) + ' 1/1');
      expect(rows[1]).toBe(' 03 │ line3');
    });

    it('should show the filter line once the prompt closes', () => {
      const editor = createEditor(twentyLines);
      press(editor, '/line2');
      press(editor, [namedKey('return')]);
      const rows = editor.render(30, 5, true).split('\n');
      expect(rows[0]).toBe('/line2 1/2 esc');
      expect(rows[4]).toBe(' NORMAL  n:next  N:prev  esc:clear  /:search ');
    });

    it('should scroll horizontally when the cursor nears the edge', () => {
      const editor = createEditor('x'.repeat(40));
      editor.render(30, 3, true);
      press(editor, '$');
      expect(editor.getScroll()).toEqual({ scrollRow: 0, scrollCol: 24 });
      const [row] = editor.render(30, 3, false).split('\n');
      expect(row).toBe('◀ 01 │ ' + 'x'.repeat(16));
    });
  });

  describe('charKey', () => {
    it('should type a space as text in INSERT mode', () => {
      const editor = createEditor('ab');
      press(editor, 'a');
      press(editor, [charKey(' ')]);
      expect(editor.getContent()).toBe('a b');
    });
  });
});
