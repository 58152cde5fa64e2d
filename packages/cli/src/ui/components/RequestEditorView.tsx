/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { useCallback, useState } from 'react';
import { Box, Text } from 'ink';
import { assumeExhaustive } from '@reqline/core';
import { useKeypress, type Key } from '../hooks/useKeypress.js';
import type { RequestEditor } from './shared/request-editor.js';

export interface FormatOutcome {
  success: boolean;
  error?: string;
}

export interface RequestEditorViewProps {
  editor: RequestEditor;
  width: number;
  height: number;
  isFocused: boolean;
  /** When false the editor stays browsable but rejects edits. */
  inputAllowed?: boolean;
  onContentChange?: (content: string) => void;
  onFormat?: (result: FormatOutcome) => void;
  onQuit?: () => void;
}

export function RequestEditorView({
  editor,
  width,
  height,
  isFocused,
  inputAllowed = true,
  onContentChange,
  onFormat,
  onQuit,
}: RequestEditorViewProps): React.JSX.Element {
  // The editor mutates in place; bumping this re-renders after each key.
  const [, setRevision] = useState(0);

  const handleKeypress = useCallback(
    (key: Key) => {
      const event = editor.handleKey(key, inputAllowed);
      setRevision((revision) => revision + 1);
      if (!event) {
        return;
      }
      switch (event.type) {
        case 'content_changed':
          onContentChange?.(event.content);
          break;
        case 'format_result':
          onFormat?.({ success: event.success, error: event.error });
          if (event.success) {
            onContentChange?.(editor.getContent());
          }
          break;
        case 'quit':
          onQuit?.();
          break;
        default:
          assumeExhaustive(event);
      }
    },
    [editor, inputAllowed, onContentChange, onFormat, onQuit],
  );

  useKeypress(handleKeypress, { isActive: isFocused });

  return (
    <Box flexDirection="column" width={width} height={height}>
      {editor
        .render(width, height, isFocused)
        .split('\n')
        .map((line, index) => (
          <Text key={index} wrap="truncate-end">
            {line}
          </Text>
        ))}
    </Box>
  );
}
