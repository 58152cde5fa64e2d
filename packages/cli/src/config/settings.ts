/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import stripJsonComments from 'strip-json-comments';
import {
  debugLogger,
  FatalConfigError,
  getErrorMessage,
  isNodeError,
} from '@reqline/core';
import { Command } from './keyBindings.js';

const keyBindingSchema = z
  .object({
    key: z.string().min(1),
    shift: z.boolean().optional(),
    alt: z.boolean().optional(),
    ctrl: z.boolean().optional(),
    cmd: z.boolean().optional(),
  })
  .strict();

export const editorSettingsSchema = z
  .object({
    /** Spaces inserted by Tab in insert mode. */
    tabSize: z.number().int().min(1).max(8).default(2),
    /** Maximum depth of the undo stack; the oldest snapshot is dropped. */
    undoLimit: z.number().int().min(1).max(1000).default(100),
    /** Upper bound of the horizontal scroll margin, in columns. */
    scrollMargin: z.number().int().min(0).max(20).default(5),
    /**
     * 'wide' grows the gutter with the line count; 'wrap' keeps two digits
     * and shows line numbers modulo 100.
     */
    lineNumbers: z.enum(['wide', 'wrap']).default('wide'),
    keyBindings: z
      .record(z.nativeEnum(Command), z.array(keyBindingSchema))
      .default({}),
  })
  .strict();

export type EditorSettings = z.output<typeof editorSettingsSchema>;
export type EditorSettingsInput = z.input<typeof editorSettingsSchema>;
export type LineNumberMode = EditorSettings['lineNumbers'];

export const DEFAULT_EDITOR_SETTINGS: EditorSettings = Object.freeze(
  editorSettingsSchema.parse({}),
);

/**
 * Format a Zod error into a helpful error message
 */
export function formatValidationError(
  error: z.ZodError,
  source: string,
): string {
  const lines: string[] = [];
  lines.push(`Invalid editor settings in ${source}:`);
  lines.push('');

  const MAX_ERRORS_TO_DISPLAY = 5;
  const displayedIssues = error.issues.slice(0, MAX_ERRORS_TO_DISPLAY);

  for (const issue of displayedIssues) {
    const path = issue.path.reduce<string>(
      (acc, curr) =>
        typeof curr === 'number'
          ? `${acc}[${curr}]`
          : `${acc ? acc + '.' : ''}${curr}`,
      '',
    );
    lines.push(`Error in: ${path || '(root)'}`);
    lines.push(`    ${issue.message}`);
    lines.push('');
  }

  if (error.issues.length > MAX_ERRORS_TO_DISPLAY) {
    lines.push(
      `...and ${error.issues.length - MAX_ERRORS_TO_DISPLAY} more errors.`,
    );
    lines.push('');
  }

  lines.push('Please fix the configuration.');
  return lines.join('\n');
}

/**
 * Validates raw settings data and fills in defaults.
 *
 * @throws FatalConfigError when the data does not match the schema.
 */
export function parseEditorSettings(
  data: unknown,
  source = 'editor settings',
): EditorSettings {
  const result = editorSettingsSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new FatalConfigError(formatValidationError(result.error, source));
  }
  return result.data;
}

/**
 * Loads editor settings from a JSON file that may contain comments.
 * A missing file yields the defaults.
 */
export function loadEditorSettings(filePath: string): EditorSettings {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      debugLogger.debug(`No editor settings at ${filePath}, using defaults.`);
      return DEFAULT_EDITOR_SETTINGS;
    }
    throw new FatalConfigError(
      `Error reading ${filePath}: ${getErrorMessage(error)}`,
    );
  }

  let rawSettings: unknown;
  try {
    rawSettings = JSON.parse(stripJsonComments(content));
  } catch (error) {
    throw new FatalConfigError(
      `Error in ${filePath}: ${getErrorMessage(error)}`,
    );
  }

  return parseEditorSettings(rawSettings, filePath);
}
