/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { getErrorMessage } from '@reqline/core';

export type FormatResult =
  | { success: true; formatted: string }
  | { success: false; error: string };

export const JSON_INDENT = 2;

const compareKeys = ([a]: [string, unknown], [b]: [string, unknown]) =>
  a < b ? -1 : a > b ? 1 : 0;

// Written by hand rather than through JSON.stringify: a rebuilt object would
// put integer-like keys back in numeric order.
function serialize(value: unknown, indent: string): string {
  const inner = indent + ' '.repeat(JSON_INDENT);

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return '[]';
    }
    const items = value.map((item: unknown) => inner + serialize(item, inner));
    return `[\n${items.join(',\n')}\n${indent}]`;
  }

  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).sort(compareKeys);
    if (entries.length === 0) {
      return '{}';
    }
    const members = entries.map(
      ([key, member]) =>
        `${inner}${JSON.stringify(key)}: ${serialize(member, inner)}`,
    );
    return `{\n${members.join(',\n')}\n${indent}}`;
  }

  return JSON.stringify(value);
}

/**
 * Re-indents a JSON document in canonical form: two-space indentation and
 * object keys in ascending order. Returns null for empty input, which callers
 * treat as nothing to do.
 */
export function formatJson(text: string): FormatResult | null {
  if (text === '') {
    return null;
  }
  try {
    const value: unknown = JSON.parse(text);
    return { success: true, formatted: serialize(value, '') };
  } catch (error) {
    return { success: false, error: getErrorMessage(error) };
  }
}
