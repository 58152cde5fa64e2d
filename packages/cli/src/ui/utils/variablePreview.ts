/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** `{{name}}` where name is one or more of `[A-Za-z0-9_$]`. */
export const PLACEHOLDER_REGEX = /\{\{([A-Za-z0-9_$]+)\}\}/g;

export type VariableValues = Readonly<Record<string, string>>;

/**
 * Replaces every placeholder whose name is an own property of `values`.
 * Unknown names and malformed placeholders stay as written.
 */
export function substituteVariables(
  text: string,
  values: VariableValues,
): string {
  return text.replace(PLACEHOLDER_REGEX, (placeholder, name: string) =>
    Object.hasOwn(values, name) ? values[name] : placeholder,
  );
}

/** Distinct placeholder names in order of first appearance. */
export function extractVariables(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_REGEX)) {
    names.add(match[1]);
  }
  return [...names];
}

export function findUnresolvedVariables(
  text: string,
  values: VariableValues,
): string[] {
  return extractVariables(text).filter((name) => !Object.hasOwn(values, name));
}
