/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Key } from '../ui/hooks/useKeypress.js';

const NO_MODIFIERS = {
  shift: false,
  alt: false,
  ctrl: false,
  cmd: false,
};

/** A named key such as 'escape' or 'left', shaped the way `toKey` builds it. */
export const namedKey = (name: string, mods: Partial<Key> = {}): Key => ({
  ...NO_MODIFIERS,
  name,
  insertable: false,
  sequence: '',
  ...mods,
});

/** A printable character, shaped the way `toKey` builds it. */
export const charKey = (char: string): Key => ({
  ...NO_MODIFIERS,
  name: char === ' ' ? 'space' : char.toLowerCase(),
  insertable: true,
  sequence: char,
});

export const ctrlKey = (char: string): Key => ({
  ...NO_MODIFIERS,
  ctrl: true,
  name: char,
  insertable: false,
  sequence: char,
});

/** Splits `text` into one character key per code point. */
export const typeKeys = (text: string): Key[] => Array.from(text, charKey);
