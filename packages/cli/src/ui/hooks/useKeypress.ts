/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { useCallback } from 'react';
import { useInput, type Key as InkKey } from 'ink';

export interface Key {
  name: string;
  shift: boolean;
  alt: boolean;
  ctrl: boolean;
  cmd: boolean; // Command/Windows/Super key
  insertable: boolean;
  sequence: string;
}

export type KeypressHandler = (key: Key) => boolean | void;

/**
 * Translates Ink's `(input, key)` pair into the editor's `Key` shape.
 *
 * Named keys get a `name` and an empty `sequence`. A printable character keeps
 * its exact text in `sequence` (so `G` and `g` differ there) and its lowercase
 * form in `name`.
 */
export function toKey(input: string, inkKey: InkKey): Key {
  const base = {
    shift: inkKey.shift,
    alt: inkKey.meta,
    ctrl: inkKey.ctrl,
    cmd: false,
  };
  const named = (name: string): Key => ({
    ...base,
    name,
    insertable: false,
    sequence: '',
  });

  if (inkKey.upArrow) return named('up');
  if (inkKey.downArrow) return named('down');
  if (inkKey.leftArrow) return named('left');
  if (inkKey.rightArrow) return named('right');
  if (inkKey.pageUp) return named('pageup');
  if (inkKey.pageDown) return named('pagedown');
  if (inkKey.return) return named('return');
  if (inkKey.escape) return named('escape');
  if (inkKey.tab) return named('tab');
  // Ink reports \x7f, the byte most terminals send for Backspace, as delete.
  // Forward delete stays reachable through its ctrl+d binding.
  if (inkKey.backspace || inkKey.delete) return named('backspace');

  if (inkKey.ctrl) {
    return { ...base, name: input.toLowerCase(), insertable: false, sequence: input };
  }

  return {
    ...base,
    name: input === ' ' ? 'space' : input.toLowerCase(),
    insertable: input.length > 0,
    sequence: input,
  };
}

/**
 * A hook that listens for keypress events from Ink's stdin.
 *
 * @param onKeypress - The callback function to execute on each keypress.
 * @param options.isActive - Whether the hook should be actively listening for input.
 */
export function useKeypress(
  onKeypress: KeypressHandler,
  { isActive }: { isActive: boolean },
) {
  const handleInput = useCallback(
    (input: string, inkKey: InkKey) => {
      onKeypress(toKey(input, inkKey));
    },
    [onKeypress],
  );

  useInput(handleInput, { isActive });
}
