/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Command enum for the named-key shortcuts of the body editor.
 *
 * Single-character command-mode keys (`h`, `w`, `x`, `F`, ...) are not listed
 * here; they are dispatched on the exact key sequence.
 */
export enum Command {
  // Basic Controls
  RETURN = 'basic.confirm',
  ESCAPE = 'basic.cancel',

  // Cursor Movement
  HOME = 'cursor.home',
  END = 'cursor.end',
  MOVE_UP = 'cursor.up',
  MOVE_DOWN = 'cursor.down',
  MOVE_LEFT = 'cursor.left',
  MOVE_RIGHT = 'cursor.right',

  // Editing
  CLEAR_INPUT = 'edit.clear',
  DELETE_CHAR_LEFT = 'edit.deleteLeft',
  DELETE_CHAR_RIGHT = 'edit.deleteRight',
  INSERT_TAB = 'edit.tab',
  REDO = 'edit.redo',
}

/**
 * Data-driven key binding structure for user configuration
 */
export interface KeyBinding {
  /** The key name (e.g., 'a', 'return', 'tab', 'escape') */
  key: string;
  /** Shift key requirement: true=must be pressed, false=must not be pressed, undefined=ignore */
  shift?: boolean;
  /** Alt/Option key requirement: true=must be pressed, false=must not be pressed, undefined=ignore */
  alt?: boolean;
  /** Control key requirement: true=must be pressed, false=must not be pressed, undefined=ignore */
  ctrl?: boolean;
  /** Command/Windows/Super key requirement: true=must be pressed, false=must not be pressed, undefined=ignore */
  cmd?: boolean;
}

/**
 * Configuration type mapping commands to their key bindings
 */
export type KeyBindingConfig = {
  readonly [C in Command]: readonly KeyBinding[];
};

export type KeyBindingOverrides = Partial<
  Record<Command, readonly KeyBinding[]>
>;

export const defaultKeyBindings: KeyBindingConfig = {
  // Basic Controls
  [Command.RETURN]: [{ key: 'return' }],
  [Command.ESCAPE]: [{ key: 'escape' }, { key: '[', ctrl: true }],

  // Cursor Movement
  [Command.HOME]: [
    { key: 'a', ctrl: true },
    { key: 'home', shift: false, ctrl: false },
  ],
  [Command.END]: [
    { key: 'e', ctrl: true },
    { key: 'end', shift: false, ctrl: false },
  ],
  [Command.MOVE_UP]: [
    { key: 'up', shift: false, alt: false, ctrl: false, cmd: false },
  ],
  [Command.MOVE_DOWN]: [
    { key: 'down', shift: false, alt: false, ctrl: false, cmd: false },
  ],
  [Command.MOVE_LEFT]: [
    { key: 'left', shift: false, alt: false, ctrl: false, cmd: false },
  ],
  [Command.MOVE_RIGHT]: [
    { key: 'right', shift: false, alt: false, ctrl: false, cmd: false },
  ],

  // Editing
  [Command.CLEAR_INPUT]: [{ key: 'u', ctrl: true }],
  [Command.DELETE_CHAR_LEFT]: [{ key: 'backspace' }, { key: 'h', ctrl: true }],
  [Command.DELETE_CHAR_RIGHT]: [{ key: 'delete' }, { key: 'd', ctrl: true }],
  [Command.INSERT_TAB]: [{ key: 'tab', shift: false }],
  [Command.REDO]: [{ key: 'r', ctrl: true }],
};

/**
 * Applies user overrides on top of the defaults. A command named in the
 * overrides replaces its default bindings entirely.
 */
export function mergeKeyBindings(
  overrides: KeyBindingOverrides = {},
  base: KeyBindingConfig = defaultKeyBindings,
): KeyBindingConfig {
  return { ...base, ...overrides };
}
