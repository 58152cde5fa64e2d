/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Chalk, type ChalkInstance, type ColorSupportLevel } from 'chalk';

export type ThemeType = 'light' | 'dark';

export interface ColorsTheme {
  type: ThemeType;
  Background: string;
  Foreground: string;
  Subtext: string;
  Punctuation: string;
  Surface: string;
  AccentBlue: string;
  AccentPurple: string;
  AccentPeach: string;
  AccentYellow: string;
  AccentGreen: string;
  AccentRed: string;
}

export const darkTheme: ColorsTheme = {
  type: 'dark',
  Background: '#1E1E2E',
  Foreground: '#CDD6F4',
  Subtext: '#A6ADC8',
  Punctuation: '#BAC2DE',
  Surface: '#313244',
  AccentBlue: '#89B4FA',
  AccentPurple: '#CBA6F7',
  AccentPeach: '#FAB387',
  AccentYellow: '#F9E2AF',
  AccentGreen: '#A6E3A1',
  AccentRed: '#F38BA8',
};

export const lightTheme: ColorsTheme = {
  type: 'light',
  Background: '#EFF1F5',
  Foreground: '#4C4F69',
  Subtext: '#6C6F85',
  Punctuation: '#5C5F77',
  Surface: '#CCD0DA',
  AccentBlue: '#1E66F5',
  AccentPurple: '#8839EF',
  AccentPeach: '#FE640B',
  AccentYellow: '#DF8E1D',
  AccentGreen: '#40A02B',
  AccentRed: '#D20F39',
};

export type Style = (text: string) => string;

/**
 * Every style the body editor paints with. Renderers only ever see this
 * interface, so tests can substitute markers for colours.
 */
export interface EditorStyles {
  // syntax
  text: Style;
  key: Style;
  string: Style;
  number: Style;
  literal: Style;
  punctuation: Style;
  keyword: Style;
  comment: Style;
  function: Style;

  // overlays
  match: Style;
  currentMatch: Style;
  cursorNormal: Style;
  cursorInsert: Style;
  cursorLine: Style;

  // chrome
  lineNumber: Style;
  modeNormal: Style;
  modeInsert: Style;
  modePreview: Style;
  hint: Style;
  bar: Style;
  dimLabel: Style;
  filter: Style;
  count: Style;
  escHint: Style;
  searchPrefix: Style;
  searchCursor: Style;
}

export function createEditorStyles(
  theme: ColorsTheme = darkTheme,
  level?: ColorSupportLevel,
): EditorStyles {
  const c: ChalkInstance =
    level === undefined ? new Chalk() : new Chalk({ level });
  const fg = (color: string) => c.hex(color);
  const onColor = (background: string) =>
    c.bgHex(background).hex(theme.Background);

  return {
    text: fg(theme.Foreground),
    key: fg(theme.AccentBlue),
    string: fg(theme.AccentGreen),
    number: fg(theme.AccentPeach),
    literal: fg(theme.AccentPurple),
    punctuation: fg(theme.Punctuation),
    keyword: fg(theme.AccentPurple).bold,
    comment: fg(theme.Subtext).italic,
    function: fg(theme.AccentBlue),

    match: onColor(theme.AccentYellow),
    currentMatch: onColor(theme.AccentPeach).bold,
    cursorNormal: onColor(theme.Foreground),
    cursorInsert: onColor(theme.AccentGreen),
    cursorLine: c.bgHex(theme.Surface),

    lineNumber: fg(theme.Subtext),
    modeNormal: onColor(theme.AccentBlue).bold,
    modeInsert: onColor(theme.AccentGreen).bold,
    modePreview: onColor(theme.AccentPurple).bold,
    hint: c.bgHex(theme.Surface).hex(theme.Subtext),
    bar: c.bgHex(theme.Surface),
    dimLabel: fg(theme.Subtext),
    filter: fg(theme.AccentYellow),
    count: fg(theme.Subtext),
    escHint: fg(theme.Subtext).italic,
    searchPrefix: fg(theme.AccentYellow).bold,
    searchCursor: fg(theme.AccentGreen).bold,
  };
}
