/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { toCodePoints } from '../../utils/textUtils.js';

export interface SearchMatch {
  row: number;
  colStart: number;
  /** Exclusive. */
  colEnd: number;
}

export interface SearchState {
  query: string;
  matches: SearchMatch[];
  /** Index into `matches`, or NO_MATCH. */
  currentMatchIndex: number;
}

export const NO_MATCH = -1;

export function createSearchState(): SearchState {
  return { query: '', matches: [], currentMatchIndex: NO_MATCH };
}

const lowerCodePoints = (str: string): string[] =>
  toCodePoints(str).map((char) => char.toLowerCase());

/**
 * Case-insensitive substring scan. After a hit at column p the scan resumes at
 * p + 1, so overlapping occurrences are all reported. Columns are code-point
 * indices.
 */
export function findMatches(lines: string[], query: string): SearchMatch[] {
  const needle = lowerCodePoints(query);
  if (needle.length === 0) {
    return [];
  }

  const matches: SearchMatch[] = [];
  lines.forEach((line, row) => {
    const haystack = lowerCodePoints(line);
    for (let p = 0; p + needle.length <= haystack.length; p++) {
      let hit = true;
      for (let i = 0; i < needle.length; i++) {
        if (haystack[p + i] !== needle[i]) {
          hit = false;
          break;
        }
      }
      if (hit) {
        matches.push({ row, colStart: p, colEnd: p + needle.length });
      }
    }
  });
  return matches;
}

/**
 * First match at or after the cursor; wraps to the first match, or NO_MATCH
 * when there are none.
 */
export function pickCurrentMatch(
  matches: SearchMatch[],
  cursorRow: number,
  cursorCol: number,
): number {
  if (matches.length === 0) {
    return NO_MATCH;
  }
  const index = matches.findIndex(
    (match) =>
      match.row > cursorRow ||
      (match.row === cursorRow && match.colStart >= cursorCol),
  );
  return index === -1 ? 0 : index;
}

export function setSearchQuery(
  lines: string[],
  query: string,
  cursorRow: number,
  cursorCol: number,
): SearchState {
  if (query === '') {
    return createSearchState();
  }
  const matches = findMatches(lines, query);
  return {
    query,
    matches,
    currentMatchIndex: pickCurrentMatch(matches, cursorRow, cursorCol),
  };
}

export function nextMatch(state: SearchState): SearchState {
  if (state.matches.length === 0) {
    return state;
  }
  return {
    ...state,
    currentMatchIndex: (state.currentMatchIndex + 1) % state.matches.length,
  };
}

export function prevMatch(state: SearchState): SearchState {
  if (state.matches.length === 0) {
    return state;
  }
  const index = state.currentMatchIndex - 1;
  return {
    ...state,
    currentMatchIndex: index < 0 ? state.matches.length - 1 : index,
  };
}

export function getCurrentMatch(state: SearchState): SearchMatch | undefined {
  return state.currentMatchIndex === NO_MATCH
    ? undefined
    : state.matches[state.currentMatchIndex];
}

/** `[current, total]` with `current` 1-based, or `[0, 0]` without matches. */
export function getMatchCount(state: SearchState): [number, number] {
  if (state.matches.length === 0) {
    return [0, 0];
  }
  return [state.currentMatchIndex + 1, state.matches.length];
}
