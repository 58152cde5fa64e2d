/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { checkExhaustive } from '@reqline/core';
import { toCodePoints } from './textUtils.js';

export type SyntaxType = 'json' | 'javascript' | 'text';

export const SYNTAX_LABELS: Record<SyntaxType, string> = {
  json: 'JSON',
  javascript: 'JavaScript',
  text: 'Text',
};

export type TokenRole =
  | 'text'
  | 'key'
  | 'string'
  | 'number'
  | 'literal'
  | 'punctuation'
  | 'keyword'
  | 'comment'
  | 'function';

const JSON_PUNCTUATION = new Set(['{', '}', '[', ']', ',', ':']);
const JSON_LITERALS = ['true', 'false', 'null'];
const isNumberStart = (char: string) => /[0-9.-]/.test(char);
const isNumberChar = (char: string) => /[0-9.eE-]/.test(char);

const JS_KEYWORDS = [
  'const',
  'let',
  'var',
  'function',
  'return',
  'if',
  'else',
  'for',
  'while',
  'async',
  'await',
];
const JS_FUNCTIONS = ['console.log'];

function startsWithAt(chars: string[], index: number, word: string): boolean {
  const wordChars = toCodePoints(word);
  if (index + wordChars.length > chars.length) {
    return false;
  }
  return wordChars.every((char, i) => chars[index + i] === char);
}

/**
 * Role of each code point of a JSON line, scanned left to right.
 *
 * A string is a key when the next non-blank character after its closing
 * quote is a colon. Backslash escapes inside strings are skipped. Each line
 * is scanned on its own, so a string left open runs to the end of the line.
 */
export function getJsonRoles(line: string): TokenRole[] {
  const chars = toCodePoints(line);
  const roles: TokenRole[] = new Array<TokenRole>(chars.length).fill('text');

  let i = 0;
  while (i < chars.length) {
    const char = chars[i];

    if (char === '"') {
      const start = i;
      i++;
      while (i < chars.length && chars[i] !== '"') {
        i += chars[i] === '\\' ? 2 : 1;
      }
      const end = Math.min(i + 1, chars.length);
      let next = end;
      while (next < chars.length && /\s/.test(chars[next])) {
        next++;
      }
      roles.fill(chars[next] === ':' ? 'key' : 'string', start, end);
      i = end;
      continue;
    }

    if (JSON_PUNCTUATION.has(char)) {
      roles[i] = 'punctuation';
      i++;
      continue;
    }

    if (isNumberStart(char)) {
      const start = i;
      while (i < chars.length && isNumberChar(chars[i])) {
        i++;
      }
      roles.fill('number', start, i);
      continue;
    }

    const literal = JSON_LITERALS.find((word) => startsWithAt(chars, i, word));
    if (literal) {
      roles.fill('literal', i, i + literal.length);
      i += literal.length;
      continue;
    }

    i++;
  }

  return roles;
}

/**
 * Role of each code point of a JavaScript line.
 *
 * Whole-line `//` comments, keywords followed by a space, and `console.log`.
 * Matching is by substring, so a keyword inside a string or at the end of a
 * longer word is coloured too.
 */
export function getJavaScriptRoles(line: string): TokenRole[] {
  const chars = toCodePoints(line);

  if (line.trim().startsWith('//')) {
    return new Array<TokenRole>(chars.length).fill('comment');
  }

  const roles: TokenRole[] = new Array<TokenRole>(chars.length).fill('text');
  for (let i = 0; i < chars.length; i++) {
    for (const keyword of JS_KEYWORDS) {
      if (startsWithAt(chars, i, `${keyword} `)) {
        roles.fill('keyword', i, i + keyword.length);
      }
    }
    for (const fn of JS_FUNCTIONS) {
      if (startsWithAt(chars, i, fn)) {
        roles.fill('function', i, i + fn.length);
      }
    }
  }
  return roles;
}

export function getLineRoles(line: string, syntax: SyntaxType): TokenRole[] {
  switch (syntax) {
    case 'json':
      return getJsonRoles(line);
    case 'javascript':
      return getJavaScriptRoles(line);
    case 'text':
      return new Array<TokenRole>(toCodePoints(line).length).fill('text');
    default:
      return checkExhaustive(syntax);
  }
}
