/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Compile-time exhaustiveness check that also throws at runtime if reached.
 */
export function checkExhaustive(value: never, message?: string): never {
  throw new Error(message ?? `unexpected value ${String(value)}!`);
}

/**
 * Compile-time exhaustiveness marker for `default` branches that must keep
 * running when an unknown value slips through at runtime.
 */
export function assumeExhaustive(_value: never): void {}
