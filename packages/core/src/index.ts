/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './utils/debugLogger.js';
export * from './utils/errors.js';
export * from './utils/checks.js';
