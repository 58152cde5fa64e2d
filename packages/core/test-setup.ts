/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { vi, afterEach } from 'vitest';

// Keep a debug log file configured in the developer's shell out of test runs
delete process.env['REQLINE_DEBUG_LOG_FILE'];

afterEach(() => {
  vi.unstubAllEnvs();
});
