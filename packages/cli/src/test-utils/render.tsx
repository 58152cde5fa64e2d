/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render as inkRender } from 'ink-testing-library';
import type React from 'react';
import { act } from 'react';

type RenderResult = ReturnType<typeof inkRender>;

// Wrapper around ink-testing-library's render that ensures act() is called
export const render = (tree: React.ReactElement): RenderResult => {
  let renderResult: RenderResult | undefined;
  act(() => {
    renderResult = inkRender(tree);
  });
  if (!renderResult) {
    throw new Error('render did not produce a result');
  }

  const { unmount, rerender } = renderResult;
  return {
    ...renderResult,
    unmount: () => {
      act(() => {
        unmount();
      });
    },
    rerender: (newTree: React.ReactElement) => {
      act(() => {
        rerender(newTree);
      });
    },
  };
};
