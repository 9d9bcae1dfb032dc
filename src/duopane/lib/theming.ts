/**
 * Splitter Theming
 *
 * Supplies themeable defaults (thickness, keyboard steps, colours, unbounded
 * handling) to every splitter below the provider. Explicit options still win.
 */

import React, { createContext, useContext, type ReactNode } from 'react';
import { splitterThemeSchema, type SplitterThemeData } from './config';
import { configErrorFromZod } from './errors';

const SplitterThemeContext = createContext<SplitterThemeData | undefined>(undefined);

interface SplitterThemeProviderProps {
  children?: ReactNode;
  theme: SplitterThemeData;
}

export function SplitterThemeProvider({ children, theme }: SplitterThemeProviderProps) {
  const parsed = splitterThemeSchema.safeParse(theme);
  if (!parsed.success) {
    throw configErrorFromZod(parsed.error);
  }
  return React.createElement(
    SplitterThemeContext.Provider,
    { value: parsed.data },
    children
  );
}

/**
 * Theme from the nearest provider, or an empty theme when there is none.
 */
export function useSplitterTheme(): SplitterThemeData {
  return useContext(SplitterThemeContext) ?? {};
}

/**
 * Layer `overrides` on top of `base`; undefined entries keep the base value.
 */
export function mergeSplitterThemes(base: SplitterThemeData, overrides: SplitterThemeData): SplitterThemeData {
  const merged: SplitterThemeData = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}
