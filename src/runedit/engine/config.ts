import type { LayoutEngine } from "../core/layout";
import type { Color } from "../core/types";

export type CursorConfig = {
  color: Color;
  /** Caret width in pixels. */
  width: number;
};

export type SelectionConfig = {
  color: Color;
};

export const WHITE: Color = { r: 1, g: 1, b: 1, a: 1 };
export const BLACK: Color = { r: 0, g: 0, b: 0, a: 1 };

export const defaultCursorConfig: CursorConfig = { color: WHITE, width: 1 };
export const defaultSelectionConfig: SelectionConfig = { color: BLACK };

export function resolveCursorConfig(
  overrides?: Partial<CursorConfig>,
): CursorConfig {
  return {
    color: overrides?.color ?? defaultCursorConfig.color,
    width: overrides?.width ?? defaultCursorConfig.width,
  };
}

export function resolveSelectionConfig(
  overrides?: Partial<SelectionConfig>,
): SelectionConfig {
  return { color: overrides?.color ?? defaultSelectionConfig.color };
}

export type EngineOptions = {
  layout: LayoutEngine;
  /** Log click classification and unhandled keys through `console.debug`. */
  debug?: boolean;
  /** Millisecond clock for click timing. Defaults to `performance.now`. */
  now?: () => number;
  /** Camera used by texts that do not name one; null draws nothing for them. */
  defaultCamera?: string | null;
  /** Physical pixels per logical pixel of the render target. */
  scaleFactor?: number;
};
