/** A position in a text buffer: line index plus code-unit offset into that line. */
export type Cursor = {
  line: number;
  index: number;
};

/**
 * Selection state of an editor. The anchor is where the selection started;
 * the head is always the editor cursor.
 */
export type Selection =
  | { type: "none" }
  | { type: "normal"; anchor: Cursor }
  | { type: "word"; anchor: Cursor }
  | { type: "line"; anchor: Cursor };

/** Normalized selection extent, `start <= end`. */
export type SelectionBounds = [start: Cursor, end: Cursor];

export type Vec2 = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

/** Linear RGBA, each component in [0, 1]. */
export type Color = {
  r: number;
  g: number;
  b: number;
  a: number;
};

export type LayoutGlyph = {
  start: number;
  end: number;
  x: number;
  width: number;
  rtl: boolean;
};

/** One shaped, positioned physical line. Produced by a layout engine. */
export type LayoutRun = {
  lineIndex: number;
  text: string;
  glyphs: LayoutGlyph[];
  lineTop: number;
  lineHeight: number;
  rtl: boolean;
};

export type DrawRect = {
  kind: "caret" | "selection";
  x: number;
  y: number;
  width: number;
  height: number;
  color: Color;
  clip: Rect | null;
  camera: string;
  stackIndex: number;
};

export type TextSection = {
  value: string;
  style?: Record<string, unknown>;
};
