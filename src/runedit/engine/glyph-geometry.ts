import type {
  Cursor,
  LayoutGlyph,
  LayoutRun,
  SelectionBounds,
} from "../core/types";
import { graphemeSegments } from "../shared/segmenter";

export type CaretPosition = {
  x: number;
  y: number;
};

export type SelectionSpan = {
  x: number;
  y: number;
  width: number;
};

export type CursorGlyph = {
  /** Index into `run.glyphs`; equals `glyphs.length` past the last glyph. */
  glyphIndex: number;
  /** Distance from the glyph's logical start edge. */
  offset: number;
};

/** X of a point `offset` pixels into `glyph` in reading direction. */
function glyphEdge(glyph: LayoutGlyph, offset: number): number {
  return glyph.rtl ? glyph.x + glyph.width - offset : glyph.x + offset;
}

/** X where the line continues after the last glyph. */
function trailingEdge(glyph: LayoutGlyph): number {
  return glyph.rtl ? glyph.x : glyph.x + glyph.width;
}

export function cursorGlyph(cursor: Cursor, run: LayoutRun): CursorGlyph | null {
  if (cursor.line !== run.lineIndex) {
    return null;
  }

  for (let glyphIndex = 0; glyphIndex < run.glyphs.length; glyphIndex += 1) {
    const glyph = run.glyphs[glyphIndex];
    if (cursor.index === glyph.start) {
      return { glyphIndex, offset: 0 };
    }
    if (cursor.index > glyph.start && cursor.index < glyph.end) {
      // One shaped glyph for several graphemes (ligature, cluster): guess
      // the offset from the grapheme count.
      const cluster = run.text.slice(glyph.start, glyph.end);
      let before = 0;
      let total = 0;
      for (const segment of graphemeSegments(cluster)) {
        if (glyph.start + segment.index < cursor.index) {
          before += 1;
        }
        total += 1;
      }
      return { glyphIndex, offset: (glyph.width * before) / total };
    }
  }

  const last = run.glyphs[run.glyphs.length - 1];
  if (!last) {
    return { glyphIndex: 0, offset: 0 };
  }
  if (cursor.index >= last.end) {
    return { glyphIndex: run.glyphs.length, offset: 0 };
  }
  return null;
}

/** Caret location in run-local pixels, or null when the cursor is not on this run. */
export function caretPosition(
  cursor: Cursor,
  run: LayoutRun,
): CaretPosition | null {
  const located = cursorGlyph(cursor, run);
  if (!located) {
    return null;
  }

  const glyph = run.glyphs[located.glyphIndex];
  if (glyph) {
    return { x: glyphEdge(glyph, located.offset), y: run.lineTop };
  }
  const last = run.glyphs[run.glyphs.length - 1];
  return { x: last ? trailingEdge(last) : 0, y: run.lineTop };
}

/**
 * Highlighted span of `bounds` on one run. Returns the first contiguous
 * range of selected graphemes; when the selection continues on a later line
 * the range reaches the run's trailing side of the buffer.
 */
export function highlightSelection(
  bounds: SelectionBounds | null,
  bufferWidth: number | null,
  run: LayoutRun,
): SelectionSpan | null {
  if (!bounds) {
    return null;
  }
  const [start, end] = bounds;
  const line = run.lineIndex;
  if (line < start.line || line > end.line) {
    return null;
  }

  const toSpan = (min: number, max: number): SelectionSpan => ({
    x: min,
    y: run.lineTop,
    width: Math.max(0, max - min),
  });

  let range: { min: number; max: number } | null = null;
  for (const glyph of run.glyphs) {
    const cluster = run.text.slice(glyph.start, glyph.end);
    const segments = graphemeSegments(cluster);
    const graphemeWidth = glyph.width / segments.length;
    let x = glyph.x;
    for (const segment of segments) {
      const graphemeStart = glyph.start + segment.index;
      const graphemeEnd = graphemeStart + segment.segment.length;
      const selected =
        (start.line !== line || graphemeEnd > start.index) &&
        (end.line !== line || graphemeStart < end.index);
      if (selected) {
        range = range
          ? {
              min: Math.min(range.min, x),
              max: Math.max(range.max, x + graphemeWidth),
            }
          : { min: x, max: x + graphemeWidth };
      } else if (range) {
        return toSpan(range.min, range.max);
      }
      x += graphemeWidth;
    }
  }

  const width = bufferWidth ?? 0;
  if (run.glyphs.length === 0 && end.line > line) {
    // Empty line inside the selection.
    range = { min: 0, max: width };
  }

  if (!range) {
    return null;
  }
  if (end.line > line) {
    if (run.rtl) {
      range.min = 0;
    } else {
      range.max = width;
    }
  }
  return toSpan(range.min, range.max);
}
