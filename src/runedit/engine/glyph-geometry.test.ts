import { describe, expect, it } from "vitest";
import { caretPosition, cursorGlyph, highlightSelection } from "./glyph-geometry";
import type { LayoutGlyph, LayoutRun, SelectionBounds } from "../core/types";

function run(
  text: string,
  glyphs: LayoutGlyph[],
  overrides: Partial<LayoutRun> = {},
): LayoutRun {
  return {
    lineIndex: 0,
    text,
    glyphs,
    lineTop: 0,
    lineHeight: 20,
    rtl: false,
    ...overrides,
  };
}

function ltrGlyph(start: number, end: number, x: number, width = 10): LayoutGlyph {
  return { start, end, x, width, rtl: false };
}

function rtlGlyph(start: number, end: number, x: number, width = 10): LayoutGlyph {
  return { start, end, x, width, rtl: true };
}

const ab = run("AB", [ltrGlyph(0, 1, 0), ltrGlyph(1, 2, 10)]);

describe("cursorGlyph", () => {
  it("locates a cursor at a glyph start", () => {
    expect(cursorGlyph({ line: 0, index: 1 }, ab)).toEqual({
      glyphIndex: 1,
      offset: 0,
    });
  });

  it("places a cursor at the line end past the last glyph", () => {
    expect(cursorGlyph({ line: 0, index: 2 }, ab)).toEqual({
      glyphIndex: 2,
      offset: 0,
    });
  });

  it("interpolates inside a glyph covering several graphemes", () => {
    const ligature = run("ffi", [ltrGlyph(0, 3, 0, 30)]);

    expect(cursorGlyph({ line: 0, index: 1 }, ligature)).toEqual({
      glyphIndex: 0,
      offset: 10,
    });
    expect(cursorGlyph({ line: 0, index: 2 }, ligature)).toEqual({
      glyphIndex: 0,
      offset: 20,
    });
  });

  it("ignores cursors on other lines", () => {
    expect(cursorGlyph({ line: 1, index: 0 }, ab)).toBeNull();
  });

  it("puts the cursor at the start of an empty run", () => {
    expect(cursorGlyph({ line: 0, index: 0 }, run("", []))).toEqual({
      glyphIndex: 0,
      offset: 0,
    });
  });
});

describe("caretPosition", () => {
  it("uses the leading edge of the glyph at the cursor", () => {
    expect(caretPosition({ line: 0, index: 0 }, ab)).toEqual({ x: 0, y: 0 });
    expect(caretPosition({ line: 0, index: 1 }, ab)).toEqual({ x: 10, y: 0 });
  });

  it("uses the trailing edge of the last glyph at the line end", () => {
    expect(caretPosition({ line: 0, index: 2 }, ab)).toEqual({ x: 20, y: 0 });
  });

  it("reports the run's top as y", () => {
    const second = run("CD", [ltrGlyph(0, 1, 0), ltrGlyph(1, 2, 10)], {
      lineIndex: 1,
      lineTop: 20,
    });

    expect(caretPosition({ line: 1, index: 1 }, second)).toEqual({
      x: 10,
      y: 20,
    });
  });

  it("measures right-to-left glyphs from their right edge", () => {
    const hebrew = run("אב", [rtlGlyph(0, 1, 10), rtlGlyph(1, 2, 0)], {
      rtl: true,
    });

    expect(caretPosition({ line: 0, index: 0 }, hebrew)).toEqual({ x: 20, y: 0 });
    expect(caretPosition({ line: 0, index: 1 }, hebrew)).toEqual({ x: 10, y: 0 });
    expect(caretPosition({ line: 0, index: 2 }, hebrew)).toEqual({ x: 0, y: 0 });
  });

  it("places the caret at x 0 on an empty line", () => {
    const empty = run("", [], { lineIndex: 2, lineTop: 40 });

    expect(caretPosition({ line: 2, index: 0 }, empty)).toEqual({ x: 0, y: 40 });
  });

  it("returns null for a cursor on another line", () => {
    expect(caretPosition({ line: 3, index: 0 }, ab)).toBeNull();
  });
});

describe("highlightSelection", () => {
  it("covers a fully selected line", () => {
    const bounds: SelectionBounds = [
      { line: 0, index: 0 },
      { line: 0, index: 2 },
    ];

    expect(highlightSelection(bounds, 100, ab)).toEqual({
      x: 0,
      y: 0,
      width: 20,
    });
  });

  it("extends to the buffer width when the selection continues below", () => {
    const bounds: SelectionBounds = [
      { line: 0, index: 1 },
      { line: 1, index: 0 },
    ];

    expect(highlightSelection(bounds, 100, ab)).toEqual({
      x: 10,
      y: 0,
      width: 90,
    });
  });

  it("returns null for a line the selection only touches at its start", () => {
    const second = run("CD", [ltrGlyph(0, 1, 0), ltrGlyph(1, 2, 10)], {
      lineIndex: 1,
      lineTop: 20,
    });
    const bounds: SelectionBounds = [
      { line: 0, index: 1 },
      { line: 1, index: 0 },
    ];

    expect(highlightSelection(bounds, 100, second)).toBeNull();
  });

  it("fills an empty line inside the selection", () => {
    const empty = run("", [], { lineIndex: 1, lineTop: 20 });
    const bounds: SelectionBounds = [
      { line: 0, index: 1 },
      { line: 2, index: 1 },
    ];

    expect(highlightSelection(bounds, 100, empty)).toEqual({
      x: 0,
      y: 20,
      width: 100,
    });
  });

  it("extends right-to-left runs towards x 0", () => {
    const hebrew = run("אב", [rtlGlyph(0, 1, 90), rtlGlyph(1, 2, 80)], {
      rtl: true,
    });
    const bounds: SelectionBounds = [
      { line: 0, index: 1 },
      { line: 1, index: 0 },
    ];

    expect(highlightSelection(bounds, 100, hebrew)).toEqual({
      x: 0,
      y: 0,
      width: 90,
    });
  });

  it("splits a multi-grapheme glyph evenly", () => {
    const ligature = run("ffi", [ltrGlyph(0, 3, 0, 30)]);
    const bounds: SelectionBounds = [
      { line: 0, index: 1 },
      { line: 0, index: 3 },
    ];

    expect(highlightSelection(bounds, 100, ligature)).toEqual({
      x: 10,
      y: 0,
      width: 20,
    });
  });

  it("returns only the first contiguous range", () => {
    // Visual order differs from logical order here.
    const mixed = run("ABC", [
      ltrGlyph(0, 1, 0),
      ltrGlyph(2, 3, 10),
      ltrGlyph(1, 2, 20),
    ]);
    const bounds: SelectionBounds = [
      { line: 0, index: 0 },
      { line: 0, index: 2 },
    ];

    expect(highlightSelection(bounds, 100, mixed)).toEqual({
      x: 0,
      y: 0,
      width: 10,
    });
  });

  it("returns null without bounds or outside them", () => {
    expect(highlightSelection(null, 100, ab)).toBeNull();
    expect(
      highlightSelection(
        [
          { line: 1, index: 0 },
          { line: 2, index: 0 },
        ],
        100,
        ab,
      ),
    ).toBeNull();
  });

  it("gives the same answer for the same inputs", () => {
    const bounds: SelectionBounds = [
      { line: 0, index: 0 },
      { line: 1, index: 0 },
    ];

    expect(highlightSelection(bounds, 50, ab)).toEqual(
      highlightSelection(bounds, 50, ab),
    );
  });
});
