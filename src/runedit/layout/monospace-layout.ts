import type { LayoutEngine } from "../core/layout";
import type { TextBuffer } from "../core/text-buffer";
import type { Cursor, LayoutGlyph, LayoutRun } from "../core/types";
import { graphemeSegments } from "../shared/segmenter";

export type MonospaceLayoutOptions = {
  /** Horizontal advance of every grapheme cluster, in pixels. */
  advance?: number;
  lineHeight?: number;
};

const FIRST_LETTER = /\p{L}/u;
const RTL_LETTER = /[\p{Script=Hebrew}\p{Script=Arabic}\p{Script=Syriac}\p{Script=Thaana}]/u;

export function isRtlText(text: string): boolean {
  const match = FIRST_LETTER.exec(text);
  return match !== null && RTL_LETTER.test(match[0]);
}

/**
 * Fixed-advance layout without wrapping: one run per buffer line, one glyph
 * per grapheme cluster. Right-to-left lines run leftwards from the right edge
 * of their own content.
 */
export class MonospaceLayout implements LayoutEngine {
  readonly advance: number;
  readonly lineHeight: number;

  constructor(options: MonospaceLayoutOptions = {}) {
    this.advance = options.advance ?? 10;
    this.lineHeight = options.lineHeight ?? 20;
  }

  layoutRuns(buffer: TextBuffer): LayoutRun[] {
    return buffer.lines.map((line, lineIndex) =>
      this.layoutLine(line.text, lineIndex),
    );
  }

  hit(buffer: TextBuffer, x: number, y: number): Cursor | null {
    if (x < 0 || y < 0) {
      return null;
    }
    const lineIndex = Math.min(
      Math.floor(y / this.lineHeight),
      buffer.lineCount() - 1,
    );
    const run = this.layoutLine(buffer.lines[lineIndex].text, lineIndex);
    return { line: lineIndex, index: hitRun(run, x) };
  }

  private layoutLine(text: string, lineIndex: number): LayoutRun {
    const rtl = isRtlText(text);
    const segments = graphemeSegments(text);
    const lineWidth = segments.length * this.advance;
    const glyphs: LayoutGlyph[] = segments.map((segment, i) => ({
      start: segment.index,
      end: segment.index + segment.segment.length,
      x: rtl ? lineWidth - (i + 1) * this.advance : i * this.advance,
      width: this.advance,
      rtl,
    }));
    return {
      lineIndex,
      text,
      glyphs,
      lineTop: lineIndex * this.lineHeight,
      lineHeight: this.lineHeight,
      rtl,
    };
  }
}

/** Offset in the run's line nearest to `x`, snapping to glyph edges. */
export function hitRun(run: LayoutRun, x: number): number {
  if (run.glyphs.length === 0) {
    return 0;
  }

  let minX = Infinity;
  let maxX = -Infinity;
  for (const glyph of run.glyphs) {
    if (x >= glyph.x && x < glyph.x + glyph.width) {
      const leftHalf = x < glyph.x + glyph.width / 2;
      return leftHalf === glyph.rtl ? glyph.end : glyph.start;
    }
    minX = Math.min(minX, glyph.x);
    maxX = Math.max(maxX, glyph.x + glyph.width);
  }

  if (x >= maxX) {
    return run.rtl ? 0 : run.text.length;
  }
  return run.rtl ? run.text.length : 0;
}
