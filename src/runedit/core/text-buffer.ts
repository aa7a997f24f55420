import { AttrsList } from "./attrs-list";
import type { Cursor, TextSection } from "./types";
import { snapToGraphemeBoundary } from "../shared/segmenter";
import { CursorRangeError } from "../shared/errors";

export type LineEnding = "\n" | "\r\n" | "\r" | "";

export type BufferLine = {
  text: string;
  ending: LineEnding;
  attrs: AttrsList;
};

export type BufferSize = {
  width: number | null;
  height: number | null;
};

const LINE_BREAK = /(\r\n|\n|\r)/;

function toLineEnding(value: string): LineEnding {
  if (value === "\r\n" || value === "\n" || value === "\r") {
    return value;
  }
  return "";
}

/**
 * Lines of text with their styled spans. Owned by one editable text and
 * mutated only through an editor.
 */
export class TextBuffer {
  lines: BufferLine[];
  size: BufferSize;

  constructor(lines: BufferLine[], size: BufferSize = { width: null, height: null }) {
    this.lines =
      lines.length > 0 ? lines : [{ text: "", ending: "", attrs: new AttrsList() }];
    this.size = size;
  }

  /**
   * Builds a buffer from ordered sections, splitting on line breaks. Every
   * non-empty piece becomes a span tagged with its section index.
   */
  static fromSections(sections: TextSection[], size?: BufferSize): TextBuffer {
    const lines: BufferLine[] = [];
    let current: BufferLine = { text: "", ending: "", attrs: new AttrsList() };

    sections.forEach((section, sectionIndex) => {
      // Odd indices hold the captured line breaks.
      const parts = section.value.split(LINE_BREAK);
      parts.forEach((part, i) => {
        if (i % 2 === 0) {
          appendPiece(current, part, sectionIndex);
          return;
        }
        current.ending = toLineEnding(part);
        lines.push(current);
        current = {
          text: "",
          ending: "",
          attrs: new AttrsList(sectionIndex),
        };
      });
    });
    lines.push(current);

    return new TextBuffer(lines, size);
  }

  lineCount(): number {
    return this.lines.length;
  }

  lineLength(line: number): number {
    return this.lines[line]?.text.length ?? 0;
  }

  setSize(width: number | null, height: number | null): void {
    this.size = { width, height };
  }

  /** Full text, line endings included. */
  toString(): string {
    return this.lines.map((line) => line.text + line.ending).join("");
  }

  /** Moves a cursor onto an existing line and a grapheme boundary. */
  clampCursor(cursor: Cursor): Cursor {
    const line = Math.max(0, Math.min(cursor.line, this.lines.length - 1));
    const text = this.lines[line].text;
    return { line, index: snapToGraphemeBoundary(text, cursor.index) };
  }

  assertCursor(cursor: Cursor): void {
    const line = this.lines[cursor.line];
    if (!line) {
      throw new CursorRangeError(
        `Cursor line ${cursor.line} is outside a buffer of ${this.lines.length} lines`,
      );
    }
    if (cursor.index < 0 || cursor.index > line.text.length) {
      throw new CursorRangeError(
        `Cursor index ${cursor.index} is outside line ${cursor.line} of length ${line.text.length}`,
      );
    }
  }
}

function appendPiece(line: BufferLine, piece: string, sectionIndex: number) {
  if (!piece) {
    return;
  }
  const start = line.text.length;
  line.text += piece;
  line.attrs.add(start, line.text.length, sectionIndex);
}
