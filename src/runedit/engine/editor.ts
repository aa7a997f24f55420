import type { LayoutEngine } from "../core/layout";
import type { TextBuffer } from "../core/text-buffer";
import type { Cursor, Selection, SelectionBounds } from "../core/types";
import { compareCursors, cursorsEqual, maxCursor, minCursor } from "../core/cursor";
import {
  nextGraphemeBoundary,
  previousGraphemeBoundary,
} from "../shared/segmenter";
import { getWordBoundariesAt } from "../shared/word-break";
import { caretPosition } from "./glyph-geometry";

export type Motion =
  | "left"
  | "right"
  | "up"
  | "down"
  | "home"
  | "end"
  | "page-up"
  | "page-down";

export type EditorAction =
  | { type: "insert"; text: string }
  | { type: "enter" }
  | { type: "backspace" }
  | { type: "delete" }
  | { type: "motion"; motion: Motion }
  | { type: "click"; x: number; y: number }
  | { type: "double-click"; x: number; y: number }
  | { type: "triple-click"; x: number; y: number };

const LINE_BREAK = /\r\n|\n|\r/;

/**
 * Low-level editing primitive over one buffer: a cursor, a selection and
 * the actions that change them and the text.
 */
export class Editor {
  private cursorValue: Cursor = { line: 0, index: 0 };
  private selectionValue: Selection = { type: "none" };
  // Remembered x for consecutive vertical motions.
  private goalXValue: number | null = null;

  constructor(readonly buffer: TextBuffer) {}

  cursor(): Cursor {
    return { ...this.cursorValue };
  }

  setCursor(cursor: Cursor): void {
    this.buffer.assertCursor(cursor);
    this.cursorValue = { ...cursor };
    this.goalXValue = null;
  }

  selection(): Selection {
    if (this.selectionValue.type === "none") {
      return { type: "none" };
    }
    return {
      type: this.selectionValue.type,
      anchor: { ...this.selectionValue.anchor },
    };
  }

  setSelection(selection: Selection): void {
    if (selection.type !== "none") {
      this.buffer.assertCursor(selection.anchor);
      this.selectionValue = { type: selection.type, anchor: { ...selection.anchor } };
      return;
    }
    this.selectionValue = { type: "none" };
  }

  /** X that up and down motions aim for; null until a vertical motion sets it. */
  goalX(): number | null {
    return this.goalXValue;
  }

  /** Call after `setCursor`, which forgets the goal. */
  setGoalX(x: number | null): void {
    this.goalXValue = x;
  }

  selectionBounds(): SelectionBounds | null {
    const selection = this.selectionValue;
    const cursor = this.cursorValue;
    switch (selection.type) {
      case "none":
        return null;
      case "normal": {
        if (cursorsEqual(selection.anchor, cursor)) {
          return null;
        }
        return [
          { ...minCursor(selection.anchor, cursor) },
          { ...maxCursor(selection.anchor, cursor) },
        ];
      }
      case "word": {
        const anchorWord = this.wordAt(selection.anchor);
        const cursorWord = this.wordAt(cursor);
        return [
          minCursor(anchorWord[0], cursorWord[0]),
          maxCursor(anchorWord[1], cursorWord[1]),
        ];
      }
      case "line": {
        const first = Math.min(selection.anchor.line, cursor.line);
        const last = Math.max(selection.anchor.line, cursor.line);
        return [
          { line: first, index: 0 },
          { line: last, index: this.buffer.lineLength(last) },
        ];
      }
    }
  }

  action(layout: LayoutEngine, action: EditorAction): void {
    switch (action.type) {
      case "insert":
        this.deleteSelection();
        this.insert(action.text);
        return;
      case "enter":
        this.deleteSelection();
        this.splitLine();
        return;
      case "backspace":
        if (!this.deleteSelection()) {
          this.deleteBackward();
        }
        return;
      case "delete":
        if (!this.deleteSelection()) {
          this.deleteForward();
        }
        return;
      case "motion":
        this.move(layout, action.motion);
        return;
      case "click":
      case "double-click":
      case "triple-click": {
        const hit = layout.hit(this.buffer, action.x, action.y);
        if (!hit) {
          return;
        }
        this.setCursor(hit);
        if (action.type === "click") {
          this.selectionValue = { type: "none" };
        } else {
          this.selectionValue = {
            type: action.type === "double-click" ? "word" : "line",
            anchor: { ...hit },
          };
        }
        return;
      }
    }
  }

  private wordAt(cursor: Cursor): SelectionBounds {
    const text = this.buffer.lines[cursor.line].text;
    const word = getWordBoundariesAt(text, cursor.index);
    return [
      { line: cursor.line, index: word.start },
      { line: cursor.line, index: word.end },
    ];
  }

  private insert(text: string): void {
    text.split(LINE_BREAK).forEach((piece, i) => {
      if (i > 0) {
        this.splitLine();
      }
      this.insertOnLine(piece);
    });
  }

  private insertOnLine(text: string): void {
    if (!text) {
      return;
    }
    const { line, index } = this.cursorValue;
    const bufferLine = this.buffer.lines[line];
    bufferLine.text =
      bufferLine.text.slice(0, index) + text + bufferLine.text.slice(index);
    bufferLine.attrs.insertGap(index, text.length);
    bufferLine.attrs.validate(bufferLine.text.length);
    this.cursorValue = { line, index: index + text.length };
    this.goalXValue = null;
  }

  private splitLine(): void {
    const { line, index } = this.cursorValue;
    const bufferLine = this.buffer.lines[line];
    // The new line keeps the style the text before the break ends with.
    const carriedStyle = bufferLine.attrs.getSpan(Math.max(0, index - 1));
    const tail = {
      text: bufferLine.text.slice(index),
      ending: bufferLine.ending,
      attrs: bufferLine.attrs.splitOff(index, carriedStyle),
    };
    bufferLine.text = bufferLine.text.slice(0, index);
    bufferLine.ending = "\n";
    this.buffer.lines.splice(line + 1, 0, tail);
    bufferLine.attrs.validate(bufferLine.text.length);
    tail.attrs.validate(tail.text.length);
    this.cursorValue = { line: line + 1, index: 0 };
    this.goalXValue = null;
  }

  /** Removes the selected text. Returns false when nothing was selected. */
  private deleteSelection(): boolean {
    const bounds = this.selectionBounds();
    this.selectionValue = { type: "none" };
    if (!bounds) {
      return false;
    }
    this.deleteRange(bounds[0], bounds[1]);
    return true;
  }

  private deleteRange(start: Cursor, end: Cursor): void {
    if (compareCursors(start, end) >= 0) {
      return;
    }
    const lines = this.buffer.lines;
    const first = lines[start.line];
    if (start.line === end.line) {
      first.text = first.text.slice(0, start.index) + first.text.slice(end.index);
      first.attrs.removeRange(start.index, end.index);
    } else {
      const last = lines[end.line];
      const lastAttrs = last.attrs.clone();
      lastAttrs.removeRange(0, end.index);
      first.attrs.removeRange(start.index, first.text.length);
      first.attrs.append(lastAttrs, start.index);
      first.text = first.text.slice(0, start.index) + last.text.slice(end.index);
      first.ending = last.ending;
      lines.splice(start.line + 1, end.line - start.line);
    }
    first.attrs.validate(first.text.length);
    this.cursorValue = { ...start };
    this.goalXValue = null;
  }

  private deleteBackward(): void {
    const { line, index } = this.cursorValue;
    if (index > 0) {
      const text = this.buffer.lines[line].text;
      this.deleteRange({ line, index: previousGraphemeBoundary(text, index) }, { line, index });
    } else if (line > 0) {
      this.deleteRange(
        { line: line - 1, index: this.buffer.lineLength(line - 1) },
        { line, index: 0 },
      );
    }
  }

  private deleteForward(): void {
    const { line, index } = this.cursorValue;
    const text = this.buffer.lines[line].text;
    if (index < text.length) {
      this.deleteRange({ line, index }, { line, index: nextGraphemeBoundary(text, index) });
    } else if (line + 1 < this.buffer.lineCount()) {
      this.deleteRange({ line, index }, { line: line + 1, index: 0 });
    }
  }

  private move(layout: LayoutEngine, motion: Motion): void {
    const bounds = this.selectionBounds();
    this.selectionValue = { type: "none" };
    const { line, index } = this.cursorValue;
    const text = this.buffer.lines[line].text;

    switch (motion) {
      case "left":
        if (bounds) {
          this.setCursor(bounds[0]);
        } else if (index > 0) {
          this.setCursor({ line, index: previousGraphemeBoundary(text, index) });
        } else if (line > 0) {
          this.setCursor({ line: line - 1, index: this.buffer.lineLength(line - 1) });
        }
        return;
      case "right":
        if (bounds) {
          this.setCursor(bounds[1]);
        } else if (index < text.length) {
          this.setCursor({ line, index: nextGraphemeBoundary(text, index) });
        } else if (line + 1 < this.buffer.lineCount()) {
          this.setCursor({ line: line + 1, index: 0 });
        }
        return;
      case "home":
        this.setCursor({ line, index: 0 });
        return;
      case "end":
        this.setCursor({ line, index: text.length });
        return;
      case "up":
        this.moveVertically(layout, -1);
        return;
      case "down":
        this.moveVertically(layout, 1);
        return;
      case "page-up":
        this.moveVertically(layout, -this.pageLines(layout));
        return;
      case "page-down":
        this.moveVertically(layout, this.pageLines(layout));
        return;
    }
  }

  private pageLines(layout: LayoutEngine): number {
    const height = this.buffer.size.height;
    if (height === null || layout.lineHeight <= 0) {
      return 1;
    }
    return Math.max(1, Math.floor(height / layout.lineHeight));
  }

  private moveVertically(layout: LayoutEngine, delta: number): void {
    const target = this.cursorValue.line + delta;
    if (target < 0) {
      this.setCursor({ line: 0, index: 0 });
      return;
    }
    const lastLine = this.buffer.lineCount() - 1;
    if (target > lastLine) {
      this.setCursor({ line: lastLine, index: this.buffer.lineLength(lastLine) });
      return;
    }

    const runs = layout.layoutRuns(this.buffer);
    let x = this.goalXValue;
    if (x === null) {
      const run = runs.find((candidate) => candidate.lineIndex === this.cursorValue.line);
      x = (run ? caretPosition(this.cursorValue, run)?.x : undefined) ?? 0;
    }
    const targetRun = runs.find((candidate) => candidate.lineIndex === target);
    const y = targetRun
      ? targetRun.lineTop + targetRun.lineHeight / 2
      : (target + 0.5) * layout.lineHeight;
    const hit = layout.hit(this.buffer, Math.max(0, x), y);
    this.setCursor(hit && hit.line === target ? hit : { line: target, index: 0 });
    this.goalXValue = x;
  }
}
