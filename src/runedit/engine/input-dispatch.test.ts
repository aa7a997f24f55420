import { describe, expect, it, vi } from "vitest";
import {
  handleClick,
  handleKeyboardInput,
  type EditableText,
} from "./input-dispatch";
import { ClickHistory } from "./click-history";
import { createEditorState } from "./editor-session";
import type { HitOutput } from "./hit-test";
import type { KeyboardInput } from "./keys";
import { TextBuffer } from "../core/text-buffer";
import { MonospaceLayout } from "../layout/monospace-layout";
import { silentLogger, type Logger } from "../shared/logger";

const layout = new MonospaceLayout();

function editable(...values: string[]): EditableText {
  const sections = values.map((value) => ({ value }));
  return {
    buffer: TextBuffer.fromSections(sections, { width: 200, height: 40 }),
    sections,
    state: createEditorState(),
  };
}

function spyLogger() {
  const debug = vi.fn<Logger["debug"]>();
  const logger: Logger = { debug };
  return { logger, debug };
}

function pressed(key: KeyboardInput["logicalKey"]): KeyboardInput {
  return { state: "pressed", logicalKey: key };
}

describe("handleClick", () => {
  const hit: HitOutput<string> = {
    key: "text",
    spanIndex: 0,
    position: { x: 2, y: 5 },
  };

  it("escalates repeated clicks from caret to word to line", () => {
    const clock = { time: 0 };
    const history = new ClickHistory(() => clock.time);
    const text = editable("hello world");
    const { logger, debug } = spyLogger();
    const click = (time: number) => {
      clock.time = time;
      handleClick({
        hit,
        leftJustPressed: true,
        history,
        lookup: () => text,
        layout,
        logger,
      });
    };

    click(0);
    expect(text.state.cursor).toEqual({ line: 0, index: 0 });
    expect(text.state.selection).toEqual({ type: "none" });

    click(100);
    expect(text.state.selection).toEqual({
      type: "word",
      anchor: { line: 0, index: 0 },
    });
    expect(text.state.selectionBounds).toEqual([
      { line: 0, index: 0 },
      { line: 0, index: 5 },
    ]);

    click(200);
    expect(text.state.selectionBounds).toEqual([
      { line: 0, index: 0 },
      { line: 0, index: 11 },
    ]);
    expect(debug).toHaveBeenLastCalledWith("CLICK", "triple-click", {
      position: { x: 2, y: 5 },
      history: 3,
    });
  });

  it("records the click even when the text is gone", () => {
    const history = new ClickHistory(() => 0);

    handleClick({
      hit,
      leftJustPressed: true,
      history,
      lookup: () => undefined,
      layout,
      logger: silentLogger,
    });

    expect(history.entries).toHaveLength(1);
  });

  it("ignores frames without a fresh press or a hit", () => {
    const history = new ClickHistory(() => 0);
    const text = editable("hello");

    handleClick({
      hit,
      leftJustPressed: false,
      history,
      lookup: () => text,
      layout,
      logger: silentLogger,
    });
    handleClick({
      hit: null,
      leftJustPressed: true,
      history,
      lookup: () => text,
      layout,
      logger: silentLogger,
    });

    expect(history.entries).toHaveLength(0);
    expect(text.state.cursor).toBeNull();
  });
});

describe("handleKeyboardInput", () => {
  it("edits the buffer and rebuilds the sections", () => {
    const text = editable("Hi");

    handleKeyboardInput({
      events: [
        pressed({ type: "named", key: "End" }),
        pressed({ type: "character", text: "!" }),
      ],
      texts: [text],
      layout,
      logger: silentLogger,
    });

    expect(text.sections).toEqual([{ value: "Hi!" }]);
    expect(text.state.cursor).toEqual({ line: 0, index: 3 });
  });

  it("ignores key releases", () => {
    const text = editable("Hi");

    handleKeyboardInput({
      events: [{ state: "released", logicalKey: { type: "character", text: "x" } }],
      texts: [text],
      layout,
      logger: silentLogger,
    });

    expect(text.sections).toEqual([{ value: "Hi" }]);
    expect(text.state.cursor).toBeNull();
  });

  it("logs keys without an editing meaning", () => {
    const text = editable("Hi");
    const { logger, debug } = spyLogger();

    handleKeyboardInput({
      events: [pressed({ type: "named", key: "Tab" })],
      texts: [text],
      layout,
      logger,
    });

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("KEY", "unhandled", {
      key: { type: "named", key: "Tab" },
    });
    expect(text.sections).toEqual([{ value: "Hi" }]);
  });

  it("applies every key press to every text", () => {
    const first = editable("a");
    const second = editable("b", "c");

    handleKeyboardInput({
      events: [pressed({ type: "character", text: "x" })],
      texts: [first, second],
      layout,
      logger: silentLogger,
    });

    expect(first.sections).toEqual([{ value: "xa" }]);
    expect(second.sections).toEqual([{ value: "xb" }, { value: "c" }]);
  });
});
