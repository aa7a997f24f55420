import type { LayoutEngine } from "../core/layout";
import { TextBuffer } from "../core/text-buffer";
import type { DrawRect, Rect, Size, TextSection, Vec2 } from "../core/types";
import { createLogger, type Logger } from "../shared/logger";
import { ClickHistory } from "./click-history";
import {
  resolveCursorConfig,
  resolveSelectionConfig,
  type CursorConfig,
  type EngineOptions,
  type SelectionConfig,
} from "./config";
import {
  extractCaretRects,
  extractSelectionRects,
  type DisplayNode,
  type RenderTarget,
} from "./draw-rects";
import { createEditorState } from "./editor-session";
import { hitTest, type HitRegion } from "./hit-test";
import {
  handleClick,
  handleKeyboardInput,
  type EditableText,
} from "./input-dispatch";
import type { KeyboardInput } from "./keys";

export type EditableTextInit = {
  sections: TextSection[];
  size: Size;
  center: Vec2;
  visible?: boolean;
  clip?: Rect | null;
  camera?: string | null;
  stackIndex?: number;
  cursorConfig?: Partial<CursorConfig>;
  selectionConfig?: Partial<SelectionConfig>;
};

export type EditableTextEntry = EditableText & {
  node: DisplayNode;
  cursorConfig?: Partial<CursorConfig>;
  selectionConfig?: Partial<SelectionConfig>;
};

/** Input collected by the host for one frame. */
export type FrameInput = {
  /** Pointer in window space; null when there is no focused window or it is outside. */
  pointer: Vec2 | null;
  leftJustPressed: boolean;
  keys: KeyboardInput[];
};

/**
 * Owns the editable texts of one window. `update` is the input stage and
 * `extract` the render stage; extraction only reads state that `update` has
 * committed.
 */
export class RunEditEngine<K = string> {
  private readonly texts = new Map<K, EditableTextEntry>();
  private readonly clickHistory: ClickHistory;
  private readonly layout: LayoutEngine;
  private readonly logger: Logger;
  private readonly target: RenderTarget;

  constructor(options: EngineOptions) {
    this.layout = options.layout;
    this.logger = createLogger(options.debug ?? false);
    this.clickHistory = new ClickHistory(options.now);
    this.target = {
      defaultCamera:
        options.defaultCamera === undefined ? "default" : options.defaultCamera,
      scaleFactor: options.scaleFactor ?? 1,
    };
  }

  /** Creates a text together with its buffer and editor state. */
  add(key: K, init: EditableTextInit): EditableTextEntry {
    const entry: EditableTextEntry = {
      buffer: TextBuffer.fromSections(init.sections, {
        width: init.size.width,
        height: init.size.height,
      }),
      sections: init.sections.map((section) => ({ ...section })),
      state: createEditorState(),
      node: {
        center: { ...init.center },
        size: { ...init.size },
        visible: init.visible ?? true,
        clip: init.clip ?? null,
        camera: init.camera ?? null,
        stackIndex: init.stackIndex ?? 0,
      },
      cursorConfig: init.cursorConfig,
      selectionConfig: init.selectionConfig,
    };
    this.texts.set(key, entry);
    return entry;
  }

  remove(key: K): boolean {
    return this.texts.delete(key);
  }

  get(key: K): EditableTextEntry | undefined {
    return this.texts.get(key);
  }

  /** Moves or resizes a text; the buffer size follows the node size. */
  updateNode(key: K, patch: Partial<DisplayNode>): void {
    const entry = this.texts.get(key);
    if (!entry) {
      return;
    }
    entry.node = { ...entry.node, ...patch };
    entry.buffer.setSize(entry.node.size.width, entry.node.size.height);
  }

  get clicks(): ClickHistory {
    return this.clickHistory;
  }

  update(frame: FrameInput): void {
    if (frame.leftJustPressed) {
      handleClick({
        hit: hitTest(frame.pointer, this.regions(), this.layout),
        leftJustPressed: true,
        history: this.clickHistory,
        lookup: (key) => this.texts.get(key),
        layout: this.layout,
        logger: this.logger,
      });
    }
    if (frame.keys.length > 0) {
      handleKeyboardInput({
        events: frame.keys,
        texts: this.texts.values(),
        layout: this.layout,
        logger: this.logger,
      });
    }
  }

  /** Selection highlights of every text, followed by every caret. */
  extract(): DrawRect[] {
    const selections: DrawRect[] = [];
    const carets: DrawRect[] = [];
    for (const entry of this.texts.values()) {
      const runs = this.layout.layoutRuns(entry.buffer);
      selections.push(
        ...extractSelectionRects({
          node: entry.node,
          state: entry.state,
          bufferWidth: entry.buffer.size.width,
          runs,
          config: resolveSelectionConfig(entry.selectionConfig),
          target: this.target,
        }),
      );
      carets.push(
        ...extractCaretRects({
          node: entry.node,
          state: entry.state,
          runs,
          config: resolveCursorConfig(entry.cursorConfig),
          target: this.target,
        }),
      );
    }
    return [...selections, ...carets];
  }

  private *regions(): Generator<HitRegion<K>> {
    for (const [key, entry] of this.texts) {
      yield { key, buffer: entry.buffer, center: entry.node.center };
    }
  }
}
