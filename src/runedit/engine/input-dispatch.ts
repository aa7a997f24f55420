import type { LayoutEngine } from "../core/layout";
import type { TextBuffer } from "../core/text-buffer";
import type { TextSection } from "../core/types";
import type { Logger } from "../shared/logger";
import type { ClickHistory } from "./click-history";
import type { EditorAction } from "./editor";
import { withEditorSession, type EditorState } from "./editor-session";
import type { HitOutput } from "./hit-test";
import { actionsForKey, type KeyboardInput } from "./keys";
import { reconcileSections } from "./reconcile";

/** Per-text storage the dispatchers read and write. */
export type EditableText = {
  buffer: TextBuffer;
  sections: TextSection[];
  state: EditorState;
};

export type ClickDispatch<K> = {
  hit: HitOutput<K> | null;
  leftJustPressed: boolean;
  history: ClickHistory;
  lookup: (key: K) => EditableText | undefined;
  layout: LayoutEngine;
  logger: Logger;
};

/** Turns a fresh left click on a text into a click, double-click or triple-click. */
export function handleClick<K>({
  hit,
  leftJustPressed,
  history,
  lookup,
  layout,
  logger,
}: ClickDispatch<K>): void {
  if (!leftJustPressed || !hit) {
    return;
  }
  const { position } = hit;
  history.record(position);

  const text = lookup(hit.key);
  if (!text) {
    return;
  }

  const kind = history.classify();
  logger.debug("CLICK", `${kind}-click`, {
    position,
    history: history.entries.length,
  });
  const action: EditorAction =
    kind === "triple"
      ? { type: "triple-click", x: position.x, y: position.y }
      : kind === "double"
        ? { type: "double-click", x: position.x, y: position.y }
        : { type: "click", x: position.x, y: position.y };

  withEditorSession(text.state, text.buffer, layout, (session) => {
    session.apply(action);
  });
}

export type KeyboardDispatch = {
  events: Iterable<KeyboardInput>;
  texts: Iterable<EditableText>;
  layout: LayoutEngine;
  logger: Logger;
};

/**
 * Applies every key press to every editable text, then rebuilds each text's
 * sections from its buffer.
 */
export function handleKeyboardInput({
  events,
  texts,
  layout,
  logger,
}: KeyboardDispatch): void {
  const targets = Array.from(texts);
  for (const event of events) {
    // Only key presses edit; releases are ignored.
    if (event.state === "released") {
      continue;
    }

    const actions = actionsForKey(event.logicalKey);
    if (actions.length === 0) {
      logger.debug("KEY", "unhandled", { key: event.logicalKey });
    }

    for (const text of targets) {
      withEditorSession(text.state, text.buffer, layout, (session) => {
        for (const action of actions) {
          session.apply(action);
        }
      });
      reconcileSections(text.buffer, text.sections);
    }
  }
}
