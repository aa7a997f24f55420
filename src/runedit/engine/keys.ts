import type { EditorAction, Motion } from "./editor";

export type NamedKey =
  | "Enter"
  | "Space"
  | "Backspace"
  | "Delete"
  | "ArrowLeft"
  | "ArrowRight"
  | "ArrowUp"
  | "ArrowDown"
  | "Home"
  | "End"
  | "PageUp"
  | "PageDown"
  | "Control"
  | "Shift"
  | "Tab";

export type LogicalKey =
  | { type: "character"; text: string }
  | { type: "named"; key: NamedKey }
  | { type: "unidentified"; key: string };

export type KeyboardInput = {
  state: "pressed" | "released";
  logicalKey: LogicalKey;
};

const namedKeys = new Set<string>([
  "Enter",
  "Backspace",
  "Delete",
  "ArrowLeft",
  "ArrowRight",
  "ArrowUp",
  "ArrowDown",
  "Home",
  "End",
  "PageUp",
  "PageDown",
  "Control",
  "Shift",
  "Tab",
]);

function isNamedKey(key: string): key is NamedKey {
  return namedKeys.has(key);
}

const motions: Partial<Record<NamedKey, Motion>> = {
  ArrowLeft: "left",
  ArrowRight: "right",
  ArrowUp: "up",
  ArrowDown: "down",
  Home: "home",
  End: "end",
  PageUp: "page-up",
  PageDown: "page-down",
};

/** Maps a DOM `KeyboardEvent.key` value to a logical key. */
export function logicalKeyFromDom(key: string): LogicalKey {
  if (key === " ") {
    return { type: "named", key: "Space" };
  }
  if (isNamedKey(key)) {
    return { type: "named", key };
  }
  // Printable keys report the produced text; named keys are longer words.
  if (Array.from(key).length === 1) {
    return { type: "character", text: key };
  }
  return { type: "unidentified", key };
}

/**
 * Editor actions for one key press. Keys without an editing meaning map to
 * an empty list.
 */
export function actionsForKey(key: LogicalKey): EditorAction[] {
  if (key.type === "character") {
    return Array.from(key.text, (char): EditorAction => ({ type: "insert", text: char }));
  }
  if (key.type === "unidentified") {
    return [];
  }
  switch (key.key) {
    case "Enter":
      return [{ type: "enter" }];
    case "Space":
      return [{ type: "insert", text: " " }];
    case "Backspace":
      return [{ type: "backspace" }];
    case "Delete":
      return [{ type: "delete" }];
    default: {
      const motion = motions[key.key];
      return motion ? [{ type: "motion", motion }] : [];
    }
  }
}
