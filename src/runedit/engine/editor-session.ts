import type { LayoutEngine } from "../core/layout";
import type { TextBuffer } from "../core/text-buffer";
import type { Cursor, Selection, SelectionBounds } from "../core/types";
import { SessionConflictError } from "../shared/errors";
import { Editor, type EditorAction } from "./editor";

/**
 * Cursor and selection of one editable text. Outlives edit sessions; lives
 * and dies with the text it belongs to.
 */
export type EditorState = {
  cursor: Cursor | null;
  selection: Selection;
  selectionBounds: SelectionBounds | null;
  /** Remembered x of the last up or down motion, carried between sessions. */
  goalX: number | null;
};

export function createEditorState(): EditorState {
  return {
    cursor: null,
    selection: { type: "none" },
    selectionBounds: null,
    goalX: null,
  };
}

const openSessions = new WeakSet<TextBuffer>();

function clampSelection(buffer: TextBuffer, selection: Selection): Selection {
  if (selection.type === "none") {
    return selection;
  }
  return { type: selection.type, anchor: buffer.clampCursor(selection.anchor) };
}

/**
 * A transient editor seeded from an `EditorState`. Prefer
 * `withEditorSession`, which commits on every exit path.
 */
export class EditorSession {
  private open = true;

  private constructor(
    private readonly editor: Editor,
    private readonly state: EditorState,
    private readonly layout: LayoutEngine,
  ) {}

  static begin(
    state: EditorState,
    buffer: TextBuffer,
    layout: LayoutEngine,
  ): EditorSession {
    if (openSessions.has(buffer)) {
      throw new SessionConflictError(
        "An edit session is already open on this buffer",
      );
    }
    const editor = new Editor(buffer);
    if (state.cursor) {
      // The buffer may have changed since the state was committed.
      editor.setCursor(buffer.clampCursor(state.cursor));
      editor.setSelection(clampSelection(buffer, state.selection));
      editor.setGoalX(state.goalX);
    }
    openSessions.add(buffer);
    return new EditorSession(editor, state, layout);
  }

  get isOpen(): boolean {
    return this.open;
  }

  cursor(): Cursor {
    return this.editor.cursor();
  }

  selection(): Selection {
    return this.editor.selection();
  }

  apply(action: EditorAction): void {
    if (!this.open) {
      throw new SessionConflictError("Cannot apply an action to a committed session");
    }
    this.editor.action(this.layout, action);
  }

  /** Copies cursor, selection and bounds back into the state and closes the session. */
  commit(): void {
    this.state.cursor = this.editor.cursor();
    this.state.selection = this.editor.selection();
    this.state.selectionBounds = this.editor.selectionBounds();
    this.state.goalX = this.editor.goalX();
    if (this.open) {
      openSessions.delete(this.editor.buffer);
      this.open = false;
    }
  }
}

export function withEditorSession<T>(
  state: EditorState,
  buffer: TextBuffer,
  layout: LayoutEngine,
  fn: (session: EditorSession) => T,
): T {
  const session = EditorSession.begin(state, buffer, layout);
  try {
    return fn(session);
  } finally {
    session.commit();
  }
}
