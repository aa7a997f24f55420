import type { Vec2 } from "../core/types";
import { ClickClassificationError } from "../shared/errors";

export type ClickHistoryEntry = {
  position: Vec2;
  time: number;
};

export type ClickKind = "single" | "double" | "triple";

const MAX_ENTRIES = 4;
const MAX_DISTANCE = 2.0;
const MAX_INTERVAL_MS = 500;

/**
 * Recent left clicks of one pointer device, newest first. Shared across all
 * editable texts, so callers must feed it from a single ordered input stage.
 */
export class ClickHistory {
  static readonly MAX_ENTRIES = MAX_ENTRIES;
  static readonly MAX_DISTANCE = MAX_DISTANCE;
  static readonly MAX_INTERVAL_MS = MAX_INTERVAL_MS;

  private history: ClickHistoryEntry[] = [];

  constructor(private readonly now: () => number = () => performance.now()) {}

  get entries(): readonly ClickHistoryEntry[] {
    return this.history;
  }

  record(position: Vec2): void {
    // Drop down to the most recent entries, with room for one more.
    while (this.history.length >= MAX_ENTRIES) {
      this.history.pop();
    }
    this.history.unshift({ position: { ...position }, time: this.now() });
  }

  /** Whether the newest `times` clicks are each close in space and time to the next. */
  isNClick(times: number): boolean {
    if (this.history.length < times) {
      return false;
    }
    for (let i = 0; i + 1 < times; i += 1) {
      const newer = this.history[i];
      const older = this.history[i + 1];
      if (newer.time < older.time) {
        throw new ClickClassificationError(
          `Click history is out of order: ${newer.time} recorded after ${older.time}`,
        );
      }
      const distance = Math.hypot(
        newer.position.x - older.position.x,
        newer.position.y - older.position.y,
      );
      if (distance > MAX_DISTANCE) {
        return false;
      }
      if (newer.time - older.time > MAX_INTERVAL_MS) {
        return false;
      }
    }
    return true;
  }

  /** Classifies the most recent click. Call after `record`. */
  classify(): ClickKind {
    if (this.isNClick(3)) {
      return "triple";
    }
    if (this.isNClick(2)) {
      return "double";
    }
    if (this.isNClick(1)) {
      return "single";
    }
    throw new ClickClassificationError("Classified a click with an empty history");
  }
}
