/** A styled span that overlaps another, is empty, or runs outside its line. */
export class SpanRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpanRangeError";
  }
}

/** A cursor that points at a missing line or past the end of its line. */
export class CursorRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CursorRangeError";
  }
}

/** A hit-testable buffer without a fixed width and height. */
export class BufferSizeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BufferSizeError";
  }
}

export class ClickClassificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ClickClassificationError";
  }
}

export class SessionConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionConflictError";
  }
}
