/**
 * Codec Error Types
 *
 * Every failure raised while writing, reading, cloning or restoring a value
 * tree is a `CodecError`. The `code` discriminates the kind; the subclasses
 * carry the position or type context needed to diagnose it.
 */

export type CodecErrorCode =
  | "protocol-version-mismatch"
  | "malformed-stream"
  | "unsupported-type"
  | "ordering-violation"
  | "not-seekable";

/**
 * Base class for all codec failures.
 */
export class CodecError extends Error {
  constructor(
    message: string,
    readonly code: CodecErrorCode,
  ) {
    super(message);
    this.name = "CodecError";
  }
}

/**
 * Thrown when a stream was written with a protocol version this reader does
 * not speak.
 */
export class ProtocolVersionMismatchError extends CodecError {
  constructor(
    readonly found: number,
    readonly expected: number,
  ) {
    super(
      `Unsupported protocol version ${found}: this reader supports version ${expected}`,
      "protocol-version-mismatch",
    );
    this.name = "ProtocolVersionMismatchError";
  }
}

/**
 * Thrown when the token or byte sequence does not have the expected shape:
 * an unexpected token kind, a truncated stream, an unknown tag, a scalar of
 * the wrong type or a list with fewer items than its header announced.
 */
export class MalformedStreamError extends CodecError {
  constructor(
    message: string,
    /** Token index (in-memory) or byte offset (binary) where reading failed */
    readonly position: number,
    /** Type whose `load()` was running, if any */
    readonly typeName?: string,
  ) {
    super(
      typeName === undefined
        ? `${message} (at ${position})`
        : `${message} (at ${position}, while loading ${typeName})`,
      "malformed-stream",
    );
    this.name = "MalformedStreamError";
  }
}

/**
 * Thrown at encode time when a scalar has no registered encoding. Nothing is
 * written for the token carrying it.
 */
export class UnsupportedTypeError extends CodecError {
  constructor(
    readonly valueType: string,
    /** Part name the value was found under */
    readonly path?: string,
  ) {
    super(
      path === undefined
        ? `No scalar encoding for values of type ${valueType}`
        : `No scalar encoding for values of type ${valueType} (part "${path}")`,
      "unsupported-type",
    );
    this.name = "UnsupportedTypeError";
  }
}

/**
 * Thrown when a read call names a part other than the one stored next, i.e.
 * `load()` pulls parts in a different order than `describe()` emitted them.
 */
export class OrderingViolationError extends CodecError {
  constructor(
    readonly expectedName: string,
    readonly storedName: string,
    readonly typeName?: string,
  ) {
    super(
      `Expected part "${expectedName}" but the stream holds "${storedName}"` +
        (typeName === undefined ? "" : ` while loading ${typeName}`),
      "ordering-violation",
    );
    this.name = "OrderingViolationError";
  }
}

/**
 * Thrown when a memento is reset over a medium that cannot seek.
 */
export class NotSeekableError extends CodecError {
  constructor(operation: string) {
    super(`Cannot ${operation}: the underlying medium is not seekable`, "not-seekable");
    this.name = "NotSeekableError";
  }
}

export function isCodecError(error: unknown): error is CodecError {
  return error instanceof CodecError;
}
