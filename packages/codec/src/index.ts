/**
 * @treecodec/codec: version-tolerant object-tree codec.
 *
 * A type describes its parts once; the same description drives binary
 * persistence, deep cloning, reusable mementos and text rendering. Each
 * nested object carries its own schema version, so every type can evolve
 * its layout independently.
 *
 * @packageDocumentation
 */

export {
  FORMAT_VERSION,
  type Scalar,
  type Part,
  type ListItemPart,
  type FormattableValue,
  type PartFormatter,
  type Describable,
  type Loadable,
  type LoadableType,
  type PartReader,
  type Token,
  type TokenKind,
  type TokenOf,
  type TokenStream,
  type TokenSource,
  type CodecOptions,
  type TypeResolver,
} from "./types.js";

export { partFormatter, isDescribable, isLoadable, typeNameOf } from "./describable.js";

export {
  classifyScalar,
  copyScalar,
  scalarText,
  isScalarList,
  type ClassifiedScalar,
} from "./scalar.js";

export { TypeRegistry, createTypeRegistry, type LoadableFactory } from "./type-registry.js";

export { emit, absorb, absorbInto } from "./traversal.js";

export { TokenCursor, flatten } from "./cursor.js";

export {
  ByteBuffer,
  isSeekable,
  type ByteSink,
  type ByteSource,
  type SeekableMedium,
} from "./byte-buffer.js";

export {
  createBinaryChannel,
  encodeToken,
  BinaryTokenSource,
  type BinaryChannel,
} from "./binary-channel.js";

export { createMemoryChannel, Snapshot, type MemoryChannel } from "./memory-channel.js";

export { render, renderTo, type TextSink, type RenderOptions } from "./text-renderer.js";

export { Memento, type MementoMedium } from "./memento.js";

export {
  persist,
  restore,
  restoreInto,
  toBytes,
  fromBytes,
  fromBytesInto,
  clone,
  cloneInto,
  snapshot,
} from "./operations.js";

export {
  CodecError,
  ProtocolVersionMismatchError,
  MalformedStreamError,
  UnsupportedTypeError,
  OrderingViolationError,
  NotSeekableError,
  isCodecError,
  type CodecErrorCode,
} from "@treecodec/core";
