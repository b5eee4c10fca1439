/** Protocol version of the token model, written once at the outermost level. */
export const FORMAT_VERSION = 1;

/**
 * A value the scalar codec can write directly. `null` is the null marker,
 * `undefined` the unset marker; arrays are opaque (lists of lists land here).
 */
export type Scalar =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | null
  | undefined
  | readonly Scalar[];

// ============================================================================
// Parts
// ============================================================================

/** One named part of a Describable, classified once by the formatter. */
export type Part =
  | { readonly kind: "scalar"; readonly name: string; readonly value: Scalar }
  | { readonly kind: "nested"; readonly name: string; readonly value: Describable }
  | { readonly kind: "list"; readonly name: string; readonly items: readonly ListItemPart[] };

/** One element of a list part. */
export type ListItemPart =
  | { readonly kind: "scalar"; readonly value: Scalar }
  | { readonly kind: "nested"; readonly value: Describable };

/** Anything `PartFormatter.format` accepts. */
export type FormattableValue = Scalar | Describable | ReadonlyArray<Scalar | Describable>;

export interface PartFormatter {
  format(name: string, value: FormattableValue): Part;
}

// ============================================================================
// Capability contracts
// ============================================================================

/**
 * A value that can enumerate its own named parts.
 *
 * The order of the parts yielded by `describe()` is load-bearing: `load()`
 * must read them back in exactly that order.
 */
export interface Describable {
  /** Layout version of this type; constant per type. */
  readonly schemaVersion: number;
  /** Name written to the object header; defaults to the constructor name. */
  readonly typeName?: string;
  describe(formatter: PartFormatter): Iterable<Part>;
}

/** A Describable that can rebuild its state from a stored version. */
export interface Loadable extends Describable {
  load(reader: PartReader, storedVersion: number): void;
}

export type LoadableType<T extends Loadable = Loadable> = new () => T;

/**
 * Pull-side reader handed to `load()`.
 *
 * Every method consumes exactly one part. The optional `name` is compared
 * with the stored part name when `reader.checkPartNames` is on.
 */
export interface PartReader {
  /** Schema version stored for the object being loaded. */
  readonly storedVersion: number;
  /** Type name stored in the object header. */
  readonly storedTypeName: string;

  readScalar(name?: string): Scalar;
  readString(name?: string): string | null | undefined;
  readNumber(name?: string): number | null | undefined;
  readBoolean(name?: string): boolean | null | undefined;
  readBigInt(name?: string): bigint | null | undefined;
  readDate(name?: string): Date | null | undefined;
  readBytes(name?: string): Uint8Array | null | undefined;

  /** Read a nested object; `undefined` when a null or unset value was stored. */
  readObject<T extends Loadable>(type: LoadableType<T>, name?: string): T | undefined;
  /** Read a nested object whose type is resolved from the stored type name. */
  readObject(name?: string): Loadable | undefined;

  readList<T extends Loadable>(type: LoadableType<T>, name?: string): T[];
  readList(name?: string): Loadable[];
  readScalarList(name?: string): Scalar[];

  /**
   * Read a list whose items may be nested objects or scalars (a `null` hole
   * in an object list, for instance), keeping each item as stored.
   */
  readMixedList<T extends Loadable>(type: LoadableType<T>, name?: string): Array<T | Scalar>;
  readMixedList(name?: string): Array<Loadable | Scalar>;

  /** Consume the next part, whatever its shape, without interpreting it. */
  skip(): void;
}

// ============================================================================
// Token model
// ============================================================================

export type Token =
  | { readonly kind: "format-version"; readonly version: number }
  | {
      readonly kind: "object-header";
      readonly schemaVersion: number;
      readonly typeName: string;
    }
  | { readonly kind: "property"; readonly name: string; readonly recurse: true }
  | {
      readonly kind: "property";
      readonly name: string;
      readonly recurse: false;
      readonly value: Scalar;
    }
  | { readonly kind: "list-header"; readonly name: string; readonly length: number }
  | { readonly kind: "list-item"; readonly recurse: true }
  | { readonly kind: "list-item"; readonly recurse: false; readonly value: Scalar }
  | { readonly kind: "object-footer" };

export type TokenKind = Token["kind"];

export type TokenOf<K extends TokenKind> = Extract<Token, { readonly kind: K }>;

/**
 * Lazy token sequence as produced by traversal: nested objects and lists
 * appear inline as their own sub-sequences.
 */
export type TokenStream = Iterable<Token | TokenStream>;

/** Pull side of a channel. `next()` fails at the end of the stream. */
export interface TokenSource {
  next(): Token;
  /** Token index or byte offset, for error context */
  readonly position: number;
}

/** Per-call overrides of the `reader.*` configuration. */
export interface CodecOptions {
  /** Resolves stored type names for untyped `readObject()`/`readList()` */
  registry?: TypeResolver;
  checkPartNames?: boolean;
  ignoreUnreadParts?: boolean;
}

/** Maps a stored type name to a fresh instance. */
export interface TypeResolver {
  create(typeName: string): Loadable | undefined;
}
