/**
 * Traversal Engine
 *
 * `emit` walks a Describable depth-first and produces its tokens lazily;
 * `absorb` pulls tokens from any `TokenSource` and rebuilds a Loadable by
 * handing it a `PartReader`. Both channels are thin adapters around these
 * two functions.
 */

import {
  config,
  createLogger,
  MalformedStreamError,
  OrderingViolationError,
  ProtocolVersionMismatchError,
} from "@treecodec/core";
import { partFormatter, typeNameOf } from "./describable.js";
import {
  FORMAT_VERSION,
  type CodecOptions,
  type Describable,
  type ListItemPart,
  type Loadable,
  type LoadableType,
  type Part,
  type PartReader,
  type Scalar,
  type Token,
  type TokenKind,
  type TokenOf,
  type TokenSource,
  type TokenStream,
  type TypeResolver,
} from "./types.js";

const log = createLogger("traversal");

// ============================================================================
// Emit
// ============================================================================

/**
 * Lazy token stream for `value`: the protocol version, then the object.
 * Nested objects and lists appear as nested sub-sequences.
 */
export function* emit(value: Describable): Generator<Token | TokenStream, void, undefined> {
  yield { kind: "format-version", version: FORMAT_VERSION };
  yield* emitObject(value);
}

function* emitObject(value: Describable): Generator<Token | TokenStream, void, undefined> {
  yield { kind: "object-header", schemaVersion: value.schemaVersion, typeName: typeNameOf(value) };
  for (const part of value.describe(partFormatter)) {
    yield* emitPart(part);
  }
  yield { kind: "object-footer" };
}

function* emitPart(part: Part): Generator<Token | TokenStream, void, undefined> {
  switch (part.kind) {
    case "scalar":
      yield { kind: "property", name: part.name, recurse: false, value: part.value };
      break;
    case "nested":
      yield { kind: "property", name: part.name, recurse: true };
      yield emitObject(part.value);
      break;
    case "list":
      yield emitList(part.name, part.items);
      break;
  }
}

function* emitList(
  name: string,
  items: readonly ListItemPart[],
): Generator<Token | TokenStream, void, undefined> {
  yield { kind: "list-header", name, length: items.length };
  for (const item of items) {
    if (item.kind === "nested") {
      yield { kind: "list-item", recurse: true };
      yield emitObject(item.value);
    } else {
      yield { kind: "list-item", recurse: false, value: item.value };
    }
  }
}

// ============================================================================
// Absorb
// ============================================================================

interface ReadContext {
  readonly source: TokenSource;
  readonly registry?: TypeResolver;
  readonly checkPartNames: boolean;
  readonly ignoreUnreadParts: boolean;
}

function createContext(source: TokenSource, options: CodecOptions): ReadContext {
  return {
    source,
    registry: options.registry,
    checkPartNames: options.checkPartNames ?? config.getBoolean("reader.checkPartNames", true),
    ignoreUnreadParts:
      options.ignoreUnreadParts ?? config.getBoolean("reader.ignoreUnreadParts", false),
  };
}

function isKind<K extends TokenKind>(token: Token, kind: K): token is TokenOf<K> {
  return token.kind === kind;
}

function expectToken<K extends TokenKind>(
  source: TokenSource,
  kind: K,
  typeName?: string,
): TokenOf<K> {
  const token = source.next();
  if (!isKind(token, kind)) {
    throw new MalformedStreamError(
      `Expected ${kind} token, found ${token.kind}`,
      source.position,
      typeName,
    );
  }
  return token;
}

/** Read a complete stream into a fresh instance of `type`. */
export function absorb<T extends Loadable>(
  source: TokenSource,
  type: LoadableType<T>,
  options: CodecOptions = {},
): T {
  return absorbWith(source, () => new type(), options);
}

/** Read a complete stream into an existing instance. */
export function absorbInto<T extends Loadable>(
  source: TokenSource,
  target: T,
  options: CodecOptions = {},
): T {
  return absorbWith(source, () => target, options);
}

function absorbWith<T extends Loadable>(
  source: TokenSource,
  create: () => T,
  options: CodecOptions,
): T {
  const { version } = expectToken(source, "format-version");
  if (version !== FORMAT_VERSION) {
    throw new ProtocolVersionMismatchError(version, FORMAT_VERSION);
  }
  return loadObject(createContext(source, options), create);
}

function loadObject<T extends Loadable>(
  ctx: ReadContext,
  create: (header: TokenOf<"object-header">) => T,
  enclosingType?: string,
): T {
  const header = expectToken(ctx.source, "object-header", enclosingType);
  const instance = create(header);

  if (header.schemaVersion !== instance.schemaVersion) {
    log.debug(
      `loading ${header.typeName} v${header.schemaVersion} into ` +
        `${typeNameOf(instance)} v${instance.schemaVersion}`,
    );
  }

  const reader = new TokenReader(ctx, header);
  instance.load(reader, header.schemaVersion);
  reader.finish();
  return instance;
}

function resolveFromRegistry(ctx: ReadContext, header: TokenOf<"object-header">): Loadable {
  const instance = ctx.registry?.create(header.typeName);
  if (instance === undefined) {
    throw new MalformedStreamError(
      `No type registered for stored type name "${header.typeName}"`,
      ctx.source.position,
      header.typeName,
    );
  }
  return instance;
}

/** Consume the rest of a part whose first token has already been read. */
function skipFrom(ctx: ReadContext, token: Token, typeName: string): void {
  switch (token.kind) {
    case "property":
      if (token.recurse) skipObject(ctx, typeName);
      return;
    case "list-header":
      for (let i = 0; i < token.length; i++) {
        const item = expectToken(ctx.source, "list-item", typeName);
        if (item.recurse) skipObject(ctx, typeName);
      }
      return;
    default:
      throw new MalformedStreamError(
        `Expected property or list-header token, found ${token.kind}`,
        ctx.source.position,
        typeName,
      );
  }
}

function skipObject(ctx: ReadContext, enclosingType: string): void {
  const header = expectToken(ctx.source, "object-header", enclosingType);
  for (let token = ctx.source.next(); token.kind !== "object-footer"; token = ctx.source.next()) {
    skipFrom(ctx, token, header.typeName);
  }
}

type ScalarGuard<T extends Scalar> = (value: Scalar) => value is T;

const isString: ScalarGuard<string> = (v): v is string => typeof v === "string";
const isNumber: ScalarGuard<number> = (v): v is number => typeof v === "number";
const isBoolean: ScalarGuard<boolean> = (v): v is boolean => typeof v === "boolean";
const isBigInt: ScalarGuard<bigint> = (v): v is bigint => typeof v === "bigint";
const isDate: ScalarGuard<Date> = (v): v is Date => v instanceof Date;
const isBytes: ScalarGuard<Uint8Array> = (v): v is Uint8Array => v instanceof Uint8Array;

/**
 * The `PartReader` handed to one object's `load()`. Each read pulls the
 * next property or list from the shared source.
 */
class TokenReader implements PartReader {
  readonly storedVersion: number;
  readonly storedTypeName: string;

  constructor(
    private readonly ctx: ReadContext,
    header: TokenOf<"object-header">,
  ) {
    this.storedVersion = header.schemaVersion;
    this.storedTypeName = header.typeName;
  }

  readScalar(name?: string): Scalar {
    const property = this.nextProperty(name);
    if (property.recurse) {
      throw this.malformed(`Property "${property.name}" holds a nested object, not a scalar`);
    }
    return property.value;
  }

  readString(name?: string): string | null | undefined {
    return this.readTyped(name, "string", isString);
  }

  readNumber(name?: string): number | null | undefined {
    return this.readTyped(name, "number", isNumber);
  }

  readBoolean(name?: string): boolean | null | undefined {
    return this.readTyped(name, "boolean", isBoolean);
  }

  readBigInt(name?: string): bigint | null | undefined {
    return this.readTyped(name, "bigint", isBigInt);
  }

  readDate(name?: string): Date | null | undefined {
    return this.readTyped(name, "Date", isDate);
  }

  readBytes(name?: string): Uint8Array | null | undefined {
    return this.readTyped(name, "Uint8Array", isBytes);
  }

  readObject<T extends Loadable>(type: LoadableType<T>, name?: string): T | undefined;
  readObject(name?: string): Loadable | undefined;
  readObject<T extends Loadable>(
    typeOrName?: LoadableType<T> | string,
    name?: string,
  ): T | Loadable | undefined {
    const type = typeof typeOrName === "function" ? typeOrName : undefined;
    const partName = typeof typeOrName === "string" ? typeOrName : name;

    const property = this.nextProperty(partName);
    if (!property.recurse) {
      if (property.value === null || property.value === undefined) return undefined;
      throw this.malformed(`Property "${property.name}" holds a scalar, expected a nested object`);
    }
    return type ? this.loadNested(type) : this.loadRegistered();
  }

  readList<T extends Loadable>(type: LoadableType<T>, name?: string): T[];
  readList(name?: string): Loadable[];
  readList<T extends Loadable>(
    typeOrName?: LoadableType<T> | string,
    name?: string,
  ): T[] | Loadable[] {
    const type = typeof typeOrName === "function" ? typeOrName : undefined;
    const header = this.nextList(typeof typeOrName === "string" ? typeOrName : name);

    if (type) {
      const items: T[] = [];
      for (let i = 0; i < header.length; i++) {
        this.nextNestedItem(header, i);
        items.push(this.loadNested(type));
      }
      return items;
    }

    const items: Loadable[] = [];
    for (let i = 0; i < header.length; i++) {
      this.nextNestedItem(header, i);
      items.push(this.loadRegistered());
    }
    return items;
  }

  readScalarList(name?: string): Scalar[] {
    const header = this.nextList(name);
    const items: Scalar[] = [];
    for (let i = 0; i < header.length; i++) {
      const item = this.nextItem();
      if (item.recurse) {
        throw this.malformed(
          `Item ${i} of list "${header.name}" holds a nested object, not a scalar`,
        );
      }
      items.push(item.value);
    }
    return items;
  }

  readMixedList<T extends Loadable>(type: LoadableType<T>, name?: string): Array<T | Scalar>;
  readMixedList(name?: string): Array<Loadable | Scalar>;
  readMixedList<T extends Loadable>(
    typeOrName?: LoadableType<T> | string,
    name?: string,
  ): Array<Loadable | Scalar> {
    const type = typeof typeOrName === "function" ? typeOrName : undefined;
    const header = this.nextList(typeof typeOrName === "string" ? typeOrName : name);

    const items: Array<Loadable | Scalar> = [];
    for (let i = 0; i < header.length; i++) {
      const item = this.nextItem();
      if (!item.recurse) {
        items.push(item.value);
      } else {
        items.push(type ? this.loadNested(type) : this.loadRegistered());
      }
    }
    return items;
  }

  skip(): void {
    const token = this.ctx.source.next();
    log.debug(`skipping ${token.kind} of ${this.storedTypeName} v${this.storedVersion}`);
    skipFrom(this.ctx, token, this.storedTypeName);
  }

  /** Consume the footer, skipping parts `load()` left unread when allowed. */
  finish(): void {
    const { source } = this.ctx;
    for (let token = source.next(); token.kind !== "object-footer"; token = source.next()) {
      if (!this.ctx.ignoreUnreadParts) {
        throw this.malformed(`Expected object-footer token, found ${token.kind}`);
      }
      log.debug(`ignoring unread ${token.kind} of ${this.storedTypeName}`);
      skipFrom(this.ctx, token, this.storedTypeName);
    }
  }

  private readTyped<T extends Scalar>(
    name: string | undefined,
    expected: string,
    guard: ScalarGuard<T>,
  ): T | null | undefined {
    const value = this.readScalar(name);
    if (value === null || value === undefined || guard(value)) return value;
    throw this.malformed(`Stored scalar is not a ${expected}`);
  }

  private nextProperty(name: string | undefined): TokenOf<"property"> {
    const property = expectToken(this.ctx.source, "property", this.storedTypeName);
    this.checkName(name, property.name);
    return property;
  }

  private nextList(name: string | undefined): TokenOf<"list-header"> {
    const header = expectToken(this.ctx.source, "list-header", this.storedTypeName);
    this.checkName(name, header.name);
    return header;
  }

  private nextItem(): TokenOf<"list-item"> {
    return expectToken(this.ctx.source, "list-item", this.storedTypeName);
  }

  private nextNestedItem(header: TokenOf<"list-header">, index: number): void {
    if (!this.nextItem().recurse) {
      throw this.malformed(
        `Item ${index} of list "${header.name}" holds a scalar, expected a nested object`,
      );
    }
  }

  private loadNested<T extends Loadable>(type: LoadableType<T>): T {
    return loadObject(this.ctx, () => new type(), this.storedTypeName);
  }

  private loadRegistered(): Loadable {
    return loadObject(
      this.ctx,
      (header) => resolveFromRegistry(this.ctx, header),
      this.storedTypeName,
    );
  }

  private checkName(expected: string | undefined, stored: string): void {
    if (expected !== undefined && this.ctx.checkPartNames && expected !== stored) {
      throw new OrderingViolationError(expected, stored, this.storedTypeName);
    }
  }

  private malformed(message: string): MalformedStreamError {
    return new MalformedStreamError(message, this.ctx.source.position, this.storedTypeName);
  }
}
