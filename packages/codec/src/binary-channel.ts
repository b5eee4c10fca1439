import { createLogger, MalformedStreamError } from "@treecodec/core";
import { ByteBuffer, type ByteSink, type ByteSource } from "./byte-buffer.js";
import { flatten } from "./cursor.js";
import { typeNameOf } from "./describable.js";
import { classifyScalar, type ClassifiedScalar } from "./scalar.js";
import { absorb, absorbInto, emit } from "./traversal.js";
import type {
  CodecOptions,
  Describable,
  Loadable,
  LoadableType,
  Scalar,
  Token,
  TokenKind,
  TokenSource,
} from "./types.js";

const log = createLogger("binary");

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** One tag byte in front of every token. */
const TOKEN_TAG = {
  "format-version": 0x01,
  "object-header": 0x02,
  property: 0x03,
  "list-header": 0x04,
  "list-item": 0x05,
  "object-footer": 0x06,
} as const satisfies Record<TokenKind, number>;

/** One tag byte in front of every scalar. */
const SCALAR_TAG = {
  null: 0x00,
  undefined: 0x01,
  false: 0x02,
  true: 0x03,
  int32: 0x04,
  float64: 0x05,
  int64: 0x06,
  uint64: 0x07,
  string: 0x08,
  bytes: 0x09,
  array: 0x0a,
  date: 0x0b,
} as const;

// ============================================================================
// Encoding
// ============================================================================

function writeScalar(out: ByteBuffer, scalar: ClassifiedScalar): void {
  switch (scalar.kind) {
    case "null":
      out.writeUint8(SCALAR_TAG.null);
      break;
    case "undefined":
      out.writeUint8(SCALAR_TAG.undefined);
      break;
    case "boolean":
      out.writeUint8(scalar.value ? SCALAR_TAG.true : SCALAR_TAG.false);
      break;
    case "int32":
      out.writeUint8(SCALAR_TAG.int32);
      out.writeInt32(scalar.value);
      break;
    case "float64":
      out.writeUint8(SCALAR_TAG.float64);
      out.writeFloat64(scalar.value);
      break;
    case "int64":
      out.writeUint8(SCALAR_TAG.int64);
      out.writeBigInt64(scalar.value);
      break;
    case "uint64":
      out.writeUint8(SCALAR_TAG.uint64);
      out.writeBigUint64(scalar.value);
      break;
    case "string":
      out.writeUint8(SCALAR_TAG.string);
      out.writeString(scalar.value);
      break;
    case "bytes":
      out.writeUint8(SCALAR_TAG.bytes);
      out.writeBlob(scalar.value);
      break;
    case "date":
      out.writeUint8(SCALAR_TAG.date);
      out.writeFloat64(scalar.value.getTime());
      break;
    case "array":
      out.writeUint8(SCALAR_TAG.array);
      out.writeInt32(scalar.items.length);
      for (const item of scalar.items) {
        writeScalar(out, item);
      }
      break;
  }
}

/**
 * Encode one token. The scalar it carries is classified before anything is
 * written, so an unsupported value yields no bytes at all.
 *
 * @param path part name reported when the scalar has no encoding
 */
export function encodeToken(token: Token, path?: string): Uint8Array {
  const out = new ByteBuffer(32);
  out.writeUint8(TOKEN_TAG[token.kind]);

  switch (token.kind) {
    case "format-version":
      out.writeInt32(token.version);
      break;
    case "object-header":
      out.writeInt32(token.schemaVersion);
      out.writeString(token.typeName);
      break;
    case "property": {
      out.writeString(token.name);
      if (token.recurse) {
        out.writeUint8(1);
      } else {
        const scalar = classifyScalar(token.value, token.name);
        out.writeUint8(0);
        writeScalar(out, scalar);
      }
      break;
    }
    case "list-header":
      out.writeString(token.name);
      out.writeInt32(token.length);
      break;
    case "list-item":
      if (token.recurse) {
        out.writeUint8(1);
      } else {
        const scalar = classifyScalar(token.value, path);
        out.writeUint8(0);
        writeScalar(out, scalar);
      }
      break;
    case "object-footer":
      break;
  }

  return out.toBytes();
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decodes tokens one at a time from a byte source. Nothing is read ahead:
 * a truncated or corrupt stream fails at the token where the damage is.
 */
export class BinaryTokenSource implements TokenSource {
  private decoded = 0;

  constructor(private readonly source: ByteSource) {}

  get position(): number {
    return this.source.position;
  }

  /** Number of tokens decoded so far. */
  get tokenCount(): number {
    return this.decoded;
  }

  next(): Token {
    const start = this.position;
    const tag = this.readUint8();
    const token = this.decodeToken(tag, start);
    this.decoded++;
    return token;
  }

  private decodeToken(tag: number, start: number): Token {
    switch (tag) {
      case TOKEN_TAG["format-version"]:
        return { kind: "format-version", version: this.readInt32() };
      case TOKEN_TAG["object-header"]: {
        const schemaVersion = this.readInt32();
        return { kind: "object-header", schemaVersion, typeName: this.readString() };
      }
      case TOKEN_TAG.property: {
        const name = this.readString();
        return this.readRecurseFlag()
          ? { kind: "property", name, recurse: true }
          : { kind: "property", name, recurse: false, value: this.readScalar() };
      }
      case TOKEN_TAG["list-header"]: {
        const name = this.readString();
        return { kind: "list-header", name, length: this.readLength() };
      }
      case TOKEN_TAG["list-item"]:
        return this.readRecurseFlag()
          ? { kind: "list-item", recurse: true }
          : { kind: "list-item", recurse: false, value: this.readScalar() };
      case TOKEN_TAG["object-footer"]:
        return { kind: "object-footer" };
      default:
        throw new MalformedStreamError(`Unknown token tag 0x${tag.toString(16)}`, start);
    }
  }

  private readScalar(): Scalar {
    const start = this.position;
    const tag = this.readUint8();
    switch (tag) {
      case SCALAR_TAG.null:
        return null;
      case SCALAR_TAG.undefined:
        return undefined;
      case SCALAR_TAG.false:
        return false;
      case SCALAR_TAG.true:
        return true;
      case SCALAR_TAG.int32:
        return this.readInt32();
      case SCALAR_TAG.float64:
        return this.view(8).getFloat64(0, true);
      case SCALAR_TAG.int64:
        return this.view(8).getBigInt64(0, true);
      case SCALAR_TAG.uint64:
        return this.view(8).getBigUint64(0, true);
      case SCALAR_TAG.string:
        return this.readString();
      case SCALAR_TAG.bytes:
        return this.readExactly(this.readLength());
      case SCALAR_TAG.date:
        return new Date(this.view(8).getFloat64(0, true));
      case SCALAR_TAG.array: {
        const count = this.readLength();
        const items: Scalar[] = [];
        for (let i = 0; i < count; i++) {
          items.push(this.readScalar());
        }
        return items;
      }
      default:
        throw new MalformedStreamError(`Unknown scalar tag 0x${tag.toString(16)}`, start);
    }
  }

  private readRecurseFlag(): boolean {
    const start = this.position;
    const flag = this.readUint8();
    if (flag > 1) {
      throw new MalformedStreamError(`Invalid recurse flag ${flag}`, start);
    }
    return flag === 1;
  }

  private readExactly(length: number): Uint8Array {
    const start = this.position;
    const bytes = this.source.read(length);
    if (bytes.length !== length) {
      throw new MalformedStreamError(
        `Unexpected end of stream: needed ${length} bytes, got ${bytes.length}`,
        start,
      );
    }
    return bytes;
  }

  private view(length: number): DataView {
    const bytes = this.readExactly(length);
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  private readUint8(): number {
    return this.view(1).getUint8(0);
  }

  private readInt32(): number {
    return this.view(4).getInt32(0, true);
  }

  private readLength(): number {
    const start = this.position;
    const length = this.readInt32();
    if (length < 0) {
      throw new MalformedStreamError(`Negative length ${length}`, start);
    }
    return length;
  }

  private readString(): string {
    const start = this.position;
    const bytes = this.readExactly(this.readLength());
    try {
      return utf8.decode(bytes);
    } catch (error) {
      throw new MalformedStreamError(
        `Invalid UTF-8 string: ${error instanceof Error ? error.message : String(error)}`,
        start,
      );
    }
  }
}

// ============================================================================
// Channel
// ============================================================================

/** Writes and reads value trees against a byte medium. */
export interface BinaryChannel {
  /** Encode the full token stream of `value`; returns the number of bytes written. */
  write(sink: ByteSink, value: Describable): number;
  read<T extends Loadable>(source: ByteSource, type: LoadableType<T>): T;
  readInto<T extends Loadable>(source: ByteSource, target: T): T;
}

/** Create a binary channel; `options` apply to every read. */
export function createBinaryChannel(options: CodecOptions = {}): BinaryChannel {
  return {
    write(sink: ByteSink, value: Describable): number {
      let tokens = 0;
      let bytes = 0;
      let listName: string | undefined;

      for (const token of flatten(emit(value))) {
        if (token.kind === "list-header") listName = token.name;
        const encoded = encodeToken(token, listName);
        sink.write(encoded);
        tokens++;
        bytes += encoded.length;
      }

      log.debug(`wrote ${typeNameOf(value)}: ${tokens} tokens, ${bytes} bytes`);
      return bytes;
    },

    read<T extends Loadable>(source: ByteSource, type: LoadableType<T>): T {
      const tokens = new BinaryTokenSource(source);
      const result = absorb(tokens, type, options);
      log.debug(`read ${typeNameOf(result)}: ${tokens.tokenCount} tokens`);
      return result;
    },

    readInto<T extends Loadable>(source: ByteSource, target: T): T {
      const tokens = new BinaryTokenSource(source);
      absorbInto(tokens, target, options);
      log.debug(`read into ${typeNameOf(target)}: ${tokens.tokenCount} tokens`);
      return target;
    },
  };
}
