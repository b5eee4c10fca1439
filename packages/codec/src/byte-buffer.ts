import { MalformedStreamError } from "@treecodec/core";

/** Append-only destination of encoded tokens. */
export interface ByteSink {
  write(bytes: Uint8Array): void;
}

/**
 * Sequential source of encoded tokens. `read` returns exactly `length`
 * bytes or fails.
 */
export interface ByteSource {
  read(length: number): Uint8Array;
  /** Offset of the next byte, for error context */
  readonly position: number;
}

/** A medium that can be rewound, as a reusable memento needs. */
export interface SeekableMedium extends ByteSink, ByteSource {
  seek(position: number): void;
}

export function isSeekable(medium: ByteSink | ByteSource): medium is SeekableMedium {
  return "seek" in medium && typeof medium.seek === "function";
}

const INITIAL_CAPACITY = 256;

/**
 * Growable in-process byte buffer with a single read/write position.
 *
 * Writing at a position before the end overwrites; the length only grows.
 */
export class ByteBuffer implements SeekableMedium {
  private bytes: Uint8Array;
  private view: DataView;
  private _length = 0;
  private _position = 0;

  constructor(capacity: number = INITIAL_CAPACITY) {
    this.bytes = new Uint8Array(Math.max(capacity, 16));
    this.view = new DataView(this.bytes.buffer);
  }

  /** A buffer holding a copy of `bytes`, positioned at the start. */
  static from(bytes: Uint8Array): ByteBuffer {
    const buffer = new ByteBuffer(bytes.length);
    buffer.write(bytes);
    buffer.reset();
    return buffer;
  }

  get position(): number {
    return this._position;
  }

  get length(): number {
    return this._length;
  }

  get remaining(): number {
    return this._length - this._position;
  }

  seek(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position > this._length) {
      throw new RangeError(`Cannot seek to ${position}: buffer holds ${this._length} bytes`);
    }
    this._position = position;
  }

  reset(): void {
    this._position = 0;
  }

  write(chunk: Uint8Array): void {
    this.ensureCapacity(this._position + chunk.length);
    this.bytes.set(chunk, this._position);
    this.advance(chunk.length);
  }

  read(length: number): Uint8Array {
    if (length > this.remaining) {
      throw new MalformedStreamError(
        `Unexpected end of stream: needed ${length} bytes, ${this.remaining} left`,
        this._position,
      );
    }
    const out = this.bytes.slice(this._position, this._position + length);
    this._position += length;
    return out;
  }

  /** Copy of every byte written so far, regardless of position. */
  toBytes(): Uint8Array {
    return this.bytes.slice(0, this._length);
  }

  writeUint8(value: number): void {
    this.ensureCapacity(this._position + 1);
    this.view.setUint8(this._position, value);
    this.advance(1);
  }

  writeInt32(value: number): void {
    this.ensureCapacity(this._position + 4);
    this.view.setInt32(this._position, value, true);
    this.advance(4);
  }

  writeFloat64(value: number): void {
    this.ensureCapacity(this._position + 8);
    this.view.setFloat64(this._position, value, true);
    this.advance(8);
  }

  writeBigInt64(value: bigint): void {
    this.ensureCapacity(this._position + 8);
    this.view.setBigInt64(this._position, value, true);
    this.advance(8);
  }

  writeBigUint64(value: bigint): void {
    this.ensureCapacity(this._position + 8);
    this.view.setBigUint64(this._position, value, true);
    this.advance(8);
  }

  /** int32 byte length followed by the bytes. */
  writeBlob(bytes: Uint8Array): void {
    this.writeInt32(bytes.length);
    this.write(bytes);
  }

  /** int32 byte length followed by the UTF-8 bytes. */
  writeString(value: string): void {
    this.writeBlob(new TextEncoder().encode(value));
  }

  private advance(count: number): void {
    this._position += count;
    this._length = Math.max(this._length, this._position);
  }

  private ensureCapacity(required: number): void {
    if (required <= this.bytes.length) return;
    let capacity = this.bytes.length * 2;
    while (capacity < required) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.bytes.subarray(0, this._length));
    this.bytes = grown;
    this.view = new DataView(grown.buffer);
  }
}
