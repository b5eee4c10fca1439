import { createBinaryChannel } from "./binary-channel.js";
import { ByteBuffer, type ByteSink, type ByteSource } from "./byte-buffer.js";
import { Memento, type MementoMedium } from "./memento.js";
import { typeNameOf } from "./describable.js";
import { createMemoryChannel } from "./memory-channel.js";
import type { CodecOptions, Describable, Loadable, LoadableType } from "./types.js";

/** Write the full token stream of `value` to `sink`. */
export function persist(value: Describable, sink: ByteSink): void {
  createBinaryChannel().write(sink, value);
}

/** Read a value of `type` from `source`. */
export function restore<T extends Loadable>(
  source: ByteSource,
  type: LoadableType<T>,
  options?: CodecOptions,
): T {
  return createBinaryChannel(options).read(source, type);
}

/** Read the value stored in `source` into an existing instance. */
export function restoreInto<T extends Loadable>(
  source: ByteSource,
  target: T,
  options?: CodecOptions,
): T {
  return createBinaryChannel(options).readInto(source, target);
}

export function toBytes(value: Describable): Uint8Array {
  const buffer = new ByteBuffer();
  persist(value, buffer);
  return buffer.toBytes();
}

export function fromBytes<T extends Loadable>(
  bytes: Uint8Array,
  type: LoadableType<T>,
  options?: CodecOptions,
): T {
  return restore(ByteBuffer.from(bytes), type, options);
}

export function fromBytesInto<T extends Loadable>(
  bytes: Uint8Array,
  target: T,
  options?: CodecOptions,
): T {
  return restoreInto(ByteBuffer.from(bytes), target, options);
}

/**
 * Deep copy of `value` as a fresh instance, without going through bytes.
 *
 * The copy is built with `type` when given, otherwise with the constructor of
 * `value`.
 */
export function clone<T extends Loadable>(
  value: T,
  type?: LoadableType<T>,
  options?: CodecOptions,
): T {
  return cloneInto(value, new (type ?? constructorOf(value))(), options);
}

function constructorOf<T extends Loadable>(value: T): LoadableType<T> {
  const ctor: unknown = value.constructor;
  if (ctor === Object || !isConstructorOf(ctor, value)) {
    throw new TypeError(`Cannot clone ${typeNameOf(value)} without its type`);
  }
  return ctor;
}

function isConstructorOf<T extends Loadable>(ctor: unknown, value: T): ctor is LoadableType<T> {
  return typeof ctor === "function" && ctor === value.constructor;
}

/** Deep copy `value` into `target`. */
export function cloneInto<T extends Loadable>(
  value: Describable,
  target: T,
  options?: CodecOptions,
): T {
  const channel = createMemoryChannel(options);
  return channel.restore(channel.capture(value), target);
}

/** Capture `value` as a reusable memento. */
export function snapshot(
  value: Describable,
  medium?: MementoMedium,
  options?: CodecOptions,
): Memento {
  return Memento.capture(value, medium, options);
}
