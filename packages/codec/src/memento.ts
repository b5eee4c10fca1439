import { createLogger, NotSeekableError } from "@treecodec/core";
import { createBinaryChannel, type BinaryChannel } from "./binary-channel.js";
import { ByteBuffer, isSeekable, type ByteSink, type ByteSource } from "./byte-buffer.js";
import { typeNameOf } from "./describable.js";
import type { CodecOptions, Describable, Loadable } from "./types.js";

const log = createLogger("memento");

export type MementoMedium = ByteSink & ByteSource;

/**
 * A value written once through the binary channel, restorable into any
 * number of targets.
 *
 * Capturing leaves the medium positioned after the written bytes; call
 * `reset()` before each `restore()`.
 *
 * ```ts
 * const memento = Memento.capture(document);
 * memento.reset();
 * memento.restore(new Document());
 * ```
 */
export class Memento {
  private constructor(
    private readonly medium: MementoMedium,
    private readonly channel: BinaryChannel,
    /** Medium position at which the captured value starts */
    readonly start: number,
    /** Number of bytes the captured value occupies */
    readonly size: number,
  ) {}

  /** Write `value` into `medium` (a fresh ByteBuffer by default). */
  static capture(
    value: Describable,
    medium: MementoMedium = new ByteBuffer(),
    options: CodecOptions = {},
  ): Memento {
    const channel = createBinaryChannel(options);
    const start = medium.position;
    const size = channel.write(medium, value);
    log.debug(`captured ${typeNameOf(value)} (${size} bytes)`);
    return new Memento(medium, channel, start, size);
  }

  get seekable(): boolean {
    return isSeekable(this.medium);
  }

  /** Seek the medium back to where the captured value starts. */
  reset(): void {
    if (!isSeekable(this.medium)) {
      throw new NotSeekableError("reset memento");
    }
    this.medium.seek(this.start);
  }

  /** Read the captured value into `target` and return it. */
  restore<T extends Loadable>(target: T): T {
    return this.channel.readInto(this.medium, target);
  }

  /** Copy of the captured bytes; only available over a ByteBuffer. */
  toBytes(): Uint8Array {
    if (!(this.medium instanceof ByteBuffer)) {
      throw new NotSeekableError("copy memento bytes");
    }
    return this.medium.toBytes().slice(this.start, this.start + this.size);
  }
}
