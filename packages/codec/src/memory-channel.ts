import { createLogger } from "@treecodec/core";
import { TokenCursor } from "./cursor.js";
import { typeNameOf } from "./describable.js";
import { copyScalar } from "./scalar.js";
import { absorbInto, emit } from "./traversal.js";
import type { CodecOptions, Describable, Loadable, Token, TokenSource } from "./types.js";

const log = createLogger("memory");

/**
 * A captured value, resumable one token at a time.
 *
 * Capturing does not walk the tree: tokens are produced from the live
 * source value as the restoring side pulls them, so a snapshot is meant to
 * be restored right away and only once.
 */
export class Snapshot implements TokenSource {
  private readonly cursor: TokenCursor;
  private lastList: string | undefined;

  constructor(readonly source: Describable) {
    this.cursor = new TokenCursor(emit(source));
  }

  get position(): number {
    return this.cursor.position;
  }

  /** Number of nesting levels currently open. */
  get depth(): number {
    return this.cursor.depth;
  }

  get consumed(): boolean {
    return this.cursor.exhausted;
  }

  /**
   * Next token, with any mutable scalar copied so the restored value shares
   * nothing with the source.
   */
  next(): Token {
    const token = this.cursor.next();
    switch (token.kind) {
      case "list-header":
        this.lastList = token.name;
        return token;
      case "property":
        return token.recurse ? token : { ...token, value: copyScalar(token.value, token.name) };
      case "list-item":
        return token.recurse ? token : { ...token, value: copyScalar(token.value, this.lastList) };
      default:
        return token;
    }
  }
}

/** Deep copies value trees without an intermediate byte buffer. */
export interface MemoryChannel {
  capture(value: Describable): Snapshot;
  restore<T extends Loadable>(snapshot: Snapshot, target: T): T;
}

export function createMemoryChannel(options: CodecOptions = {}): MemoryChannel {
  return {
    capture(value: Describable): Snapshot {
      return new Snapshot(value);
    },

    restore<T extends Loadable>(snapshot: Snapshot, target: T): T {
      absorbInto(snapshot, target, options);
      log.debug(
        `restored ${typeNameOf(snapshot.source)} into ${typeNameOf(target)}: ` +
          `${snapshot.position} tokens`,
      );
      return target;
    },
  };
}
