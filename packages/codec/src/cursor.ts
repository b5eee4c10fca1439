import { MalformedStreamError } from "@treecodec/core";
import type { Token, TokenSource, TokenStream } from "./types.js";

function isTokenStream(element: Token | TokenStream): element is TokenStream {
  return Symbol.iterator in element;
}

/**
 * Pulls tokens out of a nested `TokenStream` one at a time.
 *
 * Keeps an explicit stack with one iterator per open nesting level instead
 * of recursing: an exhausted iterator is popped and its parent resumed, a
 * nested sub-sequence is pushed and pulled from next. Stack depth follows
 * the tree depth; the call stack does not.
 */
export class TokenCursor implements TokenSource {
  private readonly stack: Iterator<Token | TokenStream>[] = [];
  private pulled = 0;

  constructor(stream: TokenStream) {
    this.stack.push(stream[Symbol.iterator]());
  }

  /** Number of tokens handed out so far. */
  get position(): number {
    return this.pulled;
  }

  /** Number of currently open nesting levels. */
  get depth(): number {
    return this.stack.length;
  }

  get exhausted(): boolean {
    return this.stack.length === 0;
  }

  /** Next token, or `undefined` once every level is exhausted. */
  tryNext(): Token | undefined {
    while (this.stack.length > 0) {
      const top = this.stack[this.stack.length - 1];
      const step = top.next();
      if (step.done) {
        this.stack.pop();
        continue;
      }
      if (isTokenStream(step.value)) {
        this.stack.push(step.value[Symbol.iterator]());
        continue;
      }
      this.pulled++;
      return step.value;
    }
    return undefined;
  }

  next(): Token {
    const token = this.tryNext();
    if (token === undefined) {
      throw new MalformedStreamError("Unexpected end of token stream", this.pulled);
    }
    return token;
  }
}

/** Flatten a nested token stream into the order a byte channel writes it. */
export function* flatten(stream: TokenStream): Generator<Token, void, undefined> {
  const cursor = new TokenCursor(stream);
  for (let token = cursor.tryNext(); token !== undefined; token = cursor.tryNext()) {
    yield token;
  }
}
