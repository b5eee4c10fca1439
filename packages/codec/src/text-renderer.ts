/**
 * Text Renderer
 *
 * Prints a Describable as an indented tree, walking `describe()` directly.
 * The output only depends on part and list order, so two renders of equal
 * trees compare equal:
 *
 * ```text
 * Owner (object)
 * 	Name: source
 * 	Inner: 
 * 		Child (object)
 * 			Name: inner
 * 	Tags: (list)
 * 		red
 * ```
 */

import { config } from "@treecodec/core";
import { partFormatter, typeNameOf } from "./describable.js";
import { scalarText } from "./scalar.js";
import type { Describable, Part } from "./types.js";

export interface TextSink {
  write(text: string): void;
}

export interface RenderOptions {
  /** Indent unit per nesting level; defaults to `render.indent` (a tab) */
  indent?: string;
}

class TextRenderer {
  constructor(
    private readonly sink: TextSink,
    private readonly indent: string,
  ) {}

  object(value: Describable, depth: number): void {
    this.line(depth, `${typeNameOf(value)} (object)`);
    for (const part of value.describe(partFormatter)) {
      this.part(part, depth + 1);
    }
  }

  private part(part: Part, depth: number): void {
    switch (part.kind) {
      case "scalar":
        this.line(depth, `${part.name}: ${scalarText(part.value)}`);
        break;
      case "nested":
        this.line(depth, `${part.name}: `);
        this.object(part.value, depth + 1);
        break;
      case "list":
        this.line(depth, `${part.name}: (list)`);
        for (const item of part.items) {
          if (item.kind === "nested") {
            this.object(item.value, depth + 1);
          } else if (item.value === null || item.value === undefined) {
            this.line(depth + 1, "(null)");
          } else {
            this.line(depth + 1, scalarText(item.value));
          }
        }
        break;
    }
  }

  private line(depth: number, text: string): void {
    this.sink.write(`${this.indent.repeat(depth)}${text}\n`);
  }
}

/** Write the text tree of `value` to `sink`. */
export function renderTo(value: Describable, sink: TextSink, options: RenderOptions = {}): void {
  const indent = options.indent ?? config.getString("render.indent", "\t");
  new TextRenderer(sink, indent).object(value, 0);
}

/** Text tree of `value`. */
export function render(value: Describable, options: RenderOptions = {}): string {
  const chunks: string[] = [];
  renderTo(value, { write: (text) => chunks.push(text) }, options);
  return chunks.join("");
}
