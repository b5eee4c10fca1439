/**
 * Scoped console logging.
 *
 * `debug` output is only written when `config.debug` is on.
 *
 * @example
 * ```typescript
 * const log = createLogger("binary");
 * log.debug(`wrote ${count} tokens`); // [treecodec:binary] wrote 12 tokens
 * ```
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[treecodec:${scope}]`;

  return {
    scope,
    debug(message) {
      if (config.getBoolean("debug", false)) {
        console.debug(`${prefix} ${message}`);
      }
    },
  };
}
