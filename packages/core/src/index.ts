/**
 * Core module exports for @treecodec/core
 *
 * This package provides:
 * - Configuration (env, config files, programmatic)
 * - Scoped debug logging
 * - Codec error classes
 */

// Configuration System
export {
  config,
  defineConfig,
  loadConfigFromEnv,
  type TreecodecConfig,
  type ReaderConfig,
  type RenderConfig,
} from "./config.js";

// Logging
export { createLogger, type Logger } from "./logger.js";

// Errors
export {
  CodecError,
  ProtocolVersionMismatchError,
  MalformedStreamError,
  UnsupportedTypeError,
  OrderingViolationError,
  NotSeekableError,
  isCodecError,
  type CodecErrorCode,
} from "./errors.js";
