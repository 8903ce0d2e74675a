export { formatError } from "./error-utils.js";
export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MAX_PAYLOAD_BYTES,
  LOG_LEVELS,
  resolveChunkSize,
  resolveMaxPayloadBytes,
  resolveLogLevel,
} from "./config.js";
export type { LogLevelName } from "./config.js";
