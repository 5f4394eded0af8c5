import { parseConfig } from "./config.js";
import { ContextEngine } from "./engine.js";
import { initLogger, log, type LoggerBackend } from "./logger.js";
import { SqliteMessageStore } from "./storage.js";
import { minutesToMicros } from "./time.js";

export { parseConfig } from "./config.js";
export { ContextEngine, type ContextEngineOptions } from "./engine.js";
export { resolveAnchor } from "./anchor.js";
export { SessionClusterer, clusterSession, isSameMessage } from "./session.js";
export { assembleContext, flattenContext, formatForLlm, formatReplyNote } from "./assembler.js";
export {
  SqliteMessageStore,
  type FetchRecentOptions,
  type MessageCursor,
  type MessageStore,
} from "./storage.js";
export {
  ContextEngineError,
  DuplicateMessageError,
  InvalidInputError,
  StoreUnavailableError,
} from "./errors.js";
export {
  assertTrigger,
  ingestMessageSchema,
  parseIngestMessage,
  retrievalParamsSchema,
  triggerSchema,
} from "./schemas.js";
export { initLogger, log, type LoggerBackend } from "./logger.js";
export { dateToMicros, microsToDate, minutesToMicros, nowMicros } from "./time.js";
export { MICROS_PER_MINUTE } from "./types.js";
export type {
  AnchorResult,
  ContextWindow,
  EngineConfig,
  Message,
  MessageFields,
  MessageRole,
  NewMessage,
  RetrievalParams,
  Trigger,
} from "./types.js";

/**
 * Build an engine from a raw config object: parse it, set up logging, open the
 * SQLite store. The caller owns the engine and closes `engine.store` when done.
 */
export function createContextEngine(rawConfig: unknown, logger?: LoggerBackend): ContextEngine {
  initLogger(logger, false);
  const cfg = parseConfig(rawConfig);
  initLogger(logger, cfg.debug);

  const engine = new ContextEngine({
    store: new SqliteMessageStore(cfg.dbPath),
    lookbackLimit: cfg.lookbackLimit,
    gapThreshold: minutesToMicros(cfg.sessionGapMinutes),
    maxHistory: cfg.maxHistory,
  });
  log.info(
    `initialized (lookbackLimit=${cfg.lookbackLimit}, sessionGapMinutes=${cfg.sessionGapMinutes}, maxHistory=${cfg.maxHistory}, debug=${cfg.debug})`,
  );
  return engine;
}
