import { resolveAnchor } from "./anchor.js";
import { assembleContext } from "./assembler.js";
import { InvalidInputError } from "./errors.js";
import { isDebugEnabled, log } from "./logger.js";
import { assertTrigger, parseIngestMessage, parseRetrievalParams } from "./schemas.js";
import { SessionClusterer } from "./session.js";
import type { MessageStore } from "./storage.js";
import type {
  AnchorResult,
  ContextWindow,
  Message,
  NewMessage,
  RetrievalParams,
  Trigger,
} from "./types.js";

export interface ContextEngineOptions extends RetrievalParams {
  store: MessageStore;
  /** Upper bound for `getRecentMessages`. */
  maxHistory?: number;
}

const DEFAULT_MAX_HISTORY = 5;

/**
 * Entry point for the reasoning layer. Holds its own parameters, so engines
 * with different thresholds can share a process (or a store).
 */
export class ContextEngine {
  readonly store: MessageStore;
  private readonly defaults: RetrievalParams;
  private readonly maxHistory: number;
  private readonly clusterer: SessionClusterer;

  constructor(opts: ContextEngineOptions) {
    this.store = opts.store;
    this.defaults = parseRetrievalParams({
      lookbackLimit: opts.lookbackLimit,
      gapThreshold: opts.gapThreshold,
    });
    const maxHistory = opts.maxHistory ?? DEFAULT_MAX_HISTORY;
    if (!Number.isInteger(maxHistory) || maxHistory < 1) {
      throw new InvalidInputError(`maxHistory must be a positive integer (got ${maxHistory})`);
    }
    this.maxHistory = maxHistory;
    this.clusterer = new SessionClusterer(this.store);
  }

  get params(): RetrievalParams {
    return { ...this.defaults };
  }

  /** Store one inbound or outbound message. */
  async append(message: NewMessage): Promise<Message> {
    return this.store.append(parseIngestMessage(message));
  }

  /**
   * Context for `trigger`: its reply anchor (if any) and its current session.
   *
   * Bad parameters, and a trigger carrying neither its storage id nor a
   * sequence id, throw here, before any store access. An empty history
   * yields an empty window; only store failures reject.
   */
  getContext(trigger: Trigger, overrides: Partial<RetrievalParams> = {}): Promise<ContextWindow> {
    const params = parseRetrievalParams({
      lookbackLimit: overrides.lookbackLimit ?? this.defaults.lookbackLimit,
      gapThreshold: overrides.gapThreshold ?? this.defaults.gapThreshold,
    });
    assertTrigger(trigger);
    return this.retrieve(trigger, params);
  }

  /** Last `count` messages of a conversation, oldest first. `count` is capped at `maxHistory`. */
  async getRecentMessages(conversationId: string, count: number = this.maxHistory): Promise<Message[]> {
    if (!Number.isInteger(count) || count < 1) {
      throw new InvalidInputError(`count must be a positive integer (got ${count})`);
    }
    const limit = Math.min(count, this.maxHistory);
    const newestFirst = await this.store.fetchRecent(conversationId, limit);
    return newestFirst.reverse();
  }

  /** Whole stored log of a conversation, oldest first. */
  async getHistory(conversationId: string): Promise<Message[]> {
    return this.store.fetchAll(conversationId);
  }

  private async retrieve(trigger: Trigger, params: RetrievalParams): Promise<ContextWindow> {
    const anchorLookup: Promise<AnchorResult | null> = trigger.replyToSequenceId
      ? resolveAnchor(this.store, trigger.conversationId, trigger.replyToSequenceId)
      : Promise.resolve(null);

    const [anchor, session] = await Promise.all([
      anchorLookup,
      this.clusterer.currentSession(trigger, params),
    ]);

    const window = assembleContext(trigger, anchor, session);
    if (isDebugEnabled()) {
      const anchorState = window.anchor
        ? window.anchorInSession
          ? "in-session"
          : "distinct"
        : anchor
          ? "not-found"
          : "none";
      log.debug(
        `context for conversation ${trigger.conversationId}: session=${window.session.length} anchor=${anchorState}`,
      );
    }
    return window;
  }
}
