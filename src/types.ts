export type MessageRole = "user" | "assistant";

/** Fields every message carries, stored or not. */
export interface MessageFields {
  conversationId: string;
  participantId: string;
  /** Conversation-scoped id supplied by the chat transport; null for synthetic messages. */
  sequenceId: string | null;
  role: MessageRole;
  text: string;
  /** UTC epoch microseconds (integer). */
  createdAt: number;
  /** Explicit anchor: the `sequenceId` of the message this one replies to. */
  replyToSequenceId: string | null;
  /** Opaque transport payload kept for audit; never read by the engine. */
  rawPayload: string | null;
}

export interface Message extends MessageFields {
  /** Storage-local primary key, assigned on append. */
  id: number;
}

/**
 * Message as it arrives from the ingestion boundary. Optional fields default
 * to null, and `createdAt` to the current time.
 */
export interface NewMessage {
  conversationId: string;
  participantId: string;
  role: MessageRole;
  text: string;
  sequenceId?: string | null;
  createdAt?: number;
  replyToSequenceId?: string | null;
  rawPayload?: string | null;
}

/** The message a retrieval is computed for. Carries `id` once it has been appended. */
export type Trigger = MessageFields & { id?: number };

export type AnchorResult =
  | { kind: "found"; message: Message }
  | { kind: "not_found"; sequenceId: string };

export interface ContextWindow {
  trigger: Trigger;
  /** The message the trigger replies to, when it could be resolved. */
  anchor: Message | null;
  /** True when `anchor` is also an element of `session` (or is the trigger itself). */
  anchorInSession: boolean;
  /** Inferred current session, oldest first. Never contains the trigger. */
  session: Message[];
}

export interface RetrievalParams {
  /** Maximum number of stored messages inspected. */
  lookbackLimit: number;
  /** Maximum silence between two consecutive session messages, in microseconds. */
  gapThreshold: number;
}

export interface EngineConfig {
  dbPath: string;
  lookbackLimit: number;
  sessionGapMinutes: number;
  maxHistory: number;
  debug: boolean;
}

export const MICROS_PER_MINUTE = 60_000_000;
