import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { log } from "./logger.js";
import { DuplicateMessageError, StoreUnavailableError, errorMessage } from "./errors.js";
import { nowMicros } from "./time.js";
import type { Message, MessageRole, NewMessage } from "./types.js";

export const MESSAGES_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS messages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  conversation_id TEXT NOT NULL,
  participant_id TEXT NOT NULL,
  sequence_id TEXT,
  role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
  text TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  reply_to_sequence_id TEXT,
  raw_payload TEXT
);

CREATE INDEX IF NOT EXISTS idx_messages_conversation_time
  ON messages(conversation_id, created_at, id);

CREATE UNIQUE INDEX IF NOT EXISTS idx_messages_conversation_sequence
  ON messages(conversation_id, sequence_id)
  WHERE sequence_id IS NOT NULL;
`;

/** Position in a conversation's log; `fetchRecent` can be bounded to messages strictly before it. */
export interface MessageCursor {
  createdAt: number;
  /** Storage id of the message at this position. Without it, messages at exactly `createdAt` count as before. */
  id?: number;
}

export interface FetchRecentOptions {
  before?: MessageCursor;
}

/**
 * Append-only, conversation-scoped message log. Every read filters by
 * conversation id; no call ever returns another conversation's rows.
 */
export interface MessageStore {
  append(message: NewMessage): Promise<Message>;
  /** Newest first: `created_at` descending, ties broken by insertion order descending. */
  fetchRecent(conversationId: string, limit: number, opts?: FetchRecentOptions): Promise<Message[]>;
  fetchBySequenceId(conversationId: string, sequenceId: string): Promise<Message | null>;
  /** Oldest first. */
  fetchAll(conversationId: string): Promise<Message[]>;
  countMessages(conversationId: string): Promise<number>;
  close(): void;
}

interface MessageRow {
  id: number;
  conversation_id: string;
  participant_id: string;
  sequence_id: string | null;
  role: MessageRole;
  text: string;
  created_at: number;
  reply_to_sequence_id: string | null;
  raw_payload: string | null;
}

type InsertParams = [
  string,
  string,
  string | null,
  MessageRole,
  string,
  number,
  string | null,
  string | null,
];

const SELECT_COLUMNS =
  "id, conversation_id, participant_id, sequence_id, role, text, created_at, reply_to_sequence_id, raw_payload";

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    conversationId: row.conversation_id,
    participantId: row.participant_id,
    sequenceId: row.sequence_id,
    role: row.role,
    text: row.text,
    createdAt: row.created_at,
    replyToSequenceId: row.reply_to_sequence_id,
    rawPayload: row.raw_payload,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "SQLITE_CONSTRAINT_UNIQUE";
}

function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    db.exec(MESSAGES_SCHEMA_SQL);
    return db;
  } catch (err) {
    log.error(`failed to open message store at ${dbPath}`, err);
    throw new StoreUnavailableError("open", errorMessage(err), { cause: err });
  }
}

export class SqliteMessageStore implements MessageStore {
  private readonly db: Database.Database;
  private readonly insertStmt: Database.Statement<InsertParams>;
  private readonly recentStmt: Database.Statement<[string, number], MessageRow>;
  private readonly recentBeforeIdStmt: Database.Statement<[string, number, number, number, number], MessageRow>;
  private readonly recentAtOrBeforeStmt: Database.Statement<[string, number, number], MessageRow>;
  private readonly bySequenceStmt: Database.Statement<[string, string], MessageRow>;
  private readonly allStmt: Database.Statement<[string], MessageRow>;
  private readonly countStmt: Database.Statement<[string], { total: number }>;

  constructor(readonly dbPath: string) {
    this.db = openDatabase(dbPath);
    this.insertStmt = this.db.prepare<InsertParams>(
      `INSERT INTO messages (conversation_id, participant_id, sequence_id, role, text, created_at, reply_to_sequence_id, raw_payload)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    this.recentStmt = this.db.prepare<[string, number], MessageRow>(
      `SELECT ${SELECT_COLUMNS} FROM messages
       WHERE conversation_id = ?
       ORDER BY created_at DESC, id DESC
       LIMIT ?`,
    );
    this.recentBeforeIdStmt = this.db.prepare<[string, number, number, number, number], MessageRow>(
      `SELECT ${SELECT_COLUMNS} FROM messages
       WHERE conversation_id = ?
         AND (created_at < ? OR (created_at = ? AND id < ?))
       ORDER BY created_at DESC, id DESC
       LIMIT ?`,
    );
    this.recentAtOrBeforeStmt = this.db.prepare<[string, number, number], MessageRow>(
      `SELECT ${SELECT_COLUMNS} FROM messages
       WHERE conversation_id = ? AND created_at <= ?
       ORDER BY created_at DESC, id DESC
       LIMIT ?`,
    );
    this.bySequenceStmt = this.db.prepare<[string, string], MessageRow>(
      `SELECT ${SELECT_COLUMNS} FROM messages WHERE conversation_id = ? AND sequence_id = ?`,
    );
    this.allStmt = this.db.prepare<[string], MessageRow>(
      `SELECT ${SELECT_COLUMNS} FROM messages
       WHERE conversation_id = ?
       ORDER BY created_at ASC, id ASC`,
    );
    this.countStmt = this.db.prepare<[string], { total: number }>(
      "SELECT COUNT(*) AS total FROM messages WHERE conversation_id = ?",
    );
    log.info(`message store opened at ${dbPath}`);
  }

  async append(message: NewMessage): Promise<Message> {
    const fields = {
      conversationId: message.conversationId,
      participantId: message.participantId,
      sequenceId: message.sequenceId ?? null,
      role: message.role,
      text: message.text,
      createdAt: message.createdAt ?? nowMicros(),
      replyToSequenceId: message.replyToSequenceId ?? null,
      rawPayload: message.rawPayload ?? null,
    };

    let rowId: number | bigint;
    try {
      rowId = this.insertStmt.run(
        fields.conversationId,
        fields.participantId,
        fields.sequenceId,
        fields.role,
        fields.text,
        fields.createdAt,
        fields.replyToSequenceId,
        fields.rawPayload,
      ).lastInsertRowid;
    } catch (err) {
      if (isUniqueViolation(err) && fields.sequenceId !== null) {
        throw new DuplicateMessageError(fields.conversationId, fields.sequenceId);
      }
      throw this.unavailable("append", err);
    }

    const stored: Message = { id: Number(rowId), ...fields };
    log.debug(`appended message ${stored.id} to conversation ${stored.conversationId}`);
    return stored;
  }

  async fetchRecent(
    conversationId: string,
    limit: number,
    opts: FetchRecentOptions = {},
  ): Promise<Message[]> {
    if (limit <= 0) return [];
    const before = opts.before;
    try {
      let rows: MessageRow[];
      if (!before) {
        rows = this.recentStmt.all(conversationId, limit);
      } else if (before.id !== undefined) {
        rows = this.recentBeforeIdStmt.all(conversationId, before.createdAt, before.createdAt, before.id, limit);
      } else {
        rows = this.recentAtOrBeforeStmt.all(conversationId, before.createdAt, limit);
      }
      return rows.map(toMessage);
    } catch (err) {
      throw this.unavailable("fetchRecent", err);
    }
  }

  async fetchBySequenceId(conversationId: string, sequenceId: string): Promise<Message | null> {
    try {
      const row = this.bySequenceStmt.get(conversationId, sequenceId);
      return row ? toMessage(row) : null;
    } catch (err) {
      throw this.unavailable("fetchBySequenceId", err);
    }
  }

  async fetchAll(conversationId: string): Promise<Message[]> {
    try {
      return this.allStmt.all(conversationId).map(toMessage);
    } catch (err) {
      throw this.unavailable("fetchAll", err);
    }
  }

  async countMessages(conversationId: string): Promise<number> {
    try {
      return this.countStmt.get(conversationId)?.total ?? 0;
    } catch (err) {
      throw this.unavailable("countMessages", err);
    }
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private unavailable(operation: string, err: unknown): StoreUnavailableError {
    log.error(`message store ${operation} failed`, err);
    return new StoreUnavailableError(operation, errorMessage(err), { cause: err });
  }
}
