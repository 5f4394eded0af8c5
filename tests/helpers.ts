import { StoreUnavailableError } from "../src/errors.js";
import { initLogger, type LoggerBackend } from "../src/logger.js";
import type { MessageStore } from "../src/storage.js";
import type { Message, NewMessage } from "../src/types.js";

export const MINUTE = 60_000_000;
export const HOUR = 60 * MINUTE;
/** 2023-11-14T22:13:20Z in microseconds. */
export const T0 = 1_700_000_000_000_000;

export function at(offsetMicros: number): number {
  return T0 + offsetMicros;
}

export function captureLogs(debug = false): { lines: string[] } {
  const lines: string[] = [];
  const backend: LoggerBackend = {
    debug(msg: string) {
      lines.push(`debug ${msg}`);
    },
    info(msg: string) {
      lines.push(`info ${msg}`);
    },
    warn(msg: string) {
      lines.push(`warn ${msg}`);
    },
    error(msg: string) {
      lines.push(`error ${msg}`);
    },
  };
  initLogger(backend, debug);
  return { lines };
}

export function userMessage(
  conversationId: string,
  text: string,
  createdAt: number,
  extra: Partial<NewMessage> = {},
): NewMessage {
  return {
    conversationId,
    participantId: "user-1",
    role: "user",
    text,
    createdAt,
    ...extra,
  };
}

export function stored(overrides: Partial<Message> & Pick<Message, "id" | "createdAt">): Message {
  return {
    conversationId: "chat-1",
    participantId: "user-1",
    sequenceId: null,
    role: "user",
    text: `message ${overrides.id}`,
    replyToSequenceId: null,
    rawPayload: null,
    ...overrides,
  };
}

/** Store whose every read and write fails, as when the database file is gone. */
export class FailingStore implements MessageStore {
  calls: string[] = [];

  private fail(operation: string): Promise<never> {
    this.calls.push(operation);
    return Promise.reject(new StoreUnavailableError(operation, "disk I/O error"));
  }

  append(): Promise<Message> {
    return this.fail("append");
  }

  fetchRecent(): Promise<Message[]> {
    return this.fail("fetchRecent");
  }

  fetchBySequenceId(): Promise<Message | null> {
    return this.fail("fetchBySequenceId");
  }

  fetchAll(): Promise<Message[]> {
    return this.fail("fetchAll");
  }

  countMessages(): Promise<number> {
    return this.fail("countMessages");
  }

  close(): void {}
}
