/**
 * Errors raised by the context engine.
 *
 * A missing reply anchor is not in here: it is reported as an `AnchorResult`
 * value, since "the referenced message predates our history" is a normal state.
 */

export class ContextEngineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ContextEngineError";
  }
}

/** The storage engine failed to read or write. Never retried here. */
export class StoreUnavailableError extends ContextEngineError {
  constructor(
    public readonly operation: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Message store ${operation} failed: ${message}`, "STORE_UNAVAILABLE", options);
    this.name = "StoreUnavailableError";
  }
}

/** A caller passed parameters or a message record the engine cannot accept. */
export class InvalidInputError extends ContextEngineError {
  constructor(message: string) {
    super(message, "INVALID_INPUT");
    this.name = "InvalidInputError";
  }
}

export class DuplicateMessageError extends ContextEngineError {
  constructor(
    public readonly conversationId: string,
    public readonly sequenceId: string,
  ) {
    super(
      `Message ${sequenceId} already stored for conversation ${conversationId}`,
      "DUPLICATE_MESSAGE",
    );
    this.name = "DuplicateMessageError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
