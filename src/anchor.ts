import { log } from "./logger.js";
import type { MessageStore } from "./storage.js";
import type { AnchorResult } from "./types.js";

/**
 * Look up the message a trigger replies to.
 *
 * `not_found` means the referenced message was never recorded here (it can
 * predate the store); callers fall back to the session alone. A reply to
 * itself is resolved like any other reference.
 */
export async function resolveAnchor(
  store: MessageStore,
  conversationId: string,
  replyToSequenceId: string,
): Promise<AnchorResult> {
  const message = await store.fetchBySequenceId(conversationId, replyToSequenceId);
  if (!message) {
    log.debug(`anchor ${replyToSequenceId} not in history for conversation ${conversationId}`);
    return { kind: "not_found", sequenceId: replyToSequenceId };
  }
  return { kind: "found", message };
}
