/**
 * Session detection by time gap.
 *
 * Walks the lookback window backwards from the trigger. Each included message
 * becomes the new cursor, so a slow but unbroken exchange stays in one session
 * however long it runs, while the first silence longer than the threshold
 * closes it. Older messages are never reconsidered after that point.
 */

import { log } from "./logger.js";
import { assertTrigger } from "./schemas.js";
import type { MessageStore } from "./storage.js";
import type { Message, RetrievalParams, Trigger } from "./types.js";

/** Same stored message: matching storage id, or matching sequence id in the same conversation. */
export function isSameMessage(a: Trigger, b: Trigger): boolean {
  if (a.conversationId !== b.conversationId) return false;
  if (a.id !== undefined && b.id !== undefined) return a.id === b.id;
  return a.sequenceId !== null && a.sequenceId === b.sequenceId;
}

/**
 * Trailing run of `candidates` (newest first) whose consecutive gaps are all
 * `<= gapThreshold`, starting from `cursorTime`. Returned oldest first.
 */
export function clusterSession(
  candidates: readonly Message[],
  cursorTime: number,
  gapThreshold: number,
): Message[] {
  const included: Message[] = [];
  let cursor = cursorTime;

  for (const candidate of candidates) {
    const gap = cursor - candidate.createdAt;
    if (gap > gapThreshold) {
      log.debug(
        `session boundary before message ${candidate.id} (gap ${gap}us > ${gapThreshold}us)`,
      );
      break;
    }
    included.push(candidate);
    cursor = candidate.createdAt;
  }

  return included.reverse();
}

export class SessionClusterer {
  constructor(private readonly store: MessageStore) {}

  /**
   * Messages stored before `trigger` that belong to its session. The trigger
   * itself is never part of the result, whether or not it has been appended.
   * A trigger with neither `id` nor `sequenceId` is rejected, since a stored
   * copy of it could not be told apart from history.
   */
  async currentSession(trigger: Trigger, params: RetrievalParams): Promise<Message[]> {
    assertTrigger(trigger);
    const candidates = await this.store.fetchRecent(trigger.conversationId, params.lookbackLimit, {
      before: { createdAt: trigger.createdAt, id: trigger.id },
    });
    const history = candidates.filter((m) => !isSameMessage(m, trigger));
    return clusterSession(history, trigger.createdAt, params.gapThreshold);
  }
}
