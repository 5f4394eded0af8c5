import { isSameMessage } from "./session.js";
import type { AnchorResult, ContextWindow, Message, Trigger } from "./types.js";

/**
 * Combine the resolved anchor and the inferred session into one window.
 *
 * The anchor stays in its own field even when it also sits inside the
 * session, so callers can tell which session element is being replied to.
 * It is never spliced into `session`.
 */
export function assembleContext(
  trigger: Trigger,
  anchor: AnchorResult | null,
  session: readonly Message[],
): ContextWindow {
  const ordered = [...session].sort((a, b) => a.createdAt - b.createdAt || a.id - b.id);
  const anchorMessage = anchor?.kind === "found" ? anchor.message : null;
  const anchorInSession =
    anchorMessage !== null &&
    (isSameMessage(anchorMessage, trigger) || ordered.some((m) => isSameMessage(m, anchorMessage)));

  return {
    trigger,
    anchor: anchorMessage,
    anchorInSession,
    session: ordered,
  };
}

/** Single chronological sequence: distinct anchor first, then session, then trigger. */
export function flattenContext(window: ContextWindow): Trigger[] {
  const out: Trigger[] = [];
  if (window.anchor && !window.anchorInSession) out.push(window.anchor);
  for (const m of window.session) {
    if (!isSameMessage(m, window.trigger)) out.push(m);
  }
  out.push(window.trigger);
  return out;
}

function roleLabel(message: Trigger): string {
  return message.role === "user" ? "User" : "Assistant";
}

export function formatReplyNote(anchor: Message): string {
  return `[Context: User is replying to a previous message: '${anchor.text}']`;
}

/**
 * Plain-text transcript of the window for a downstream summariser.
 * The reply note is only added when the anchor is not already in the transcript.
 */
export function formatForLlm(window: ContextWindow, opts: { includeTrigger?: boolean } = {}): string {
  const lines: string[] = [];
  if (window.anchor && !window.anchorInSession) {
    lines.push(formatReplyNote(window.anchor));
  }
  for (const m of window.session) {
    if (!isSameMessage(m, window.trigger)) lines.push(`${roleLabel(m)}: ${m.text}`);
  }
  if (opts.includeTrigger !== false) {
    lines.push(`${roleLabel(window.trigger)}: ${window.trigger.text}`);
  }
  return lines.join("\n");
}
