import { z, type ZodError } from "zod";
import { InvalidInputError } from "./errors.js";
import type { NewMessage, RetrievalParams, Trigger } from "./types.js";

const micros = z.number().int().nonnegative().describe("UTC epoch microseconds");

export const ingestMessageSchema = z.object({
  conversationId: z.string().min(1),
  participantId: z.string().min(1),
  role: z.enum(["user", "assistant"]),
  text: z.string(),
  sequenceId: z.string().min(1).nullable().optional(),
  createdAt: micros.optional(),
  replyToSequenceId: z.string().min(1).nullable().optional(),
  rawPayload: z.string().nullable().optional(),
});

export const retrievalParamsSchema = z.object({
  lookbackLimit: z.number().int().nonnegative().describe("Messages inspected per retrieval"),
  gapThreshold: z.number().int().positive().describe("Session gap threshold in microseconds"),
});

/**
 * A trigger must be identifiable among stored rows: by its storage id once
 * appended, or by its sequence id. A synthetic message carries neither until
 * it has been appended.
 */
export const triggerSchema = z
  .object({
    conversationId: z.string().min(1),
    createdAt: micros,
    id: z.number().int().positive().optional(),
    sequenceId: z.string().min(1).nullable(),
  })
  .refine((t) => t.id !== undefined || t.sequenceId !== null, {
    message: "trigger without a sequence id must be appended first (pass the stored message)",
    path: ["id"],
  });

function describeIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseIngestMessage(raw: unknown): NewMessage {
  const parsed = ingestMessageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`invalid message: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseRetrievalParams(raw: unknown): RetrievalParams {
  const parsed = retrievalParamsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`invalid retrieval parameters: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function assertTrigger(trigger: Trigger): void {
  const parsed = triggerSchema.safeParse(trigger);
  if (!parsed.success) {
    throw new InvalidInputError(`invalid trigger: ${describeIssues(parsed.error)}`);
  }
}
