import { z } from "zod";

export const createSessionSchema = z.object({
  title: z.string().max(200).optional(),
});

export const updateSessionSchema = z
  .object({
    title: z.string().optional(),
    archived: z.boolean().optional(),
  })
  .refine((patch) => patch.title !== undefined || patch.archived !== undefined, {
    message: "Nothing to update",
  });

export const submitMessageSchema = z.object({
  text: z.string(),
});

export const startConversationSchema = z.object({
  text: z.string(),
  title: z.string().max(200).optional(),
});

export const cancelRunSchema = z.object({
  reason: z.string().max(200).optional(),
});

export const listTurnsQuerySchema = z.object({
  before: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

/** `lastSeen` query: the newest sequence the client holds of the run in `runId`, -1 for none. */
export const sequenceSchema = z.coerce.number().int().min(-1);

/** SSE event id as the stream route writes it: `<runId>:<sequence>`, run empty when unknown. */
export const eventIdSchema = z
  .string()
  .regex(/^[^:]*:-?\d+$/, "Expected <runId>:<sequence>")
  .transform((raw) => {
    const colon = raw.lastIndexOf(":");
    return { runId: raw.slice(0, colon), sequence: raw.slice(colon + 1) };
  })
  .pipe(z.object({ runId: z.string(), sequence: sequenceSchema }));
