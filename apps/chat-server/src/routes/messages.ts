import { Hono } from "hono";
import type { ConversationService } from "@parley/runtime";
import { formatZodError, jsonError, readJsonBody, sessionIdParam, type AppEnv } from "../http.js";
import { cancelRunSchema, startConversationSchema, submitMessageSchema } from "../schemas.js";

interface MessageRouteDeps {
  service: ConversationService;
}

export function createMessageRoutes(deps: MessageRouteDeps) {
  const app = new Hono<AppEnv>();
  const { service } = deps;

  // Returns as soon as the run is accepted; progress arrives on the stream.
  app.post("/sessions/:sessionId/messages", async (c) => {
    const parsed = submitMessageSchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      return jsonError(c, 400, "INVALID_REQUEST", formatZodError(parsed.error));
    }
    const run = await service.submitMessage(sessionIdParam(c), c.get("userId"), parsed.data.text);
    return c.json({ runId: run.runId, turnId: run.turnId, state: run.state }, 202);
  });

  // A first message without a session opens one.
  app.post("/conversations", async (c) => {
    const parsed = startConversationSchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      return jsonError(c, 400, "INVALID_REQUEST", formatZodError(parsed.error));
    }
    const { session, run } = await service.startConversation(c.get("userId"), parsed.data.text, {
      title: parsed.data.title,
    });
    return c.json({ sessionId: session.id, runId: run.runId, turnId: run.turnId, state: run.state }, 202);
  });

  app.post("/sessions/:sessionId/cancel", async (c) => {
    const parsed = cancelRunSchema.safeParse((await readJsonBody(c)) ?? {});
    if (!parsed.success) {
      return jsonError(c, 400, "INVALID_REQUEST", formatZodError(parsed.error));
    }
    const result = await service.cancelRun(sessionIdParam(c), c.get("userId"), parsed.data.reason);
    return c.json(result);
  });

  return app;
}
