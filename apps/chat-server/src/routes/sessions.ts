import { Hono } from "hono";
import type { TurnId } from "@parley/types";
import type { ConversationService } from "@parley/runtime";
import { formatZodError, jsonError, readJsonBody, sessionIdParam, type AppEnv } from "../http.js";
import { createSessionSchema, listTurnsQuerySchema, updateSessionSchema } from "../schemas.js";

interface SessionRouteDeps {
  service: ConversationService;
}

export function createSessionRoutes(deps: SessionRouteDeps) {
  const app = new Hono<AppEnv>();
  const { service } = deps;

  app.post("/sessions", async (c) => {
    const parsed = createSessionSchema.safeParse((await readJsonBody(c)) ?? {});
    if (!parsed.success) {
      return jsonError(c, 400, "INVALID_REQUEST", formatZodError(parsed.error));
    }
    const session = await service.createSession(c.get("userId"), parsed.data);
    return c.json({ session }, 201);
  });

  app.get("/sessions", async (c) => {
    const includeArchived = c.req.query("archived") === "true";
    const sessions = await service.listSessions(c.get("userId"), { includeArchived });
    return c.json({ sessions });
  });

  app.get("/sessions/:sessionId", async (c) => {
    const session = await service.getSession(sessionIdParam(c), c.get("userId"));
    return c.json({ session });
  });

  app.patch("/sessions/:sessionId", async (c) => {
    const parsed = updateSessionSchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      return jsonError(c, 400, "INVALID_REQUEST", formatZodError(parsed.error));
    }
    const sessionId = sessionIdParam(c);
    const userId = c.get("userId");
    const { title, archived } = parsed.data;

    let session = await service.getSession(sessionId, userId);
    if (title !== undefined) session = await service.renameSession(sessionId, userId, title);
    if (archived === true) session = await service.archiveSession(sessionId, userId);
    if (archived === false) session = await service.unarchiveSession(sessionId, userId);
    return c.json({ session });
  });

  app.delete("/sessions/:sessionId", async (c) => {
    await service.deleteSession(sessionIdParam(c), c.get("userId"));
    return c.body(null, 204);
  });

  app.get("/sessions/:sessionId/turns", async (c) => {
    const parsed = listTurnsQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return jsonError(c, 400, "INVALID_REQUEST", formatZodError(parsed.error));
    }
    const turns = await service.getHistory(sessionIdParam(c), c.get("userId"), {
      beforeOrdinal: parsed.data.before,
      limit: parsed.data.limit,
    });
    return c.json({ turns });
  });

  app.get("/turns/:turnId/trace", async (c) => {
    const trace = await service.getTurnTrace(c.req.param("turnId") as TurnId, c.get("userId"));
    return c.json({ trace });
  });

  app.get("/stats", async (c) => {
    const statistics = await service.getStatistics(c.get("userId"));
    return c.json({ statistics });
  });

  return app;
}
