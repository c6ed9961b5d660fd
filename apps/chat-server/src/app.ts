import { Hono } from "hono";
import { createLogger, isParleyError } from "@parley/core";
import type { ConversationService } from "@parley/runtime";
import { jsonError, requireUser, statusForCode, type AppEnv } from "./http.js";
import { createMessageRoutes } from "./routes/messages.js";
import { createSessionRoutes } from "./routes/sessions.js";
import { createStreamRoutes } from "./routes/stream.js";

const log = createLogger("chat-server");

export interface ChatAppDeps {
  service: ConversationService;
  /** Interval of SSE heartbeat frames. Default 30 000. */
  heartbeatMs?: number;
}

export function createChatApp(deps: ChatAppDeps) {
  const app = new Hono<AppEnv>();

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.use("/sessions", requireUser);
  app.use("/sessions/*", requireUser);
  app.use("/turns/*", requireUser);
  app.use("/stats", requireUser);
  app.use("/conversations", requireUser);

  app.route("/", createSessionRoutes(deps));
  app.route("/", createMessageRoutes(deps));
  app.route("/", createStreamRoutes(deps));

  app.notFound((c) => jsonError(c, 404, "NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`));

  app.onError((err, c) => {
    if (isParleyError(err)) {
      return jsonError(c, statusForCode(err.code), err.code, err.message);
    }
    log.error("Unhandled request error", {
      method: c.req.method,
      path: c.req.path,
      error: err.message,
    });
    return jsonError(c, 500, "INTERNAL_ERROR", "Internal server error");
  });

  return app;
}
