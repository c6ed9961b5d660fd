import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import type { RunId, StreamEvent } from "@parley/types";
import { createLogger } from "@parley/core";
import type { ConversationService } from "@parley/runtime";
import { formatZodError, jsonError, sessionIdParam, type AppEnv } from "../http.js";
import { eventIdSchema, sequenceSchema } from "../schemas.js";

const log = createLogger("stream-route");

interface StreamRouteDeps {
  service: ConversationService;
  heartbeatMs?: number;
}

interface StreamCursor {
  lastSeenSequence?: number;
  runId?: RunId;
}

/** `<runId>:<sequence>`; the run part is empty for a resync with no known run. */
function formatEventId(event: StreamEvent): string {
  return `${event.runId ?? ""}:${event.sequence}`;
}

export function createStreamRoutes(deps: StreamRouteDeps) {
  const app = new Hono<AppEnv>();
  const heartbeatMs = deps.heartbeatMs ?? 30_000;

  app.get("/sessions/:sessionId/stream", async (c) => {
    let cursor: StreamCursor = {};
    const lastEventId = c.req.header("Last-Event-ID");
    if (lastEventId !== undefined) {
      const parsed = eventIdSchema.safeParse(lastEventId);
      if (!parsed.success) {
        return jsonError(c, 400, "INVALID_REQUEST", formatZodError(parsed.error));
      }
      cursor = {
        lastSeenSequence: parsed.data.sequence,
        runId: parsed.data.runId ? (parsed.data.runId as RunId) : undefined,
      };
    } else {
      const rawLastSeen = c.req.query("lastSeen");
      const runId = c.req.query("runId");
      if (rawLastSeen !== undefined) {
        const parsed = sequenceSchema.safeParse(rawLastSeen);
        if (!parsed.success) {
          return jsonError(c, 400, "INVALID_REQUEST", formatZodError(parsed.error));
        }
        cursor.lastSeenSequence = parsed.data;
      }
      if (runId) cursor.runId = runId as RunId;
    }

    // Attach before the response starts so access errors still map to a status.
    const subscriber = await deps.service.attachStream(sessionIdParam(c), c.get("userId"), cursor);

    return streamSSE(c, async (stream) => {
      const heartbeat = setInterval(() => {
        stream
          .writeSSE({
            event: "heartbeat",
            data: JSON.stringify({ timestamp: new Date().toISOString() }),
          })
          .catch((err: unknown) => {
            log.debug("Heartbeat write failed", {
              sessionId: subscriber.sessionId,
              error: err instanceof Error ? err.message : String(err),
            });
          });
      }, heartbeatMs);

      stream.onAbort(() => {
        clearInterval(heartbeat);
        subscriber.close();
      });

      try {
        for await (const event of subscriber) {
          await stream.writeSSE({
            id: formatEventId(event),
            event: event.kind,
            data: JSON.stringify(event),
          });
        }
      } finally {
        clearInterval(heartbeat);
      }
    });
  });

  return app;
}
