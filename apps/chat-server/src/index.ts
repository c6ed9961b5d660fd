import { serve } from "@hono/node-server";
import { configureLogging, createLogger, loadConfig } from "@parley/core";
import { createChatServer } from "./bootstrap.js";

const CONFIG_PATH = process.env.PARLEY_CONFIG ?? "parley.config.yaml";

const config = loadConfig(CONFIG_PATH);
configureLogging({ level: config.logLevel });
const log = createLogger("chat-server");

const server = createChatServer(config);
const recovered = await server.runtime.service.recoverInterruptedRuns();
if (recovered.length > 0) {
  log.warn("Cleared runs interrupted by the last shutdown", { count: recovered.length });
}

const http = serve({ fetch: server.app.fetch, hostname: config.server.bind, port: config.server.port }, (info) => {
  log.info("Parley listening", { address: info.address, port: info.port, model: config.model.provider });
});

let stopping = false;
async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  log.info("Shutting down", { signal });
  http.close();
  await server.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
  });
}
