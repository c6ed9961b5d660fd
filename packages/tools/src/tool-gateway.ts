import type { JsonObject, JsonValue, ToolDescriptor, ToolError, ToolResult } from "@parley/types";
import { createLogger } from "@parley/core";
import { ToolRegistry } from "./registry.js";
import { ToolExecutionError, UpstreamHttpError } from "./tool.js";

const log = createLogger("tool-gateway");

export interface ToolGatewayOptions {
  /** Default per-call timeout. 10 000 ms. */
  readonly timeoutMs?: number;
}

type Settled = { readonly ok: true; readonly value: JsonValue } | { readonly ok: false; readonly error: unknown };

const TIMED_OUT = Symbol("timed-out");

/**
 * Single entry point for tool calls. Validates params, enforces the timeout
 * and turns every failure into a `ToolError` value. Never retries and never
 * throws.
 */
export class ToolGateway {
  private readonly defaultTimeoutMs: number;

  constructor(
    private readonly registry: ToolRegistry,
    options: ToolGatewayOptions = {}
  ) {
    this.defaultTimeoutMs = options.timeoutMs ?? 10_000;
  }

  describeTools(): ToolDescriptor[] {
    return this.registry.list();
  }

  async invoke(
    toolName: string,
    params: JsonObject,
    timeoutMs = this.defaultTimeoutMs
  ): Promise<ToolResult> {
    const started = Date.now();
    const fail = (error: ToolError): ToolResult => {
      log.warn("Tool call failed", { toolName, kind: error.kind, message: error.message });
      return { ok: false, error, durationMs: Date.now() - started };
    };

    const tool = this.registry.get(toolName);
    if (!tool) {
      return fail({ kind: "NOT_FOUND", message: `Unknown tool "${toolName}"`, retryable: false });
    }

    const parsed = tool.schema.safeParse(params);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "params"}: ${issue.message}`)
        .join("; ");
      return fail({ kind: "INVALID_INPUT", message: detail, retryable: false });
    }

    const controller = new AbortController();
    const execution: Promise<Settled> = Promise.resolve()
      .then(() => tool.execute(parsed.data, { signal: controller.signal }))
      .then(
        (value): Settled => ({ ok: true, value }),
        (error: unknown): Settled => ({ ok: false, error })
      );

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });

    try {
      const outcome = await Promise.race([execution, deadline]);
      if (outcome === TIMED_OUT) {
        controller.abort();
        return fail({
          kind: "TIMEOUT",
          message: `Tool "${toolName}" did not answer within ${timeoutMs}ms`,
          retryable: true,
        });
      }
      if (!outcome.ok) return fail(classifyToolFailure(outcome.error));

      log.debug("Tool call succeeded", { toolName, durationMs: Date.now() - started });
      return { ok: true, value: outcome.value, durationMs: Date.now() - started };
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Maps anything a tool throws onto the normalized error kinds. */
export function classifyToolFailure(err: unknown): ToolError {
  if (err instanceof ToolExecutionError) {
    return { kind: err.kind, message: err.message, retryable: err.retryable };
  }
  if (err instanceof UpstreamHttpError) {
    if (err.status >= 500) {
      return { kind: "UPSTREAM_SERVER", message: err.message, retryable: true, status: err.status };
    }
    return {
      kind: "UPSTREAM_CLIENT",
      message: err.message,
      retryable: err.status === 408 || err.status === 429,
      status: err.status,
    };
  }
  // undici reports connection failures as `TypeError: fetch failed`.
  if (err instanceof TypeError && err.message === "fetch failed") {
    return { kind: "NETWORK", message: describeCause(err), retryable: true };
  }
  if (err instanceof Error && err.name === "AbortError") {
    return { kind: "TIMEOUT", message: err.message, retryable: true };
  }
  return {
    kind: "INTERNAL",
    message: err instanceof Error ? err.message : String(err),
    retryable: false,
  };
}

function describeCause(err: Error): string {
  return err.cause instanceof Error ? `${err.message}: ${err.cause.message}` : err.message;
}
