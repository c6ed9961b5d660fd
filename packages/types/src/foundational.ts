/** Branded opaque identifier types for compile-time safety. */
type Brand<T, B extends string> = T & { readonly __brand: B };

export type SessionId = Brand<string, "SessionId">;
export type UserId = Brand<string, "UserId">;
export type TurnId = Brand<string, "TurnId">;
export type RunId = Brand<string, "RunId">;
export type EventId = Brand<string, "EventId">;
export type TraceId = Brand<string, "TraceId">;
export type SpanId = Brand<string, "SpanId">;

/** ISO 8601 timestamp. */
export type Timestamp = string;

/** Arbitrary JSON-serializable object. */
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | JsonObject;
