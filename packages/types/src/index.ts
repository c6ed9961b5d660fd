export type * from "./foundational.js";
export type * from "./observability.js";
export type * from "./error.js";
export type * from "./tool.js";
export type * from "./thinking.js";
export type * from "./session.js";
export type * from "./stream.js";
export type * from "./run.js";
export type * from "./event-bus.js";
export type * from "./access.js";
