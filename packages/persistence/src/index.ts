export { SQLiteSessionStore, DEFAULT_SESSION_TITLE } from "./session-store.js";
export type { SQLiteSessionStoreOptions } from "./session-store.js";
