/**
 * State Module Index
 */

export { type LockRequest, type StateStorage, InMemoryStateStorage, SQLiteStateStorage } from "./storage.js";
export { type StateStoreOptions, StateStore, DEFAULT_LEASE_MS, DEFAULT_POLL_INTERVAL_MS } from "./store.js";
