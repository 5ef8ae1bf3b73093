export { type MemoryStoreOptions, memoryStore } from "./adapter.js";
export { type MemoryAuditSink, memoryAuditSink } from "./audit-sink.js";
