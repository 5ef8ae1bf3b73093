export { isUniqueViolation, kyselyStore } from "./adapter.js";
export { kyselyAuditSink } from "./audit-sink.js";
export {
	createMigrationProvider,
	getMigrationStatus,
	migrateToLatest,
	type SchemaDialect,
} from "./migrations.js";
export type {
	AuditLogTable,
	LedgerAccountTable,
	LedgerDatabase,
	LedgerTransactionTable,
} from "./schema.js";
