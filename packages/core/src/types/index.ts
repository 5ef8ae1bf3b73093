export type {
	Account,
	AccountBalance,
	AccountLedgerSummary,
	AccountStatus,
} from "./account.js";
export { ACCOUNT_STATUSES } from "./account.js";
export type { AuditAction, AuditLogEntry, AuditQuery, AuditSink } from "./audit.js";
export type {
	LedgerAdvancedOptions,
	LedgerLogger,
	LedgerOptions,
	ReferenceOptions,
} from "./config.js";
export type {
	LedgerContext,
	ReferenceGenerator,
	ResolvedAdvancedOptions,
	ResolvedLedgerOptions,
	ResolvedReferenceOptions,
} from "./context.js";
export type { AccountGuard, AcquireOptions, ScopedLock } from "./guard.js";
export type { IdentityProvider } from "./identity.js";
export type {
	LedgerTransaction,
	OriginMetadata,
	TransactionCategory,
	TransactionStatus,
	TransactionType,
} from "./transaction.js";
