export type {
	Account,
	AccountBalance,
	AccountGuard,
	AccountStatus,
	AuditLogEntry,
	AuditSink,
	IdentityProvider,
	LedgerContext,
	LedgerOptions,
	LedgerRecordStore,
	LedgerTransaction,
} from "@fundline/core";
export { LedgerError, isLedgerError } from "@fundline/core";
export { defineLedgerConfig, validateConfig } from "./config/index.js";
export { buildContext } from "./context/context.js";
export {
	createAccountGuard,
	type InMemoryAccountGuard,
	withAccountLocks,
} from "./infrastructure/account-guard.js";
export {
	createReferenceGenerator,
	formatTimestamp,
	generateUniqueIdentifier,
	type IdentifierSource,
} from "./infrastructure/reference-generator.js";
export { createLedger, type Ledger } from "./ledger/base.js";
export {
	normalizeNumberHint,
	type OpenAccountParams,
	type OpenAccountResult,
	type SetStatusParams,
	type SetStatusResult,
} from "./managers/account-manager.js";
export type {
	BalanceMismatch,
	LedgerVerificationResult,
} from "./managers/ledger-verification.js";
export { createPinVerifier, hashPin, type PinVerifierOptions, verifyPin } from "./managers/pin-verifier.js";
export type { AuditOutcome } from "./managers/transfer-helpers.js";
export type {
	DepositParams,
	DepositResult,
	TransferParams,
	TransferResult,
} from "./managers/transfer-manager.js";
