import type { LedgerRecordStore } from "../db/store.js";
import type { LedgerError } from "../error/index.js";
import type { AuditSink } from "./audit.js";
import type { AccountGuard } from "./guard.js";
import type { IdentityProvider } from "./identity.js";

export interface LedgerOptions {
	/** Ledger record store instance or factory function */
	store: LedgerRecordStore | (() => LedgerRecordStore);

	/** Where audit entries go */
	auditSink: AuditSink;

	/** Verifies transaction PINs and resolves display names */
	identity: IdentityProvider;

	/** Per-account lock table. Default: a process-wide in-memory guard created at start. */
	guard?: AccountGuard;

	/** Currency code for all accounts (default: "NGN") */
	currency?: string;

	/** Reference number shape */
	references?: ReferenceOptions;

	/** Advanced configuration */
	advanced?: LedgerAdvancedOptions;

	/** Custom logger */
	logger?: LedgerLogger;

	/**
	 * Receives operational errors that do not fail the request, such as an
	 * audit entry that could not be written after a successful transfer.
	 */
	onOperationalError?: (error: LedgerError) => void;
}

export interface ReferenceOptions {
	/** Leading letters of every reference. Default: "TXN" */
	prefix?: string;
	/** Random digits after the timestamp. Default: 4 */
	suffixDigits?: number;
	/** Candidates tried before giving up. Default: 10 */
	maxAttempts?: number;
}

export interface LedgerAdvancedOptions {
	/** Maximum single transfer amount in smallest units. Default: 1_000_000_000_00 */
	maxTransferAmount?: number;
	/** Retries of the commit step after a transient storage failure. Default: 2 */
	commitRetryCount?: number;
	/** Base delay between commit retries (doubled each attempt + jitter). Default: 25 */
	commitRetryBaseDelayMs?: number;
	/** Maximum delay between commit retries. Default: 250 */
	commitRetryMaxDelayMs?: number;
	/** How long to wait for an account lock. Default: 5000 */
	lockTimeoutMs?: number;
	/** Candidates tried when generating an account number. Default: 10 */
	accountNumberMaxAttempts?: number;
}

export interface LedgerLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
