import type { LedgerRecordStore } from "../db/store.js";
import type { LedgerError } from "../error/index.js";
import type { AuditSink } from "./audit.js";
import type { LedgerLogger } from "./config.js";
import type { AccountGuard } from "./guard.js";
import type { IdentityProvider } from "./identity.js";

export interface ReferenceGenerator {
	/** Produce a reference that no stored or in-flight transaction uses. */
	generate(): Promise<string>;
	/** Forget an in-flight reservation once persisted or abandoned. */
	release(reference: string): void;
}

export interface LedgerContext {
	store: LedgerRecordStore;
	auditSink: AuditSink;
	identity: IdentityProvider;
	guard: AccountGuard;
	references: ReferenceGenerator;
	options: ResolvedLedgerOptions;
	logger: LedgerLogger;
	reportOperationalError: (error: LedgerError) => void;
}

export interface ResolvedLedgerOptions {
	currency: string;
	references: ResolvedReferenceOptions;
	advanced: ResolvedAdvancedOptions;
}

export interface ResolvedReferenceOptions {
	prefix: string;
	suffixDigits: number;
	maxAttempts: number;
}

export interface ResolvedAdvancedOptions {
	maxTransferAmount: number;
	commitRetryCount: number;
	commitRetryBaseDelayMs: number;
	commitRetryMaxDelayMs: number;
	lockTimeoutMs: number;
	accountNumberMaxAttempts: number;
}
