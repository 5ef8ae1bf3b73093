// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds LedgerContext from LedgerOptions. Resolves the store, logger and
// account guard, and merges config defaults.

import type {
	LedgerContext,
	LedgerError,
	LedgerOptions,
	LedgerRecordStore,
	ResolvedAdvancedOptions,
	ResolvedLedgerOptions,
	ResolvedReferenceOptions,
} from "@fundline/core";
import { createConsoleLogger } from "@fundline/core/logger";
import { validateConfig } from "../config/index.js";
import { createAccountGuard } from "../infrastructure/account-guard.js";
import { createReferenceGenerator } from "../infrastructure/reference-generator.js";

// =============================================================================
// DEFAULT CONFIG VALUES
// =============================================================================

const DEFAULT_ADVANCED: ResolvedAdvancedOptions = {
	maxTransferAmount: 1_000_000_000_00,
	commitRetryCount: 2,
	commitRetryBaseDelayMs: 25,
	commitRetryMaxDelayMs: 250,
	lockTimeoutMs: 5000,
	accountNumberMaxAttempts: 10,
};

const DEFAULT_REFERENCES: ResolvedReferenceOptions = {
	prefix: "TXN",
	suffixDigits: 4,
	maxAttempts: 10,
};

// =============================================================================
// BUILD CONTEXT
// =============================================================================

export async function buildContext(options: LedgerOptions): Promise<LedgerContext> {
	validateConfig(options);

	const store: LedgerRecordStore =
		typeof options.store === "function" ? options.store() : options.store;

	const logger = options.logger ?? createConsoleLogger();

	const advanced: ResolvedAdvancedOptions = {
		...DEFAULT_ADVANCED,
		...(options.advanced ?? {}),
	};

	const resolvedOptions: ResolvedLedgerOptions = {
		currency: options.currency ?? "NGN",
		references: { ...DEFAULT_REFERENCES, ...(options.references ?? {}) },
		advanced,
	};

	if (!store.transaction) {
		logger.warn(
			`Store "${store.id}" has no transaction support. Transfers fall back to compensating writes, which cannot survive a process crash mid-commit.`,
		);
	}

	const onOperationalError = options.onOperationalError;
	const reportOperationalError = (error: LedgerError): void => {
		if (!onOperationalError) return;
		try {
			onOperationalError(error);
		} catch (hookError) {
			logger.error("onOperationalError hook threw", { code: error.code, error: hookError });
		}
	};

	return {
		store,
		auditSink: options.auditSink,
		identity: options.identity,
		guard: options.guard ?? createAccountGuard(),
		references: createReferenceGenerator(store, resolvedOptions.references),
		options: resolvedOptions,
		logger,
		reportOperationalError,
	};
}
