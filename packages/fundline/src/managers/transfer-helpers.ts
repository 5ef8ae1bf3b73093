// =============================================================================
// TRANSFER HELPERS -- Shared patterns for balance-moving operations
// =============================================================================
// Amount parsing, status checks, the atomic commit with bounded retry and
// compensating rollback, and audit emission. Used by transfers and deposits.

import type {
	Account,
	AccountWrite,
	AuditLogEntry,
	LedgerContext,
	LedgerStoreWriter,
	LedgerTransaction,
} from "@fundline/core";
import {
	LedgerError,
	addMinor,
	backoffDelay,
	compareMinor,
	generateId,
	isLedgerError,
	isPositiveMinor,
	sleep,
	toMinorUnits,
} from "@fundline/core";

// =============================================================================
// AMOUNT VALIDATION
// =============================================================================

/**
 * Parse a decimal amount in major units and check it against the configured
 * maximum. Returns smallest units.
 */
export function parseAmount(amount: string | number, currency: string, maxAmount: number): number {
	const minor = toMinorUnits(amount, currency);
	if (!isPositiveMinor(minor)) {
		throw LedgerError.invalidAmount();
	}
	if (compareMinor(minor, maxAmount) > 0) {
		throw LedgerError.invalidAmount("Amount exceeds the maximum allowed per transfer");
	}
	return minor;
}

// =============================================================================
// ACCOUNT STATE
// =============================================================================

export function assertSourceUsable(
	account: Account | null,
	identity: string,
): asserts account is Account {
	if (!account || account.ownerId !== identity) {
		throw LedgerError.sourceAccountUnavailable();
	}
	if (account.status !== "ACTIVE") {
		throw LedgerError.sourceAccountUnavailable(`Source account is ${account.status.toLowerCase()}`);
	}
}

export function assertDestinationUsable(account: Account | null): asserts account is Account {
	if (!account) {
		throw LedgerError.destinationAccountUnavailable();
	}
	if (account.status !== "ACTIVE") {
		throw LedgerError.destinationAccountUnavailable("Recipient account is not active");
	}
}

export function assertSufficientFunds(account: Account, amount: number): void {
	if (compareMinor(account.availableBalance, amount) < 0) {
		throw LedgerError.insufficientFunds(undefined, {
			accountId: account.id,
			requested: amount,
			available: account.availableBalance,
		});
	}
}

/**
 * New account state after applying a signed delta to both balance fields.
 * Throws INVALID_AMOUNT when either result leaves the safe integer range.
 */
export function applyDelta(account: Account, delta: number, now: Date): Account {
	return {
		...account,
		balance: addMinor(account.balance, delta),
		availableBalance: addMinor(account.availableBalance, delta),
		version: account.version + 1,
		updatedAt: now,
	};
}

// =============================================================================
// ATOMIC COMMIT
// =============================================================================

export interface CommitUnit {
	/** Account rows as read under the lock */
	before: Account[];
	/** Same rows with balances applied and version bumped */
	after: Account[];
	transactions: LedgerTransaction[];
}

function accountWrites(unit: CommitUnit): AccountWrite[] {
	return unit.after.map((account, i) => ({
		account,
		expectedVersion: unit.before[i]?.version ?? account.version - 1,
	}));
}

async function writeUnit(writer: LedgerStoreWriter, unit: CommitUnit): Promise<void> {
	await writer.saveAccounts(accountWrites(unit));
	await writer.saveTransactions(unit.transactions);
}

/**
 * Persist accounts and transaction rows as one unit. Uses the store's
 * transaction when it has one. Otherwise writes sequentially and, when the
 * transaction rows fail, restores the accounts before rethrowing the
 * original error.
 */
export async function persistUnit(ctx: LedgerContext, unit: CommitUnit): Promise<void> {
	const { store } = ctx;
	if (store.transaction) {
		await store.transaction((tx) => writeUnit(tx, unit));
		return;
	}

	await store.saveAccounts(accountWrites(unit));
	try {
		await store.saveTransactions(unit.transactions);
	} catch (writeError) {
		const now = new Date();
		try {
			await store.saveAccounts(
				unit.before.map((original, i) => {
					const written = unit.after[i] ?? original;
					return {
						account: { ...original, version: written.version + 1, updatedAt: now },
						expectedVersion: written.version,
					};
				}),
			);
		} catch (compensationError) {
			ctx.logger.error("Compensating rollback failed; balances need manual repair", {
				accounts: unit.before.map((a) => a.id),
				error: compensationError,
			});
			throw LedgerError.transferFailed(writeError, { compensationFailed: true });
		}
		throw writeError;
	}
}

function isRetryable(error: unknown): boolean {
	if (!isLedgerError(error)) return true;
	return error.code === "OPTIMISTIC_LOCK_CONFLICT" || error.code === "DUPLICATE_REFERENCE";
}

/**
 * Run `unit` (re-read, re-validate, build rows, commit) with bounded retry on
 * storage failures and write conflicts. Ledger errors such as
 * INSUFFICIENT_FUNDS are terminal and rethrown as-is. Exhausted retries
 * surface as TRANSFER_FAILED with the last failure as cause.
 */
export async function commitWithRetry<T>(
	ctx: LedgerContext,
	operation: string,
	unit: () => Promise<T>,
): Promise<T> {
	const { commitRetryCount, commitRetryBaseDelayMs, commitRetryMaxDelayMs } =
		ctx.options.advanced;

	for (let attempt = 0; ; attempt++) {
		try {
			return await unit();
		} catch (err) {
			if (!isRetryable(err)) throw err;
			if (attempt >= commitRetryCount) {
				ctx.logger.warn(`${operation} commit failed after retries`, {
					attempts: attempt + 1,
					error: err,
				});
				throw LedgerError.transferFailed(err);
			}
			const delayMs = backoffDelay(attempt, commitRetryBaseDelayMs, commitRetryMaxDelayMs);
			ctx.logger.debug(`${operation} commit retry`, {
				attempt: attempt + 1,
				maxRetries: commitRetryCount,
				delayMs,
				code: isLedgerError(err) ? err.code : undefined,
			});
			await sleep(delayMs);
		}
	}
}

/**
 * Hand `fn` a function that reserves fresh references, and drop every
 * reservation once `fn` settles (the store then answers for them).
 */
export async function withReferences<T>(
	ctx: LedgerContext,
	fn: (reserve: () => Promise<string>) => Promise<T>,
): Promise<T> {
	const reserved: string[] = [];
	const reserve = async () => {
		const reference = await ctx.references.generate();
		reserved.push(reference);
		return reference;
	};
	try {
		return await fn(reserve);
	} finally {
		for (const reference of reserved) {
			ctx.references.release(reference);
		}
	}
}

// =============================================================================
// AUDIT
// =============================================================================

export type AuditOutcome = { status: "written" } | { status: "failed"; error: LedgerError };

/**
 * Append an audit entry. A failing sink never fails the caller's operation:
 * the error is logged, passed to onOperationalError and returned.
 */
export async function recordAudit(
	ctx: LedgerContext,
	entry: Omit<AuditLogEntry, "id" | "createdAt">,
): Promise<AuditOutcome> {
	try {
		await ctx.auditSink.append({ ...entry, id: generateId(), createdAt: new Date() });
		return { status: "written" };
	} catch (cause) {
		const error = LedgerError.auditWriteFailed(cause);
		ctx.logger.error("Audit entry could not be written", {
			sink: ctx.auditSink.id,
			action: entry.action,
			actorId: entry.actorId,
			error: cause,
		});
		ctx.reportOperationalError(error);
		return { status: "failed", error };
	}
}
