// =============================================================================
// TRANSFER MANAGER -- Double-entry funds movement
// =============================================================================
// A transfer debits the source and credits the destination in one atomic
// unit, writing a DEBIT and a CREDIT row that share a correlation id. All
// request validation runs before any lock is taken; balances and statuses are
// re-checked under the lock, where the check is authoritative.
//
// A deposit is the single-leg variant: value entering the ledger from outside
// (cash desk, opening funds), recorded as one CREDIT row.

import type { LedgerContext, LedgerTransaction, OriginMetadata } from "@fundline/core";
import { LedgerError, generateId, minorToDecimal } from "@fundline/core";
import { withAccountLocks } from "../infrastructure/account-guard.js";
import {
	type AuditOutcome,
	applyDelta,
	assertDestinationUsable,
	assertSourceUsable,
	assertSufficientFunds,
	commitWithRetry,
	parseAmount,
	persistUnit,
	recordAudit,
	withReferences,
} from "./transfer-helpers.js";

// =============================================================================
// TYPES
// =============================================================================

export interface TransferParams {
	/** Identity of the caller; must own the source account */
	identity: string;
	sourceAccountId: string;
	destinationAccountNumber: string;
	/** Decimal amount in major units, e.g. "15000.00" */
	amount: string | number;
	description?: string;
	/** Transaction PIN or equivalent secret */
	authorization: string;
	origin?: OriginMetadata;
	/** Honoured until the account locks are held */
	signal?: AbortSignal;
}

export interface TransferResult {
	/** Reference of the DEBIT leg, the one shown to the sender */
	referenceNumber: string;
	debit: LedgerTransaction;
	credit: LedgerTransaction;
	/** Decimal amount moved */
	amount: string;
	/** Source balance after the transfer, smallest units */
	sourceBalance: number;
	sourceBalanceDecimal: string;
	audit: AuditOutcome;
}

export interface DepositParams {
	accountId: string;
	/** Decimal amount in major units */
	amount: string | number;
	description?: string;
	/** Operator or system recording the deposit */
	actorId?: string | null;
	origin?: OriginMetadata;
	signal?: AbortSignal;
}

export interface DepositResult {
	referenceNumber: string;
	credit: LedgerTransaction;
	amount: string;
	balance: number;
	balanceDecimal: string;
	audit: AuditOutcome;
}

// =============================================================================
// TRANSFER
// =============================================================================

export async function transfer(ctx: LedgerContext, params: TransferParams): Promise<TransferResult> {
	const { store, options } = ctx;
	const { identity, sourceAccountId, destinationAccountNumber, origin, signal } = params;
	const currency = options.currency;

	// --- Validation: first failure wins, nothing is locked or written yet ---

	const amount = parseAmount(params.amount, currency, options.advanced.maxTransferAmount);

	const [source, destination] = await Promise.all([
		store.getAccount(sourceAccountId),
		store.getAccountByNumber(destinationAccountNumber),
	]);

	if (destination?.id === sourceAccountId || source?.accountNumber === destinationAccountNumber) {
		throw LedgerError.selfTransferRejected();
	}
	assertSourceUsable(source, identity);
	assertDestinationUsable(destination);
	if (source.currency !== destination.currency) {
		throw LedgerError.invalidArgument("Cross-currency transfers are not supported");
	}

	const authorized = await ctx.identity.verifySecret(identity, params.authorization);
	if (!authorized) {
		await recordAudit(ctx, {
			actorId: identity,
			action: "TRANSACTION",
			description: `Failed transfer attempt from ${source.accountNumber}: invalid PIN`,
			ipAddress: origin?.ipAddress ?? null,
			userAgent: origin?.userAgent ?? null,
			additionalData: {
				outcome: "AUTHORIZATION_FAILED",
				sourceAccount: source.accountNumber,
				recipientAccount: destination.accountNumber,
			},
		});
		throw LedgerError.authorizationFailed();
	}

	// Pre-lock snapshot check; the check under the lock decides.
	assertSufficientFunds(source, amount);

	if (signal?.aborted) {
		throw LedgerError.transferAborted(signal.reason);
	}

	const [senderName, recipientName] = await Promise.all([
		ctx.identity.displayName?.(identity) ?? null,
		ctx.identity.displayName?.(destination.ownerId) ?? null,
	]);
	const description = params.description?.trim() ?? "";
	const amountDecimal = minorToDecimal(amount, currency);

	// --- Execution: atomic unit under both account locks ---

	return withAccountLocks(
		ctx.guard,
		[source.id, destination.id],
		{ signal, timeoutMs: options.advanced.lockTimeoutMs },
		async () => {
			const committed = await commitWithRetry(ctx, "Transfer", async () => {
				const [src, dest] = await Promise.all([
					store.getAccount(source.id),
					store.getAccount(destination.id),
				]);
				assertSourceUsable(src, identity);
				assertDestinationUsable(dest);
				assertSufficientFunds(src, amount);

				return withReferences(ctx, async (reserve) => {
					const debitRef = await reserve();
					const creditRef = await reserve();
					const now = new Date();
					const correlationId = generateId();
					const srcAfter = applyDelta(src, -amount, now);
					const destAfter = applyDelta(dest, amount, now);

					const debit: LedgerTransaction = {
						id: generateId(),
						referenceNumber: debitRef,
						accountId: src.id,
						type: "DEBIT",
						category: "transfer",
						amount,
						balanceBefore: src.balance,
						balanceAfter: srcAfter.balance,
						description: description || `Transfer to ${dest.accountNumber}`,
						status: "COMPLETED",
						counterpartyAccountNumber: dest.accountNumber,
						counterpartyName: recipientName,
						correlationId,
						counterpartReference: creditRef,
						ipAddress: origin?.ipAddress ?? null,
						userAgent: origin?.userAgent ?? null,
						createdAt: now,
					};
					const credit: LedgerTransaction = {
						...debit,
						id: generateId(),
						referenceNumber: creditRef,
						accountId: dest.id,
						type: "CREDIT",
						balanceBefore: dest.balance,
						balanceAfter: destAfter.balance,
						description: description || `Transfer from ${src.accountNumber}`,
						counterpartyAccountNumber: src.accountNumber,
						counterpartyName: senderName,
						counterpartReference: debitRef,
					};

					await persistUnit(ctx, {
						before: [src, dest],
						after: [srcAfter, destAfter],
						transactions: [debit, credit],
					});
					return { debit, credit, source: srcAfter };
				});
			});

			ctx.logger.info("Transfer completed", {
				referenceNumber: committed.debit.referenceNumber,
				correlationId: committed.debit.correlationId,
				sourceAccountId: source.id,
				destinationAccountId: destination.id,
				amount,
			});

			const audit = await recordAudit(ctx, {
				actorId: identity,
				action: "TRANSACTION",
				description: `Transfer of ${amountDecimal} ${currency} to ${destination.accountNumber}`,
				ipAddress: origin?.ipAddress ?? null,
				userAgent: origin?.userAgent ?? null,
				additionalData: {
					amount: amountDecimal,
					currency,
					sourceAccount: source.accountNumber,
					recipientAccount: destination.accountNumber,
					referenceNumber: committed.debit.referenceNumber,
					creditReference: committed.credit.referenceNumber,
				},
			});

			return {
				referenceNumber: committed.debit.referenceNumber,
				debit: committed.debit,
				credit: committed.credit,
				amount: amountDecimal,
				sourceBalance: committed.source.balance,
				sourceBalanceDecimal: minorToDecimal(committed.source.balance, currency),
				audit,
			};
		},
	);
}

// =============================================================================
// DEPOSIT
// =============================================================================

export async function deposit(ctx: LedgerContext, params: DepositParams): Promise<DepositResult> {
	const { store, options } = ctx;
	const { accountId, origin, signal } = params;
	const currency = options.currency;
	const actorId = params.actorId ?? null;

	const amount = parseAmount(params.amount, currency, options.advanced.maxTransferAmount);
	const account = await store.getAccount(accountId);
	if (!account) throw LedgerError.accountNotFound();
	assertDestinationUsable(account);
	if (signal?.aborted) {
		throw LedgerError.transferAborted(signal.reason);
	}

	const description = params.description?.trim() || "Deposit";
	const amountDecimal = minorToDecimal(amount, currency);

	return withAccountLocks(
		ctx.guard,
		[account.id],
		{ signal, timeoutMs: options.advanced.lockTimeoutMs },
		async () => {
			const committed = await commitWithRetry(ctx, "Deposit", async () => {
				const current = await store.getAccount(account.id);
				if (!current) throw LedgerError.accountNotFound();
				assertDestinationUsable(current);

				return withReferences(ctx, async (reserve) => {
					const reference = await reserve();
					const now = new Date();
					const after = applyDelta(current, amount, now);
					const credit: LedgerTransaction = {
						id: generateId(),
						referenceNumber: reference,
						accountId: current.id,
						type: "CREDIT",
						category: "deposit",
						amount,
						balanceBefore: current.balance,
						balanceAfter: after.balance,
						description,
						status: "COMPLETED",
						counterpartyAccountNumber: null,
						counterpartyName: null,
						correlationId: generateId(),
						counterpartReference: null,
						ipAddress: origin?.ipAddress ?? null,
						userAgent: origin?.userAgent ?? null,
						createdAt: now,
					};
					await persistUnit(ctx, { before: [current], after: [after], transactions: [credit] });
					return { credit, account: after };
				});
			});

			ctx.logger.info("Deposit completed", {
				referenceNumber: committed.credit.referenceNumber,
				accountId: account.id,
				amount,
			});

			const audit = await recordAudit(ctx, {
				actorId,
				action: "TRANSACTION",
				description: `Deposit of ${amountDecimal} ${currency} to ${account.accountNumber}`,
				ipAddress: origin?.ipAddress ?? null,
				userAgent: origin?.userAgent ?? null,
				additionalData: {
					amount: amountDecimal,
					currency,
					recipientAccount: account.accountNumber,
					referenceNumber: committed.credit.referenceNumber,
				},
			});

			return {
				referenceNumber: committed.credit.referenceNumber,
				credit: committed.credit,
				amount: amountDecimal,
				balance: committed.account.balance,
				balanceDecimal: minorToDecimal(committed.account.balance, currency),
				audit,
			};
		},
	);
}
