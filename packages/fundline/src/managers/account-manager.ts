// =============================================================================
// ACCOUNT MANAGER -- Account lifecycle and reads
// =============================================================================
// Opens accounts with a collision-free ten-digit number, applies
// administrative status changes under the Account Guard, and serves balance
// and history reads. Balances are never written here: only the transfer
// manager moves value.

import type {
	Account,
	AccountBalance,
	AccountStatus,
	LedgerContext,
	LedgerTransaction,
	OriginMetadata,
} from "@fundline/core";
import { ACCOUNT_STATUSES, LedgerError, generateId, minorToDecimal } from "@fundline/core";
import { withAccountLocks } from "../infrastructure/account-guard.js";
import {
	generateUniqueIdentifier,
	randomDigits,
} from "../infrastructure/reference-generator.js";
import { type AuditOutcome, recordAudit } from "./transfer-helpers.js";

const ACCOUNT_NUMBER_LENGTH = 10;
const DEFAULT_HISTORY_LIMIT = 20;
const MAX_HISTORY_LIMIT = 100;

// =============================================================================
// OPEN ACCOUNT
// =============================================================================

export interface OpenAccountParams {
	ownerId: string;
	accountTypeId: string;
	/** Default: true when the owner has no account yet */
	isPrimary?: boolean;
	/**
	 * Digits to derive the account number from, such as the owner's phone
	 * number. Leading zeros and a +234 country prefix are dropped; short
	 * hints are padded with random digits.
	 */
	numberHint?: string;
	actorId?: string | null;
	origin?: OriginMetadata;
}

export interface OpenAccountResult {
	account: Account;
	audit: AuditOutcome;
}

/** "+234 0803-123-4567" → "8031234567" */
export function normalizeNumberHint(hint: string): string {
	return hint
		.replace(/^\+234/, "")
		.replace(/\D/g, "")
		.replace(/^0+/, "")
		.slice(0, ACCOUNT_NUMBER_LENGTH);
}

export async function openAccount(
	ctx: LedgerContext,
	params: OpenAccountParams,
): Promise<OpenAccountResult> {
	const { ownerId, accountTypeId, origin } = params;
	if (!ownerId.trim()) throw LedgerError.invalidArgument("ownerId is required");
	if (!accountTypeId.trim()) throw LedgerError.invalidArgument("accountTypeId is required");

	const hint = params.numberHint ? normalizeNumberHint(params.numberHint) : "";
	let attempt = 0;

	// The owner key serializes concurrent opens so two accounts cannot both
	// become primary.
	const account = await withAccountLocks(
		ctx.guard,
		[`owner:${ownerId}`],
		{ timeoutMs: ctx.options.advanced.lockTimeoutMs },
		async () => {
			const existing = await ctx.store.listAccountsByOwner(ownerId);
			const hasPrimary = existing.some((a) => a.isPrimary);
			const isPrimary = params.isPrimary ?? !hasPrimary;
			if (isPrimary && hasPrimary) {
				throw LedgerError.primaryAccountExists();
			}

			const accountNumber = await generateUniqueIdentifier({
				candidate: () => {
					const prefix = attempt++ === 0 ? hint : "";
					return prefix + randomDigits(ACCOUNT_NUMBER_LENGTH - prefix.length);
				},
				isTaken: (candidate) => ctx.store.existsAccountNumber(candidate),
				maxAttempts: ctx.options.advanced.accountNumberMaxAttempts,
				onExhausted: (attempts) => LedgerError.accountNumberExhausted(attempts),
			});

			const now = new Date();
			const created: Account = {
				id: generateId(),
				accountNumber,
				ownerId,
				accountTypeId,
				currency: ctx.options.currency,
				balance: 0,
				availableBalance: 0,
				status: "ACTIVE",
				isPrimary,
				version: 1,
				createdAt: now,
				updatedAt: now,
			};
			await ctx.store.insertAccount(created);
			return created;
		},
	);

	ctx.logger.info("Account opened", {
		accountId: account.id,
		accountNumber: account.accountNumber,
		ownerId,
	});

	const audit = await recordAudit(ctx, {
		actorId: params.actorId ?? ownerId,
		action: "ACCOUNT_UPDATE",
		description: `Account ${account.accountNumber} opened`,
		ipAddress: origin?.ipAddress ?? null,
		userAgent: origin?.userAgent ?? null,
		additionalData: {
			accountId: account.id,
			accountNumber: account.accountNumber,
			accountTypeId,
			isPrimary: account.isPrimary,
		},
	});

	return { account, audit };
}

// =============================================================================
// STATUS CHANGES
// =============================================================================

export interface SetStatusParams {
	accountId: string;
	status: AccountStatus;
	reason?: string;
	actorId?: string | null;
	origin?: OriginMetadata;
}

export interface SetStatusResult {
	account: Account;
	previousStatus: AccountStatus;
	audit: AuditOutcome;
}

function isAccountStatus(value: string): value is AccountStatus {
	return ACCOUNT_STATUSES.some((status) => status === value);
}

export async function setAccountStatus(
	ctx: LedgerContext,
	params: SetStatusParams,
): Promise<SetStatusResult> {
	const { accountId, status, origin } = params;
	if (!isAccountStatus(status)) {
		throw LedgerError.invalidArgument(`Unknown account status "${String(status)}"`);
	}

	const { account, previousStatus } = await withAccountLocks(
		ctx.guard,
		[accountId],
		{ timeoutMs: ctx.options.advanced.lockTimeoutMs },
		async () => {
			const current = await ctx.store.getAccount(accountId);
			if (!current) throw LedgerError.accountNotFound();
			if (current.status === "CLOSED") {
				throw LedgerError.invalidStatusTransition("Closed accounts cannot be reopened");
			}
			if (current.status === status) {
				throw LedgerError.invalidStatusTransition(`Account is already ${status}`);
			}
			if (status === "CLOSED" && current.balance !== 0) {
				throw LedgerError.invalidStatusTransition(
					"Account balance must be zero before closing",
				);
			}

			const updated: Account = {
				...current,
				status,
				version: current.version + 1,
				updatedAt: new Date(),
			};
			await ctx.store.saveAccounts([{ account: updated, expectedVersion: current.version }]);
			return { account: updated, previousStatus: current.status };
		},
	);

	ctx.logger.info("Account status changed", {
		accountId,
		from: previousStatus,
		to: status,
	});

	const audit = await recordAudit(ctx, {
		actorId: params.actorId ?? null,
		action: "ACCOUNT_UPDATE",
		description: `Account ${account.accountNumber} status changed from ${previousStatus} to ${status}`,
		ipAddress: origin?.ipAddress ?? null,
		userAgent: origin?.userAgent ?? null,
		additionalData: {
			accountId,
			previousStatus,
			status,
			...(params.reason ? { reason: params.reason } : {}),
		},
	});

	return { account, previousStatus, audit };
}

// =============================================================================
// READS
// =============================================================================

export async function getAccountById(ctx: LedgerContext, accountId: string): Promise<Account> {
	const account = await ctx.store.getAccount(accountId);
	if (!account) throw LedgerError.accountNotFound();
	return account;
}

export async function getAccountByNumber(
	ctx: LedgerContext,
	accountNumber: string,
): Promise<Account> {
	const account = await ctx.store.getAccountByNumber(accountNumber);
	if (!account) throw LedgerError.accountNotFound();
	return account;
}

export async function getAccountBalance(
	ctx: LedgerContext,
	accountId: string,
): Promise<AccountBalance> {
	const account = await getAccountById(ctx, accountId);
	return {
		accountId: account.id,
		accountNumber: account.accountNumber,
		balance: account.balance,
		availableBalance: account.availableBalance,
		balanceDecimal: minorToDecimal(account.balance, account.currency),
		availableBalanceDecimal: minorToDecimal(account.availableBalance, account.currency),
		currency: account.currency,
	};
}

export async function getAccountHistory(
	ctx: LedgerContext,
	params: { accountId: string; limit?: number; offset?: number },
): Promise<LedgerTransaction[]> {
	const limit = params.limit ?? DEFAULT_HISTORY_LIMIT;
	const offset = params.offset ?? 0;
	if (!Number.isInteger(limit) || limit < 1 || limit > MAX_HISTORY_LIMIT) {
		throw LedgerError.invalidArgument(`limit must be an integer between 1 and ${MAX_HISTORY_LIMIT}`);
	}
	if (!Number.isInteger(offset) || offset < 0) {
		throw LedgerError.invalidArgument("offset must be a non-negative integer");
	}

	await getAccountById(ctx, params.accountId);
	return ctx.store.listTransactions({ accountId: params.accountId, limit, offset });
}

export async function listAccountsByOwner(
	ctx: LedgerContext,
	ownerId: string,
): Promise<Account[]> {
	return ctx.store.listAccountsByOwner(ownerId);
}
