// =============================================================================
// LEDGER -- Main entry point
// =============================================================================
// Creates the ledger instance that provides the full transfer API.

import type {
	Account,
	AccountBalance,
	AccountStatus,
	AuditLogEntry,
	AuditQuery,
	LedgerContext,
	LedgerOptions,
	LedgerTransaction,
	OriginMetadata,
} from "@fundline/core";
import { LedgerError } from "@fundline/core";
import { validateConfig } from "../config/index.js";
import { buildContext } from "../context/context.js";
import * as accounts from "../managers/account-manager.js";
import { type LedgerVerificationResult, verifyLedger } from "../managers/ledger-verification.js";
import * as transfers from "../managers/transfer-manager.js";

// =============================================================================
// LEDGER INTERFACE
// =============================================================================

export interface Ledger {
	transfers: {
		transfer: (params: transfers.TransferParams) => Promise<transfers.TransferResult>;
		deposit: (params: transfers.DepositParams) => Promise<transfers.DepositResult>;
	};
	accounts: {
		open: (params: accounts.OpenAccountParams) => Promise<accounts.OpenAccountResult>;
		setStatus: (params: {
			accountId: string;
			status: AccountStatus;
			reason?: string;
			actorId?: string | null;
			origin?: OriginMetadata;
		}) => Promise<accounts.SetStatusResult>;
		get: (accountId: string) => Promise<Account>;
		getByNumber: (accountNumber: string) => Promise<Account>;
		getBalance: (accountId: string) => Promise<AccountBalance>;
		history: (params: {
			accountId: string;
			limit?: number;
			offset?: number;
		}) => Promise<LedgerTransaction[]>;
		listByOwner: (ownerId: string) => Promise<Account[]>;
	};
	ledger: {
		verify: () => Promise<LedgerVerificationResult>;
	};
	audit: {
		/** Newest first. Fails with INVALID_ARGUMENT when the sink cannot list. */
		list: (query?: AuditQuery) => Promise<AuditLogEntry[]>;
	};
	$context: Promise<LedgerContext>;
	$options: LedgerOptions;
}

// =============================================================================
// CREATE LEDGER
// =============================================================================

export function createLedger(options: LedgerOptions): Ledger {
	validateConfig(options);

	const ctxPromise = buildContext(options);
	const getCtx = () => ctxPromise;

	return {
		transfers: {
			transfer: async (params) => {
				const ctx = await getCtx();
				return transfers.transfer(ctx, params);
			},
			deposit: async (params) => {
				const ctx = await getCtx();
				return transfers.deposit(ctx, params);
			},
		},
		accounts: {
			open: async (params) => {
				const ctx = await getCtx();
				return accounts.openAccount(ctx, params);
			},
			setStatus: async (params) => {
				const ctx = await getCtx();
				return accounts.setAccountStatus(ctx, params);
			},
			get: async (accountId) => {
				const ctx = await getCtx();
				return accounts.getAccountById(ctx, accountId);
			},
			getByNumber: async (accountNumber) => {
				const ctx = await getCtx();
				return accounts.getAccountByNumber(ctx, accountNumber);
			},
			getBalance: async (accountId) => {
				const ctx = await getCtx();
				return accounts.getAccountBalance(ctx, accountId);
			},
			history: async (params) => {
				const ctx = await getCtx();
				return accounts.getAccountHistory(ctx, params);
			},
			listByOwner: async (ownerId) => {
				const ctx = await getCtx();
				return accounts.listAccountsByOwner(ctx, ownerId);
			},
		},
		ledger: {
			verify: async () => {
				const ctx = await getCtx();
				return verifyLedger(ctx);
			},
		},
		audit: {
			list: async (query) => {
				const ctx = await getCtx();
				if (!ctx.auditSink.list) {
					throw LedgerError.invalidArgument(`Audit sink "${ctx.auditSink.id}" does not support listing`);
				}
				return ctx.auditSink.list(query);
			},
		},
		$context: ctxPromise,
		$options: options,
	};
}
