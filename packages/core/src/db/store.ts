// =============================================================================
// LEDGER RECORD STORE INTERFACE
// =============================================================================
// Durable home of Account and LedgerTransaction rows. The engine reaches
// persistence only through this interface; adapters exist for the in-memory
// store (tests, prototypes) and SQL through Kysely.
//
// Contract every adapter honours:
// - saveAccounts writes all rows or none, and rejects a row whose stored
//   version differs from `expectedVersion` with OPTIMISTIC_LOCK_CONFLICT.
// - saveTransactions writes its whole batch or nothing, and rejects a batch
//   carrying a reference number already stored with DUPLICATE_REFERENCE.
// - Transactions are never updated or deleted.

import type { Account, AccountLedgerSummary } from "../types/account.js";
import type { LedgerTransaction } from "../types/transaction.js";

export interface AccountWrite {
	account: Account;
	/** Version the stored row must still carry for the write to apply */
	expectedVersion: number;
}

export interface TransactionListParams {
	accountId: string;
	limit?: number;
	offset?: number;
}

export interface LedgerStoreReader {
	getAccount(id: string): Promise<Account | null>;

	getAccountByNumber(accountNumber: string): Promise<Account | null>;

	existsReference(referenceNumber: string): Promise<boolean>;

	existsAccountNumber(accountNumber: string): Promise<boolean>;

	/** Newest first */
	listTransactions(params: TransactionListParams): Promise<LedgerTransaction[]>;

	listAccountsByOwner(ownerId: string): Promise<Account[]>;

	/** One row per account, for ledger identity checks */
	summarizeBalances(): Promise<AccountLedgerSummary[]>;
}

export interface LedgerStoreWriter {
	insertAccount(account: Account): Promise<void>;

	saveAccounts(writes: AccountWrite[]): Promise<void>;

	saveTransactions(transactions: LedgerTransaction[]): Promise<void>;
}

export type LedgerStoreTransaction = LedgerStoreReader & LedgerStoreWriter;

export interface LedgerRecordStore extends LedgerStoreReader, LedgerStoreWriter {
	id: string;

	/**
	 * Run `fn` so that every write inside it commits together or not at all.
	 * Stores that cannot offer multi-statement atomicity leave this out; the
	 * engine then applies compensating writes on failure.
	 */
	transaction?: <T>(fn: (tx: LedgerStoreTransaction) => Promise<T>) => Promise<T>;
}
