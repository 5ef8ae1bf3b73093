// =============================================================================
// KYSELY STORE -- LedgerRecordStore implementation backed by Kysely
// =============================================================================
// Runs against PostgreSQL in production and SQLite in tests. Account writes
// are conditional on the stored version (UPDATE ... WHERE version = ?), so
// several processes sharing one database cannot lose updates even when each
// only holds its own in-process account locks.

import type {
	AccountWrite,
	LedgerRecordStore,
	LedgerStoreTransaction,
	LedgerTransaction,
} from "@fundline/core";
import { LedgerError } from "@fundline/core";
import type { Kysely, Transaction } from "kysely";
import { sql } from "kysely";
import {
	accountToRow,
	rowToAccount,
	rowToTransaction,
	toNumber,
	transactionToRow,
} from "./row-mappers.js";
import type { LedgerDatabase } from "./schema.js";

type Executor = Kysely<LedgerDatabase> | Transaction<LedgerDatabase>;

// =============================================================================
// ERROR CLASSIFICATION
// =============================================================================

/**
 * Unique-constraint violation on either driver.
 * PostgreSQL: SQLSTATE 23505. SQLite: SQLITE_CONSTRAINT_UNIQUE.
 */
export function isUniqueViolation(err: unknown): boolean {
	if (!(err instanceof Error)) return false;
	if ("code" in err) {
		const code = err.code;
		if (code === "23505" || code === "SQLITE_CONSTRAINT_UNIQUE") return true;
	}
	return err.message.includes("UNIQUE constraint failed") || err.message.includes("duplicate key");
}

// =============================================================================
// STORE METHODS BUILDER
// =============================================================================

/**
 * Build the store methods for a Kysely database or transaction handle.
 */
function buildStoreMethods(db: Executor): LedgerStoreTransaction {
	async function updateAccounts(executor: Executor, writes: AccountWrite[]): Promise<void> {
		for (const { account, expectedVersion } of writes) {
			const row = accountToRow(account);
			const result = await executor
				.updateTable("ledger_account")
				.set({
					balance: row.balance,
					available_balance: row.available_balance,
					status: row.status,
					is_primary: row.is_primary,
					version: row.version,
					updated_at: row.updated_at,
				})
				.where("id", "=", account.id)
				.where("version", "=", expectedVersion)
				.executeTakeFirst();

			if (result.numUpdatedRows === 0n) {
				throw LedgerError.optimisticLockConflict(
					`Account ${account.id} changed since version ${expectedVersion}`,
				);
			}
		}
	}

	async function insertTransactions(
		executor: Executor,
		transactions: LedgerTransaction[],
	): Promise<void> {
		try {
			await executor
				.insertInto("ledger_transaction")
				.values(transactions.map(transactionToRow))
				.execute();
		} catch (err) {
			if (isUniqueViolation(err)) {
				throw LedgerError.duplicateReference(undefined, err);
			}
			throw err;
		}
	}

	return {
		getAccount: async (id) => {
			const row = await db
				.selectFrom("ledger_account")
				.selectAll()
				.where("id", "=", id)
				.executeTakeFirst();
			return row ? rowToAccount(row) : null;
		},

		getAccountByNumber: async (accountNumber) => {
			const row = await db
				.selectFrom("ledger_account")
				.selectAll()
				.where("account_number", "=", accountNumber)
				.executeTakeFirst();
			return row ? rowToAccount(row) : null;
		},

		existsReference: async (referenceNumber) => {
			const row = await db
				.selectFrom("ledger_transaction")
				.select("id")
				.where("reference_number", "=", referenceNumber)
				.executeTakeFirst();
			return row !== undefined;
		},

		existsAccountNumber: async (accountNumber) => {
			const row = await db
				.selectFrom("ledger_account")
				.select("id")
				.where("account_number", "=", accountNumber)
				.executeTakeFirst();
			return row !== undefined;
		},

		listTransactions: async ({ accountId, limit, offset = 0 }) => {
			let query = db
				.selectFrom("ledger_transaction")
				.selectAll()
				.where("account_id", "=", accountId)
				.orderBy("created_at", "desc")
				.orderBy("id", "desc");
			if (limit !== undefined) {
				query = query.limit(limit).offset(offset);
			}
			const rows = await query.execute();
			return rows.map(rowToTransaction);
		},

		listAccountsByOwner: async (ownerId) => {
			const rows = await db
				.selectFrom("ledger_account")
				.selectAll()
				.where("owner_id", "=", ownerId)
				.orderBy("created_at", "asc")
				.execute();
			return rows.map(rowToAccount);
		},

		summarizeBalances: async () => {
			const rows = await db
				.selectFrom("ledger_account as a")
				.leftJoin("ledger_transaction as t", (join) =>
					join.onRef("t.account_id", "=", "a.id").on("t.status", "=", "COMPLETED"),
				)
				.select([
					"a.id",
					"a.account_number",
					"a.balance",
					"a.available_balance",
					sql<
						number | string
					>`coalesce(sum(case when t.type = 'CREDIT' then t.amount else -t.amount end), 0)`.as(
						"ledger_total",
					),
					sql<number | string>`count(t.id)`.as("transaction_count"),
				])
				.groupBy(["a.id", "a.account_number", "a.balance", "a.available_balance"])
				.orderBy("a.account_number")
				.execute();

			return rows.map((row) => ({
				accountId: row.id,
				accountNumber: row.account_number,
				balance: toNumber(row.balance),
				availableBalance: toNumber(row.available_balance),
				ledgerTotal: toNumber(row.ledger_total),
				transactionCount: toNumber(row.transaction_count),
			}));
		},

		insertAccount: async (account) => {
			try {
				await db.insertInto("ledger_account").values(accountToRow(account)).execute();
			} catch (err) {
				if (isUniqueViolation(err)) {
					throw LedgerError.invalidArgument(
						`Account ${account.accountNumber} conflicts with an existing account`,
						err,
					);
				}
				throw err;
			}
		},

		saveAccounts: async (writes) => {
			if (db.isTransaction) {
				await updateAccounts(db, writes);
				return;
			}
			await db.transaction().execute((tx) => updateAccounts(tx, writes));
		},

		saveTransactions: async (transactions) => {
			if (transactions.length === 0) return;
			await insertTransactions(db, transactions);
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a LedgerRecordStore backed by a Kysely database instance. Run
 * `migrateToLatest` once before first use.
 *
 * @example
 * ```ts
 * import { Kysely, PostgresDialect } from "kysely";
 * import { Pool } from "pg";
 * import { kyselyStore, type LedgerDatabase } from "@fundline/kysely-adapter";
 *
 * const db = new Kysely<LedgerDatabase>({
 *   dialect: new PostgresDialect({ pool: new Pool({ connectionString: process.env.DATABASE_URL }) }),
 * });
 * const store = kyselyStore(db);
 * ```
 */
export function kyselyStore(db: Kysely<LedgerDatabase>): LedgerRecordStore {
	const methods = buildStoreMethods(db);

	return {
		id: "kysely",
		...methods,

		transaction: async <T>(fn: (tx: LedgerStoreTransaction) => Promise<T>): Promise<T> => {
			return db.transaction().execute(async (tx) => fn(buildStoreMethods(tx)));
		},
	};
}
