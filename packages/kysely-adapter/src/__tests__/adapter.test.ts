import type { Account, LedgerTransaction } from "@fundline/core";
import { isLedgerError } from "@fundline/core";
import { assertAccountBalance, assertLedgerIdentity, getTestInstance, seedAccount } from "@fundline/test-utils";
import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isUniqueViolation, kyselyStore } from "../adapter.js";
import { kyselyAuditSink } from "../audit-sink.js";
import { getMigrationStatus, migrateToLatest } from "../migrations.js";
import type { LedgerDatabase } from "../schema.js";

// =============================================================================
// HELPERS
// =============================================================================

const T0 = new Date("2024-03-01T09:00:00.000Z");

function account(overrides: Partial<Account> = {}): Account {
	return {
		id: "acc-1",
		accountNumber: "8031234567",
		ownerId: "user-1",
		accountTypeId: "savings",
		currency: "NGN",
		balance: 0,
		availableBalance: 0,
		status: "ACTIVE",
		isPrimary: true,
		version: 1,
		createdAt: T0,
		updatedAt: T0,
		...overrides,
	};
}

function txn(overrides: Partial<LedgerTransaction> = {}): LedgerTransaction {
	return {
		id: "txn-1",
		referenceNumber: "TXN202403010900000001",
		accountId: "acc-1",
		type: "CREDIT",
		category: "deposit",
		amount: 500,
		balanceBefore: 0,
		balanceAfter: 500,
		description: "Deposit",
		status: "COMPLETED",
		counterpartyAccountNumber: null,
		counterpartyName: null,
		correlationId: "corr-1",
		counterpartReference: null,
		ipAddress: "10.0.0.1",
		userAgent: "test-agent",
		createdAt: T0,
		...overrides,
	};
}

async function codeOf(promise: Promise<unknown>): Promise<string> {
	try {
		await promise;
	} catch (error) {
		if (isLedgerError(error)) return error.code;
		throw error;
	}
	throw new Error("expected rejection");
}

let db: Kysely<LedgerDatabase>;

beforeEach(async () => {
	db = new Kysely<LedgerDatabase>({
		dialect: new SqliteDialect({ database: new SQLite(":memory:") }),
	});
	await migrateToLatest(db, "sqlite");
});

afterEach(async () => {
	await db.destroy();
});

// =============================================================================
// KYSELY STORE TESTS
// =============================================================================

describe("kyselyStore", () => {
	it("round-trips an account with its types intact", async () => {
		const store = kyselyStore(db);
		await store.insertAccount(account({ balance: 1250, availableBalance: 1250 }));

		expect(await store.getAccount("acc-1")).toEqual(
			account({ balance: 1250, availableBalance: 1250 }),
		);
		expect((await store.getAccountByNumber("8031234567"))?.id).toBe("acc-1");
		expect(await store.existsAccountNumber("8031234567")).toBe(true);
		expect(await store.getAccount("missing")).toBeNull();
	});

	it("rejects a second primary account for the same owner", async () => {
		const store = kyselyStore(db);
		await store.insertAccount(account());

		const code = await codeOf(
			store.insertAccount(account({ id: "acc-2", accountNumber: "8030000000" })),
		);
		expect(code).toBe("INVALID_ARGUMENT");
	});

	it("updates accounts only at the expected version", async () => {
		const store = kyselyStore(db);
		await store.insertAccount(account());

		await store.saveAccounts([
			{ account: account({ balance: 900, availableBalance: 900, version: 2 }), expectedVersion: 1 },
		]);
		const code = await codeOf(
			store.saveAccounts([{ account: account({ balance: 5, version: 2 }), expectedVersion: 1 }]),
		);

		expect(code).toBe("OPTIMISTIC_LOCK_CONFLICT");
		const stored = await store.getAccount("acc-1");
		expect(stored?.balance).toBe(900);
		expect(stored?.version).toBe(2);
	});

	it("writes none of a multi-account batch when one version is stale", async () => {
		const store = kyselyStore(db);
		await store.insertAccount(account());
		await store.insertAccount(
			account({ id: "acc-2", accountNumber: "8039999999", ownerId: "user-2", version: 4 }),
		);

		const code = await codeOf(
			store.saveAccounts([
				{ account: account({ balance: 100, version: 2 }), expectedVersion: 1 },
				{
					account: account({ id: "acc-2", accountNumber: "8039999999", ownerId: "user-2", version: 4 }),
					expectedVersion: 3,
				},
			]),
		);

		expect(code).toBe("OPTIMISTIC_LOCK_CONFLICT");
		expect((await store.getAccount("acc-1"))?.balance).toBe(0);
	});

	it("maps a reused reference number to DUPLICATE_REFERENCE", async () => {
		const store = kyselyStore(db);
		await store.insertAccount(account());
		await store.saveTransactions([txn()]);

		expect(await store.existsReference("TXN202403010900000001")).toBe(true);
		expect(await codeOf(store.saveTransactions([txn({ id: "txn-2" })]))).toBe("DUPLICATE_REFERENCE");
	});

	it("lists transactions newest first with paging", async () => {
		const store = kyselyStore(db);
		await store.insertAccount(account());
		await store.saveTransactions([
			txn({ id: "t1", referenceNumber: "R1", createdAt: new Date("2024-03-01T09:00:00.000Z") }),
			txn({ id: "t2", referenceNumber: "R2", createdAt: new Date("2024-03-01T11:00:00.000Z") }),
			txn({ id: "t3", referenceNumber: "R3", createdAt: new Date("2024-03-01T10:00:00.000Z") }),
		]);

		const all = await store.listTransactions({ accountId: "acc-1" });
		expect(all.map((t) => t.id)).toEqual(["t2", "t3", "t1"]);
		expect(all[0]).toEqual(
			txn({ id: "t2", referenceNumber: "R2", createdAt: new Date("2024-03-01T11:00:00.000Z") }),
		);

		const page = await store.listTransactions({ accountId: "acc-1", limit: 2, offset: 1 });
		expect(page.map((t) => t.id)).toEqual(["t3", "t1"]);
	});

	it("summarizes stored balances against completed transactions", async () => {
		const store = kyselyStore(db);
		await store.insertAccount(account({ balance: 300, availableBalance: 300 }));
		await store.insertAccount(
			account({ id: "acc-2", accountNumber: "8039999999", ownerId: "user-2", balance: 7, availableBalance: 7 }),
		);
		await store.saveTransactions([
			txn({ id: "t1", referenceNumber: "R1", amount: 500 }),
			txn({ id: "t2", referenceNumber: "R2", type: "DEBIT", amount: 200 }),
			txn({ id: "t3", referenceNumber: "R3", amount: 50, status: "FAILED" }),
		]);

		expect(await store.summarizeBalances()).toEqual([
			{
				accountId: "acc-1",
				accountNumber: "8031234567",
				balance: 300,
				availableBalance: 300,
				ledgerTotal: 300,
				transactionCount: 2,
			},
			{
				accountId: "acc-2",
				accountNumber: "8039999999",
				balance: 7,
				availableBalance: 7,
				ledgerTotal: 0,
				transactionCount: 0,
			},
		]);
	});

	it("rolls back account and transaction writes when the transaction callback throws", async () => {
		const store = kyselyStore(db);
		await store.insertAccount(account());

		await expect(
			store.transaction?.(async (tx) => {
				await tx.saveAccounts([
					{ account: account({ balance: 500, availableBalance: 500, version: 2 }), expectedVersion: 1 },
				]);
				await tx.saveTransactions([txn()]);
				throw new Error("connection reset");
			}),
		).rejects.toThrow("connection reset");

		expect((await store.getAccount("acc-1"))?.balance).toBe(0);
		expect(await store.existsReference("TXN202403010900000001")).toBe(false);
	});
});

// =============================================================================
// ERROR CLASSIFICATION
// =============================================================================

describe("isUniqueViolation", () => {
	it("recognizes PostgreSQL and SQLite unique violations", () => {
		const pg = Object.assign(new Error("duplicate key value violates unique constraint"), {
			code: "23505",
		});
		const sqlite = Object.assign(new Error("UNIQUE constraint failed: ledger_transaction.reference_number"), {
			code: "SQLITE_CONSTRAINT_UNIQUE",
		});

		expect(isUniqueViolation(pg)).toBe(true);
		expect(isUniqueViolation(sqlite)).toBe(true);
		expect(isUniqueViolation(new Error("connection refused"))).toBe(false);
		expect(isUniqueViolation("23505")).toBe(false);
	});
});

// =============================================================================
// KYSELY AUDIT SINK TESTS
// =============================================================================

describe("kyselyAuditSink", () => {
	it("stores entries with their additional data and lists newest first", async () => {
		const sink = kyselyAuditSink(db);
		await sink.append({
			id: "a1",
			actorId: "user-1",
			action: "TRANSACTION",
			description: "Transfer of 150.00 NGN to 8039999999",
			ipAddress: "10.0.0.1",
			userAgent: "test-agent",
			additionalData: { referenceNumber: "TXN202403010900000001", amount: "150.00" },
			createdAt: T0,
		});
		await sink.append({
			id: "a2",
			actorId: "user-2",
			action: "ACCOUNT_UPDATE",
			description: "Account 8039999999 opened",
			ipAddress: null,
			userAgent: null,
			additionalData: {},
			createdAt: new Date("2024-03-01T09:05:00.000Z"),
		});

		const all = await sink.list();
		expect(all.map((e) => e.id)).toEqual(["a2", "a1"]);
		expect(all[1]).toEqual({
			id: "a1",
			actorId: "user-1",
			action: "TRANSACTION",
			description: "Transfer of 150.00 NGN to 8039999999",
			ipAddress: "10.0.0.1",
			userAgent: "test-agent",
			additionalData: { amount: "150.00", referenceNumber: "TXN202403010900000001" },
			createdAt: T0,
		});

		const filtered = await sink.list({ actorId: "user-1", action: "TRANSACTION" });
		expect(filtered.map((e) => e.id)).toEqual(["a1"]);
	});
});

// =============================================================================
// ENGINE OVER SQLITE
// =============================================================================

describe("ledger engine on the kysely store", () => {
	it("transfers funds and keeps the ledger identity", async () => {
		const { ledger } = await getTestInstance({
			store: kyselyStore(db),
			auditSink: kyselyAuditSink(db),
			pins: { alice: "1234" },
		});
		const alice = await seedAccount(ledger, { ownerId: "alice", balance: "500.00" });
		const bob = await seedAccount(ledger, { ownerId: "bob" });

		const result = await ledger.transfers.transfer({
			identity: "alice",
			sourceAccountId: alice.id,
			destinationAccountNumber: bob.accountNumber,
			amount: "150.00",
			authorization: "1234",
		});

		expect(result.sourceBalanceDecimal).toBe("350.00");
		await assertAccountBalance(ledger, bob.id, "150.00");
		await assertLedgerIdentity(ledger);

		const history = await ledger.accounts.history({ accountId: bob.id });
		expect(history).toEqual([result.credit]);
		const [entry] = await ledger.audit.list({ actorId: "alice", action: "TRANSACTION" });
		expect(entry?.additionalData.referenceNumber).toBe(result.referenceNumber);
	});
});

describe("migrations", () => {
	it("records the applied migration and is idempotent", async () => {
		const again = await migrateToLatest(db, "sqlite");
		expect(again.results).toEqual([]);

		const status = await getMigrationStatus(db, "sqlite");
		expect(status.map((m) => m.name)).toEqual(["0001_ledger_tables"]);
		expect(status[0]?.executedAt).toBeDefined();
	});
});
