import type { Account, LedgerTransaction } from "@fundline/core";
import { isLedgerError } from "@fundline/core";
import { describe, expect, it } from "vitest";
import { memoryStore } from "../adapter.js";
import { memoryAuditSink } from "../audit-sink.js";

// =============================================================================
// HELPERS
// =============================================================================

const T0 = new Date("2024-03-01T09:00:00Z");

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
		ipAddress: null,
		userAgent: null,
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

// =============================================================================
// MEMORY STORE TESTS
// =============================================================================

describe("memoryStore", () => {
	it("returns a store with id 'memory' and transaction support", () => {
		const store = memoryStore();
		expect(store.id).toBe("memory");
		expect(store.transaction).toBeTypeOf("function");
	});

	it("omits transaction() when transactional is false", () => {
		const store = memoryStore({ transactional: false });
		expect(store.transaction).toBeUndefined();
	});

	// =========================================================================
	// ACCOUNTS
	// =========================================================================

	describe("accounts", () => {
		it("finds an inserted account by id and by number", async () => {
			const store = memoryStore();
			await store.insertAccount(account());

			expect((await store.getAccount("acc-1"))?.accountNumber).toBe("8031234567");
			expect((await store.getAccountByNumber("8031234567"))?.id).toBe("acc-1");
			expect(await store.existsAccountNumber("8031234567")).toBe(true);
			expect(await store.existsAccountNumber("0000000000")).toBe(false);
		});

		it("returns null for unknown accounts", async () => {
			const store = memoryStore();
			expect(await store.getAccount("missing")).toBeNull();
			expect(await store.getAccountByNumber("1111111111")).toBeNull();
		});

		it("returns copies, so caller mutations do not reach the store", async () => {
			const store = memoryStore();
			await store.insertAccount(account());
			const read = await store.getAccount("acc-1");
			if (!read) throw new Error("account missing");
			read.balance = 999;

			expect((await store.getAccount("acc-1"))?.balance).toBe(0);
		});

		it("rejects a duplicate account number", async () => {
			const store = memoryStore();
			await store.insertAccount(account());
			expect(await codeOf(store.insertAccount(account({ id: "acc-2" })))).toBe(
				"INVALID_ARGUMENT",
			);
		});

		it("saves accounts whose expected version matches", async () => {
			const store = memoryStore();
			await store.insertAccount(account());
			await store.saveAccounts([
				{ account: account({ balance: 700, availableBalance: 700, version: 2 }), expectedVersion: 1 },
			]);

			const saved = await store.getAccount("acc-1");
			expect(saved?.balance).toBe(700);
			expect(saved?.version).toBe(2);
		});

		it("rejects a stale version and writes none of the batch", async () => {
			const store = memoryStore();
			await store.insertAccount(account());
			await store.insertAccount(account({ id: "acc-2", accountNumber: "8039999999", version: 3 }));

			const code = await codeOf(
				store.saveAccounts([
					{ account: account({ balance: 100, version: 2 }), expectedVersion: 1 },
					{ account: account({ id: "acc-2", accountNumber: "8039999999", version: 3 }), expectedVersion: 2 },
				]),
			);

			expect(code).toBe("OPTIMISTIC_LOCK_CONFLICT");
			expect((await store.getAccount("acc-1"))?.balance).toBe(0);
		});

		it("lists an owner's accounts oldest first", async () => {
			const store = memoryStore();
			await store.insertAccount(
				account({ id: "b", accountNumber: "2222222222", createdAt: new Date("2024-03-02T00:00:00Z") }),
			);
			await store.insertAccount(account({ id: "a", accountNumber: "1111111111" }));
			await store.insertAccount(account({ id: "c", accountNumber: "3333333333", ownerId: "user-2" }));

			const owned = await store.listAccountsByOwner("user-1");
			expect(owned.map((a) => a.id)).toEqual(["a", "b"]);
		});
	});

	// =========================================================================
	// TRANSACTIONS
	// =========================================================================

	describe("transactions", () => {
		it("stores a batch and reports its references as existing", async () => {
			const store = memoryStore();
			await store.insertAccount(account());
			await store.saveTransactions([txn()]);

			expect(await store.existsReference("TXN202403010900000001")).toBe(true);
			expect(await store.existsReference("TXN202403010900000002")).toBe(false);
		});

		it("rejects a batch reusing a stored reference and stores nothing from it", async () => {
			const store = memoryStore();
			await store.saveTransactions([txn()]);

			const code = await codeOf(
				store.saveTransactions([
					txn({ id: "txn-2", referenceNumber: "TXN202403010900000002" }),
					txn({ id: "txn-3" }),
				]),
			);

			expect(code).toBe("DUPLICATE_REFERENCE");
			expect(await store.existsReference("TXN202403010900000002")).toBe(false);
		});

		it("rejects a batch that repeats a reference within itself", async () => {
			const store = memoryStore();
			const code = await codeOf(store.saveTransactions([txn(), txn({ id: "txn-2" })]));
			expect(code).toBe("DUPLICATE_REFERENCE");
		});

		it("lists an account's transactions newest first with paging", async () => {
			const store = memoryStore();
			await store.saveTransactions([
				txn({ id: "t1", referenceNumber: "R1" }),
				txn({ id: "t2", referenceNumber: "R2", createdAt: new Date("2024-03-01T10:00:00Z") }),
				txn({ id: "t3", referenceNumber: "R3" }),
				txn({ id: "other", referenceNumber: "R4", accountId: "acc-2" }),
			]);

			const all = await store.listTransactions({ accountId: "acc-1" });
			expect(all.map((t) => t.id)).toEqual(["t2", "t3", "t1"]);

			const page = await store.listTransactions({ accountId: "acc-1", limit: 1, offset: 1 });
			expect(page.map((t) => t.id)).toEqual(["t3"]);
		});

		it("summarizes balances against completed transactions only", async () => {
			const store = memoryStore();
			await store.insertAccount(account({ balance: 300, availableBalance: 300 }));
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
			]);
		});
	});

	// =========================================================================
	// TRANSACTION (copy-on-write)
	// =========================================================================

	describe("transaction", () => {
		it("commits every write when the callback resolves", async () => {
			const store = memoryStore();
			await store.insertAccount(account());

			await store.transaction?.(async (tx) => {
				await tx.saveAccounts([
					{ account: account({ balance: 500, availableBalance: 500, version: 2 }), expectedVersion: 1 },
				]);
				await tx.saveTransactions([txn()]);
			});

			expect((await store.getAccount("acc-1"))?.balance).toBe(500);
			expect(await store.existsReference("TXN202403010900000001")).toBe(true);
		});

		it("rolls back every write when the callback throws", async () => {
			const store = memoryStore();
			await store.insertAccount(account());

			await expect(
				store.transaction?.(async (tx) => {
					await tx.saveAccounts([
						{ account: account({ balance: 500, version: 2 }), expectedVersion: 1 },
					]);
					throw new Error("disk full");
				}),
			).rejects.toThrow("disk full");

			const after = await store.getAccount("acc-1");
			expect(after?.balance).toBe(0);
			expect(after?.version).toBe(1);
		});

		it("sees its own writes inside the callback but hides them outside until commit", async () => {
			const store = memoryStore();
			await store.insertAccount(account());

			await store.transaction?.(async (tx) => {
				await tx.saveAccounts([{ account: account({ balance: 42, version: 2 }), expectedVersion: 1 }]);
				expect((await tx.getAccount("acc-1"))?.balance).toBe(42);
				expect((await store.getAccount("acc-1"))?.balance).toBe(0);
			});

			expect((await store.getAccount("acc-1"))?.balance).toBe(42);
		});

		it("fails the commit when a concurrent write changed the version", async () => {
			const store = memoryStore();
			await store.insertAccount(account());

			const pending = store.transaction?.(async (tx) => {
				await tx.saveAccounts([{ account: account({ balance: 10, version: 2 }), expectedVersion: 1 }]);
				await store.saveAccounts([{ account: account({ balance: 20, version: 2 }), expectedVersion: 1 }]);
			});

			expect(await codeOf(pending ?? Promise.resolve())).toBe("OPTIMISTIC_LOCK_CONFLICT");
			expect((await store.getAccount("acc-1"))?.balance).toBe(20);
		});
	});
});

// =============================================================================
// MEMORY AUDIT SINK TESTS
// =============================================================================

describe("memoryAuditSink", () => {
	function entry(id: string, actorId: string | null, action: "TRANSACTION" | "ACCOUNT_UPDATE") {
		return {
			id,
			actorId,
			action,
			description: id,
			ipAddress: null,
			userAgent: null,
			additionalData: {},
			createdAt: T0,
		};
	}

	it("lists entries newest first", async () => {
		const sink = memoryAuditSink();
		await sink.append(entry("e1", "user-1", "TRANSACTION"));
		await sink.append(entry("e2", "user-1", "ACCOUNT_UPDATE"));

		expect((await sink.list()).map((e) => e.id)).toEqual(["e2", "e1"]);
	});

	it("filters by actor and action", async () => {
		const sink = memoryAuditSink();
		await sink.append(entry("e1", "user-1", "TRANSACTION"));
		await sink.append(entry("e2", "user-2", "TRANSACTION"));
		await sink.append(entry("e3", "user-1", "ACCOUNT_UPDATE"));

		const result = await sink.list({ actorId: "user-1", action: "TRANSACTION" });
		expect(result.map((e) => e.id)).toEqual(["e1"]);
	});

	it("pages with limit and offset", async () => {
		const sink = memoryAuditSink();
		for (const id of ["e1", "e2", "e3"]) {
			await sink.append(entry(id, null, "TRANSACTION"));
		}

		const result = await sink.list({ limit: 1, offset: 1 });
		expect(result.map((e) => e.id)).toEqual(["e2"]);
	});
});
