// =============================================================================
// MEMORY STORE -- LedgerRecordStore backed by in-memory Maps
// =============================================================================
// Designed for unit testing and prototypes. No external database required.
//
// Transactions are copy-on-write: the callback works on a private clone and
// records its writes; on success the writes are replayed onto a fresh clone
// of the live state, which is then swapped in synchronously. A failing
// callback or a conflicting replay leaves the live state untouched.

import type {
	Account,
	AccountLedgerSummary,
	AccountWrite,
	LedgerRecordStore,
	LedgerStoreTransaction,
	LedgerTransaction,
	TransactionListParams,
} from "@fundline/core";
import { LedgerError, addMinor } from "@fundline/core";

// =============================================================================
// INTERNAL STATE
// =============================================================================

interface State {
	accounts: Map<string, Account>;
	/** account number -> account id */
	accountNumbers: Map<string, string>;
	/** Insertion order */
	transactions: LedgerTransaction[];
	references: Set<string>;
}

type WriteOp =
	| { kind: "insertAccount"; account: Account }
	| { kind: "saveAccounts"; writes: AccountWrite[] }
	| { kind: "saveTransactions"; transactions: LedgerTransaction[] };

function createState(): State {
	return {
		accounts: new Map(),
		accountNumbers: new Map(),
		transactions: [],
		references: new Set(),
	};
}

/**
 * Clone the state for copy-on-write transaction support. Records are
 * immutable once stored, so a shallow copy of each collection suffices.
 */
function cloneState(state: State): State {
	return {
		accounts: new Map(state.accounts),
		accountNumbers: new Map(state.accountNumbers),
		transactions: [...state.transactions],
		references: new Set(state.references),
	};
}

function copyAccount(account: Account): Account {
	return { ...account };
}

// =============================================================================
// WRITES (validate everything, then apply)
// =============================================================================

function applyInsertAccount(state: State, account: Account): void {
	if (state.accounts.has(account.id)) {
		throw LedgerError.invalidArgument(`Account ${account.id} already exists`);
	}
	if (state.accountNumbers.has(account.accountNumber)) {
		throw LedgerError.invalidArgument(`Account number ${account.accountNumber} already exists`);
	}
	state.accounts.set(account.id, copyAccount(account));
	state.accountNumbers.set(account.accountNumber, account.id);
}

function applySaveAccounts(state: State, writes: AccountWrite[]): void {
	for (const { account, expectedVersion } of writes) {
		const stored = state.accounts.get(account.id);
		if (!stored) throw LedgerError.accountNotFound(`Account ${account.id} not found`);
		if (stored.version !== expectedVersion) {
			throw LedgerError.optimisticLockConflict(
				`Account ${account.id} is at version ${stored.version}, expected ${expectedVersion}`,
			);
		}
	}
	for (const { account } of writes) {
		state.accounts.set(account.id, copyAccount(account));
	}
}

function applySaveTransactions(state: State, transactions: LedgerTransaction[]): void {
	const batch = new Set<string>();
	for (const txn of transactions) {
		if (state.references.has(txn.referenceNumber) || batch.has(txn.referenceNumber)) {
			throw LedgerError.duplicateReference(
				`Reference number ${txn.referenceNumber} already exists`,
			);
		}
		batch.add(txn.referenceNumber);
	}
	for (const txn of transactions) {
		state.transactions.push({ ...txn });
		state.references.add(txn.referenceNumber);
	}
}

function applyOp(state: State, op: WriteOp): void {
	switch (op.kind) {
		case "insertAccount":
			applyInsertAccount(state, op.account);
			return;
		case "saveAccounts":
			applySaveAccounts(state, op.writes);
			return;
		case "saveTransactions":
			applySaveTransactions(state, op.transactions);
			return;
	}
}

// =============================================================================
// STORE METHODS BUILDER
// =============================================================================

/**
 * Build the store methods over a state reference. `getState` is a closure so
 * that a transaction can point the same methods at its private clone.
 */
function buildStoreMethods(
	getState: () => State,
	record: (op: WriteOp) => void,
): LedgerStoreTransaction {
	return {
		getAccount: async (id) => {
			const account = getState().accounts.get(id);
			return account ? copyAccount(account) : null;
		},

		getAccountByNumber: async (accountNumber) => {
			const state = getState();
			const id = state.accountNumbers.get(accountNumber);
			const account = id ? state.accounts.get(id) : undefined;
			return account ? copyAccount(account) : null;
		},

		existsReference: async (referenceNumber) => getState().references.has(referenceNumber),

		existsAccountNumber: async (accountNumber) => getState().accountNumbers.has(accountNumber),

		listTransactions: async ({ accountId, limit, offset = 0 }: TransactionListParams) => {
			const matches = getState()
				.transactions.filter((t) => t.accountId === accountId)
				.reverse()
				.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
			const page = matches.slice(offset, limit === undefined ? undefined : offset + limit);
			return page.map((t) => ({ ...t }));
		},

		listAccountsByOwner: async (ownerId) => {
			return [...getState().accounts.values()]
				.filter((a) => a.ownerId === ownerId)
				.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
				.map(copyAccount);
		},

		summarizeBalances: async () => {
			const state = getState();
			const totals = new Map<string, { total: number; count: number }>();
			for (const txn of state.transactions) {
				if (txn.status !== "COMPLETED") continue;
				const entry = totals.get(txn.accountId) ?? { total: 0, count: 0 };
				entry.total = addMinor(entry.total, txn.type === "CREDIT" ? txn.amount : -txn.amount);
				entry.count += 1;
				totals.set(txn.accountId, entry);
			}
			return [...state.accounts.values()].map(
				(account): AccountLedgerSummary => ({
					accountId: account.id,
					accountNumber: account.accountNumber,
					balance: account.balance,
					availableBalance: account.availableBalance,
					ledgerTotal: totals.get(account.id)?.total ?? 0,
					transactionCount: totals.get(account.id)?.count ?? 0,
				}),
			);
		},

		insertAccount: async (account) => {
			const op: WriteOp = { kind: "insertAccount", account };
			applyOp(getState(), op);
			record(op);
		},

		saveAccounts: async (writes) => {
			const op: WriteOp = { kind: "saveAccounts", writes };
			applyOp(getState(), op);
			record(op);
		},

		saveTransactions: async (transactions) => {
			const op: WriteOp = { kind: "saveTransactions", transactions };
			applyOp(getState(), op);
			record(op);
		},
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

export interface MemoryStoreOptions {
	/**
	 * Offer `transaction()`. Turn off to exercise the engine's compensating
	 * rollback path. Default: true
	 */
	transactional?: boolean;
}

/**
 * Create a LedgerRecordStore backed by in-memory Maps.
 *
 * @example
 * ```ts
 * import { memoryStore, memoryAuditSink } from "@fundline/memory-adapter";
 *
 * const ledger = createLedger({
 *   store: memoryStore(),
 *   auditSink: memoryAuditSink(),
 *   identity,
 * });
 * ```
 */
export function memoryStore(options: MemoryStoreOptions = {}): LedgerRecordStore {
	let state = createState();

	const methods = buildStoreMethods(
		() => state,
		() => {},
	);

	if (options.transactional === false) {
		return { id: "memory", ...methods };
	}

	return {
		id: "memory",
		...methods,

		transaction: async <T>(fn: (tx: LedgerStoreTransaction) => Promise<T>): Promise<T> => {
			const snapshot = cloneState(state);
			const ops: WriteOp[] = [];
			const tx = buildStoreMethods(
				() => snapshot,
				(op) => ops.push(op),
			);

			const result = await fn(tx);

			// Commit: replay onto the current live state. Throws (and commits
			// nothing) if a concurrent write invalidated a version or reference.
			const next = cloneState(state);
			for (const op of ops) {
				applyOp(next, op);
			}
			state = next;
			return result;
		},
	};
}
