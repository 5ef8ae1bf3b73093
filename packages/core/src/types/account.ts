export type AccountStatus = "ACTIVE" | "INACTIVE" | "SUSPENDED" | "CLOSED";

export const ACCOUNT_STATUSES: readonly AccountStatus[] = [
	"ACTIVE",
	"INACTIVE",
	"SUSPENDED",
	"CLOSED",
] as const;

export interface Account {
	/** Random UUID, immutable */
	id: string;
	/** Ten-digit customer-facing number, unique */
	accountNumber: string;
	ownerId: string;
	accountTypeId: string;
	currency: string;
	/** Ledger total in smallest units (kobo/cents) */
	balance: number;
	/** Balance minus holds. Equal to `balance` after every completed operation. */
	availableBalance: number;
	status: AccountStatus;
	isPrimary: boolean;
	/** Incremented on every write; stores reject writes with a stale version */
	version: number;
	createdAt: Date;
	updatedAt: Date;
}

export interface AccountBalance {
	accountId: string;
	accountNumber: string;
	/** Ledger total in smallest units */
	balance: number;
	availableBalance: number;
	/** Decimal string for display (e.g., "35000.00") */
	balanceDecimal: string;
	availableBalanceDecimal: string;
	currency: string;
}

/** Stored balances next to the total of the account's completed transactions. */
export interface AccountLedgerSummary {
	accountId: string;
	accountNumber: string;
	balance: number;
	availableBalance: number;
	/** Σ CREDIT − Σ DEBIT over COMPLETED transactions */
	ledgerTotal: number;
	transactionCount: number;
}
