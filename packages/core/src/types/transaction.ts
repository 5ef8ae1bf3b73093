export type TransactionType = "CREDIT" | "DEBIT";
export type TransactionStatus = "PENDING" | "COMPLETED" | "FAILED" | "CANCELLED";
export type TransactionCategory = "transfer" | "deposit";

export interface OriginMetadata {
	ipAddress?: string | null;
	userAgent?: string | null;
}

export interface LedgerTransaction {
	id: string;
	/** Human-facing identifier, globally unique and never reused */
	referenceNumber: string;
	accountId: string;
	type: TransactionType;
	category: TransactionCategory;
	/** Amount in smallest units, always > 0 */
	amount: number;
	balanceBefore: number;
	balanceAfter: number;
	description: string;
	status: TransactionStatus;
	counterpartyAccountNumber: string | null;
	counterpartyName: string | null;
	/** Shared by both legs of a transfer */
	correlationId: string;
	/** Reference number of the opposite leg, null for single-leg entries */
	counterpartReference: string | null;
	ipAddress: string | null;
	userAgent: string | null;
	createdAt: Date;
}
