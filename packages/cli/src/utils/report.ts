// =============================================================================
// REPORT FORMATTING
// =============================================================================

import { type AccountStatus, ACCOUNT_STATUSES, minorToDecimal } from "@fundline/core";
import type { LedgerDatabase } from "@fundline/kysely-adapter";
import type { BalanceMismatch } from "fundline";
import type { Kysely } from "kysely";

export function sanitizeErrorMessage(message: string): string {
	return message
		.replace(/postgres(ql)?:\/\/[^\s]+/gi, "postgres://***")
		.replace(/(password|token|secret|key|pin)[=:]\s*\S+/gi, "$1=***");
}

export function formatMismatch(mismatch: BalanceMismatch, currency: string): string {
	const drift = minorToDecimal(mismatch.drift, currency);
	const signed = mismatch.drift > 0 ? `+${drift}` : drift;
	return `${mismatch.accountNumber}: stored ${minorToDecimal(mismatch.balance, currency)}, transactions ${minorToDecimal(mismatch.ledgerTotal, currency)} (drift ${signed})`;
}

// =============================================================================
// LEDGER STATUS
// =============================================================================

export interface LedgerStatus {
	accountsByStatus: Record<AccountStatus, number>;
	totalAccounts: number;
	totalTransactions: number;
	lastTransactionAt: Date | null;
	auditEntries: number;
}

function toCount(value: number | string | bigint | undefined): number {
	return value === undefined ? 0 : Number(value);
}

/** Row counts for the status command. */
export async function collectLedgerStatus(db: Kysely<LedgerDatabase>): Promise<LedgerStatus> {
	const accountRows = await db
		.selectFrom("ledger_account")
		.select(["status", db.fn.countAll<number | string>().as("count")])
		.groupBy("status")
		.execute();

	const accountsByStatus: Record<AccountStatus, number> = {
		ACTIVE: 0,
		INACTIVE: 0,
		SUSPENDED: 0,
		CLOSED: 0,
	};
	for (const row of accountRows) {
		const status = ACCOUNT_STATUSES.find((s) => s === row.status);
		if (status) accountsByStatus[status] = toCount(row.count);
	}

	const transactions = await db
		.selectFrom("ledger_transaction")
		.select([
			db.fn.countAll<number | string>().as("count"),
			db.fn.max("created_at").as("latest"),
		])
		.executeTakeFirst();

	const audit = await db
		.selectFrom("audit_log")
		.select(db.fn.countAll<number | string>().as("count"))
		.executeTakeFirst();

	const latest = transactions?.latest;
	return {
		accountsByStatus,
		totalAccounts: Object.values(accountsByStatus).reduce((sum, n) => sum + n, 0),
		totalTransactions: toCount(transactions?.count),
		lastTransactionAt: latest ? new Date(latest) : null,
		auditEntries: toCount(audit?.count),
	};
}
