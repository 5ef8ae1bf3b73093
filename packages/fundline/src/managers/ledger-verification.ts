// =============================================================================
// LEDGER VERIFICATION
// =============================================================================
// Checks the ledger identity for every account: the stored balance (and the
// available balance, which carries no holds) must equal the sum of the
// account's COMPLETED transactions.

import type { AccountLedgerSummary, LedgerContext } from "@fundline/core";
import { subtractMinor } from "@fundline/core";

export interface BalanceMismatch extends AccountLedgerSummary {
	/** balance − ledgerTotal */
	drift: number;
}

export interface LedgerVerificationResult {
	healthy: boolean;
	accountsChecked: number;
	transactionsChecked: number;
	mismatches: BalanceMismatch[];
	checkedAt: Date;
}

export async function verifyLedger(ctx: LedgerContext): Promise<LedgerVerificationResult> {
	const summaries = await ctx.store.summarizeBalances();
	const mismatches: BalanceMismatch[] = [];
	let transactionsChecked = 0;

	for (const summary of summaries) {
		transactionsChecked += summary.transactionCount;
		if (summary.balance !== summary.ledgerTotal || summary.availableBalance !== summary.ledgerTotal) {
			mismatches.push({ ...summary, drift: subtractMinor(summary.balance, summary.ledgerTotal) });
		}
	}

	if (mismatches.length > 0) {
		ctx.logger.error("Ledger verification found balance mismatches", {
			count: mismatches.length,
			accounts: mismatches.map((m) => m.accountNumber),
		});
	} else {
		ctx.logger.debug("Ledger verification passed", { accountsChecked: summaries.length });
	}

	return {
		healthy: mismatches.length === 0,
		accountsChecked: summaries.length,
		transactionsChecked,
		mismatches,
		checkedAt: new Date(),
	};
}
