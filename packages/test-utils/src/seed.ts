// =============================================================================
// SEEDING -- Accounts with opening balances
// =============================================================================

import type { Account } from "@fundline/core";
import type { Ledger } from "fundline";

export interface SeedAccountParams {
	ownerId: string;
	/** Opening balance as a decimal string. Default: "0.00" */
	balance?: string;
	accountTypeId?: string;
	isPrimary?: boolean;
}

/**
 * Open an account and fund it with a deposit, so the opening balance is
 * backed by a CREDIT row and the ledger identity holds from the start.
 */
export async function seedAccount(ledger: Ledger, params: SeedAccountParams): Promise<Account> {
	const { account } = await ledger.accounts.open({
		ownerId: params.ownerId,
		accountTypeId: params.accountTypeId ?? "savings",
		isPrimary: params.isPrimary,
	});

	const balance = params.balance ?? "0.00";
	if (Number(balance) > 0) {
		await ledger.transfers.deposit({
			accountId: account.id,
			amount: balance,
			description: "Opening balance",
			actorId: "seed",
		});
	}
	return ledger.accounts.get(account.id);
}
