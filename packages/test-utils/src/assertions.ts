import { isLedgerError, type LedgerError, type LedgerErrorCode } from "@fundline/core";
import type { Ledger } from "fundline";

/**
 * Assert that the ledger identity holds for every account: the stored
 * balance equals the sum of its COMPLETED transactions.
 */
export async function assertLedgerIdentity(ledger: Ledger): Promise<void> {
	const result = await ledger.ledger.verify();
	if (!result.healthy) {
		const lines = result.mismatches.map(
			(m) => `${m.accountNumber}: stored ${m.balance}, ledger ${m.ledgerTotal}`,
		);
		throw new Error(`Ledger identity violated:\n${lines.join("\n")}`);
	}
}

/**
 * Assert that a specific account has the expected balance, as a decimal
 * string ("35000.00").
 */
export async function assertAccountBalance(
	ledger: Ledger,
	accountId: string,
	expectedBalance: string,
): Promise<void> {
	const balance = await ledger.accounts.getBalance(accountId);
	if (balance.balanceDecimal !== expectedBalance) {
		throw new Error(
			`Account ${balance.accountNumber}: expected balance ${expectedBalance}, got ${balance.balanceDecimal}`,
		);
	}
	if (balance.availableBalance !== balance.balance) {
		throw new Error(
			`Account ${balance.accountNumber}: available balance ${balance.availableBalanceDecimal} differs from balance ${balance.balanceDecimal}`,
		);
	}
}

/**
 * Await a promise that must reject with a LedgerError of `code`. Returns the
 * error for further assertions.
 */
export async function expectLedgerError(
	promise: Promise<unknown>,
	code: LedgerErrorCode,
): Promise<LedgerError> {
	try {
		await promise;
	} catch (error) {
		if (!isLedgerError(error)) {
			throw new Error(`Expected LedgerError ${code}, got ${String(error)}`);
		}
		if (error.code !== code) {
			throw new Error(`Expected LedgerError ${code}, got ${error.code}: ${error.message}`);
		}
		return error;
	}
	throw new Error(`Expected LedgerError ${code}, but the promise resolved`);
}
