import { isLedgerError } from "@fundline/core";
import {
	assertAccountBalance,
	assertLedgerIdentity,
	getTestInstance,
	seedAccount,
} from "@fundline/test-utils";
import { describe, expect, it } from "vitest";

const PINS = { alice: "1234", bob: "5678" };

async function setup(aliceBalance: string, bobBalance: string) {
	const { ledger } = await getTestInstance({ pins: PINS });
	const alice = await seedAccount(ledger, { ownerId: "alice", balance: aliceBalance });
	const bob = await seedAccount(ledger, { ownerId: "bob", balance: bobBalance });
	return { ledger, alice, bob };
}

describe("concurrent transfers", () => {
	it("never overdraws: exactly floor(balance / amount) debits succeed", async () => {
		const { ledger, alice, bob } = await setup("1000.00", "0.00");

		const results = await Promise.allSettled(
			Array.from({ length: 7 }, () =>
				ledger.transfers.transfer({
					identity: "alice",
					sourceAccountId: alice.id,
					destinationAccountNumber: bob.accountNumber,
					amount: "300.00",
					authorization: "1234",
				}),
			),
		);

		const fulfilled = results.filter((r) => r.status === "fulfilled");
		const rejectionCodes = results.flatMap((r) =>
			r.status === "rejected" && isLedgerError(r.reason) ? [r.reason.code] : [],
		);

		expect(fulfilled).toHaveLength(3);
		expect(rejectionCodes).toEqual([
			"INSUFFICIENT_FUNDS",
			"INSUFFICIENT_FUNDS",
			"INSUFFICIENT_FUNDS",
			"INSUFFICIENT_FUNDS",
		]);
		await assertAccountBalance(ledger, alice.id, "100.00");
		await assertAccountBalance(ledger, bob.id, "900.00");
		await assertLedgerIdentity(ledger);
	});

	it("assigns a distinct reference to every leg", async () => {
		const { ledger, alice, bob } = await setup("100.00", "0.00");

		const results = await Promise.all(
			Array.from({ length: 20 }, () =>
				ledger.transfers.transfer({
					identity: "alice",
					sourceAccountId: alice.id,
					destinationAccountNumber: bob.accountNumber,
					amount: "1.00",
					authorization: "1234",
				}),
			),
		);

		const references = results.flatMap((r) => [r.debit.referenceNumber, r.credit.referenceNumber]);
		expect(new Set(references).size).toBe(40);
		await assertAccountBalance(ledger, alice.id, "80.00");
		await assertAccountBalance(ledger, bob.id, "20.00");
	});

	it("settles opposite-direction transfers without deadlock", async () => {
		const { ledger, alice, bob } = await setup("500.00", "500.00");

		await Promise.all(
			Array.from({ length: 10 }, (_, i) =>
				i % 2 === 0
					? ledger.transfers.transfer({
							identity: "alice",
							sourceAccountId: alice.id,
							destinationAccountNumber: bob.accountNumber,
							amount: "10.00",
							authorization: "1234",
						})
					: ledger.transfers.transfer({
							identity: "bob",
							sourceAccountId: bob.id,
							destinationAccountNumber: alice.accountNumber,
							amount: "10.00",
							authorization: "5678",
						}),
			),
		);

		await assertAccountBalance(ledger, alice.id, "500.00");
		await assertAccountBalance(ledger, bob.id, "500.00");
		const verification = await ledger.ledger.verify();
		expect(verification.healthy).toBe(true);
		expect(verification.transactionsChecked).toBe(22);
	});

	it("keeps transfers and deposits on one account consistent", async () => {
		const { ledger, alice, bob } = await setup("50.00", "0.00");

		await Promise.all([
			...Array.from({ length: 5 }, () =>
				ledger.transfers.deposit({ accountId: alice.id, amount: "10.00" }),
			),
			...Array.from({ length: 5 }, () =>
				ledger.transfers.transfer({
					identity: "alice",
					sourceAccountId: alice.id,
					destinationAccountNumber: bob.accountNumber,
					amount: "10.00",
					authorization: "1234",
				}),
			),
		]);

		await assertAccountBalance(ledger, alice.id, "50.00");
		await assertAccountBalance(ledger, bob.id, "50.00");
		await assertLedgerIdentity(ledger);
	});
});
