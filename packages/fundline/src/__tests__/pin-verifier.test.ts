import {
	assertAccountBalance,
	expectLedgerError,
	getTestInstance,
	seedAccount,
} from "@fundline/test-utils";
import { describe, expect, it } from "vitest";
import { createPinVerifier, hashPin, verifyPin } from "../managers/pin-verifier.js";

describe("hashPin / verifyPin", () => {
	it("produces a salted scrypt hash that verifies only the same PIN", async () => {
		const stored = await hashPin("4821");

		expect(stored).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{64}$/);
		expect(await verifyPin("4821", stored)).toBe(true);
		expect(await verifyPin("4822", stored)).toBe(false);
	});

	it("salts every hash", async () => {
		const [a, b] = await Promise.all([hashPin("123456"), hashPin("123456")]);
		expect(a).not.toBe(b);
	});

	it("rejects PINs that are not 4 to 6 digits", async () => {
		const error = await expectLedgerError(hashPin("12ab"), "INVALID_ARGUMENT");
		expect(error.message).toBe("PIN must be 4 to 6 digits");
		await expectLedgerError(hashPin("1234567"), "INVALID_ARGUMENT");
	});

	it("treats malformed hashes and PINs as a mismatch", async () => {
		const stored = await hashPin("4821");

		expect(await verifyPin("4821", "plain-text")).toBe(false);
		expect(await verifyPin("4821", "bcrypt$00$00")).toBe(false);
		expect(await verifyPin("4821", "scrypt$00ff$abcd")).toBe(false);
		expect(await verifyPin("48", stored)).toBe(false);
	});
});

describe("createPinVerifier", () => {
	it("verifies against looked-up hashes and resolves display names", async () => {
		const hashes = new Map([["alice", await hashPin("1234")]]);
		const verifier = createPinVerifier({
			lookupPinHash: async (identity) => hashes.get(identity) ?? null,
			lookupDisplayName: async (identity) => (identity === "alice" ? "Alice Okafor" : null),
		});

		expect(await verifier.verifySecret("alice", "1234")).toBe(true);
		expect(await verifier.verifySecret("alice", "4321")).toBe(false);
		expect(await verifier.verifySecret("bob", "1234")).toBe(false);
		expect(await verifier.displayName?.("alice")).toBe("Alice Okafor");
	});

	it("omits displayName when no lookup is given", () => {
		const verifier = createPinVerifier({ lookupPinHash: async () => null });
		expect(verifier.displayName).toBeUndefined();
	});

	it("authorizes transfers end to end", async () => {
		const hashes = new Map([["alice", await hashPin("1234")]]);
		const { ledger } = await getTestInstance({
			identity: createPinVerifier({ lookupPinHash: async (identity) => hashes.get(identity) ?? null }),
		});
		const alice = await seedAccount(ledger, { ownerId: "alice", balance: "100.00" });
		const bob = await seedAccount(ledger, { ownerId: "bob" });

		const result = await ledger.transfers.transfer({
			identity: "alice",
			sourceAccountId: alice.id,
			destinationAccountNumber: bob.accountNumber,
			amount: "40.00",
			authorization: "1234",
		});

		expect(result.credit.counterpartyName).toBeNull();
		await assertAccountBalance(ledger, bob.id, "40.00");
	});
});
