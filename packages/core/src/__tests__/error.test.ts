import { describe, expect, it } from "vitest";
import { BASE_ERROR_CODES, isBaseErrorCode } from "../error/codes.js";
import { isLedgerError, LedgerError } from "../error/index.js";

describe("LedgerError", () => {
	describe("constructor", () => {
		it("takes status and flags from the code registry", () => {
			const error = new LedgerError("INSUFFICIENT_FUNDS", "Not enough funds");
			expect(error.code).toBe("INSUFFICIENT_FUNDS");
			expect(error.message).toBe("Not enough funds");
			expect(error.status).toBe(400);
			expect(error.transient).toBe(true);
			expect(error.operational).toBe(false);
		});

		it("is an instance of Error and LedgerError", () => {
			const error = new LedgerError("TRANSFER_FAILED", "boom");
			expect(error).toBeInstanceOf(Error);
			expect(error).toBeInstanceOf(LedgerError);
			expect(isLedgerError(error)).toBe(true);
			expect(isLedgerError(new Error("plain"))).toBe(false);
		});

		it("has the name 'LedgerError'", () => {
			expect(new LedgerError("INVALID_ARGUMENT", "x").name).toBe("LedgerError");
		});

		it("keeps the cause without exposing it in the message", () => {
			const cause = new Error("duplicate key value violates unique constraint");
			const error = LedgerError.transferFailed(cause);
			expect(error.cause).toBe(cause);
			expect(error.message).toBe("Transfer failed. Please try again.");
		});
	});

	describe("fromCode", () => {
		it("uses the default message for the code", () => {
			const error = LedgerError.fromCode("SELF_TRANSFER_REJECTED");
			expect(error.message).toBe("Cannot transfer to the same account");
			expect(error.status).toBe(400);
		});

		it("accepts a custom message and details", () => {
			const error = LedgerError.fromCode("ACCOUNT_NOT_FOUND", {
				message: "No account 0123456789",
				details: { accountNumber: "0123456789" },
			});
			expect(error.message).toBe("No account 0123456789");
			expect(error.details).toEqual({ accountNumber: "0123456789" });
		});
	});

	describe("operational errors", () => {
		it("marks REFERENCE_EXHAUSTED as operational with the attempt count", () => {
			const error = LedgerError.referenceExhausted(10);
			expect(error.code).toBe("REFERENCE_EXHAUSTED");
			expect(error.operational).toBe(true);
			expect(error.message).toBe("Could not allocate a unique reference number after 10 attempts");
			expect(error.details).toEqual({ attempts: 10 });
		});

		it("marks AUDIT_WRITE_FAILED as operational and not transient", () => {
			const error = LedgerError.auditWriteFailed(new Error("disk full"));
			expect(error.operational).toBe(true);
			expect(error.transient).toBe(false);
		});
	});

	describe("toJSON", () => {
		it("exposes code, message, status and transient only", () => {
			const error = LedgerError.authorizationFailed();
			expect(error.toJSON()).toEqual({
				code: "AUTHORIZATION_FAILED",
				message: "Invalid PIN",
				status: 403,
				transient: false,
			});
		});

		it("includes details when present and never the cause", () => {
			const error = LedgerError.insufficientFunds("Insufficient balance", { required: 100 });
			const json = JSON.parse(JSON.stringify(error));
			expect(json).toEqual({
				code: "INSUFFICIENT_FUNDS",
				message: "Insufficient balance",
				status: 400,
				transient: true,
				details: { required: 100 },
			});
		});
	});

	describe("registry", () => {
		it("recognises registered codes", () => {
			expect(isBaseErrorCode("TRANSFER_ABORTED")).toBe(true);
			expect(isBaseErrorCode("toString")).toBe(false);
			expect(isBaseErrorCode("NOPE")).toBe(false);
		});

		it("gives every code a message and a status", () => {
			for (const [code, raw] of Object.entries(BASE_ERROR_CODES)) {
				expect(raw.message.length, code).toBeGreaterThan(0);
				expect(raw.status, code).toBeGreaterThanOrEqual(400);
			}
		});
	});
});
