// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of every error kind the ledger can surface, with the HTTP status a
// calling layer should map it to and a default human-readable message.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether the condition may change so that re-submitting the same request
	 * can succeed (balance grows, contention clears, storage recovers).
	 */
	transient?: boolean;
	/**
	 * Operational errors are alarms for operators, not answers for end users.
	 * They still carry a stable code so the caller can map them.
	 */
	operational?: boolean;
};

export const BASE_ERROR_CODES = {
	// Validation: detected before any mutation, never needs rollback.
	INVALID_AMOUNT: { message: "Invalid amount", status: 400, transient: false },
	SELF_TRANSFER_REJECTED: {
		message: "Cannot transfer to the same account",
		status: 400,
		transient: false,
	},
	SOURCE_ACCOUNT_UNAVAILABLE: {
		message: "Source account is not available",
		status: 400,
		transient: false,
	},
	DESTINATION_ACCOUNT_UNAVAILABLE: {
		message: "Recipient account not found",
		status: 400,
		transient: false,
	},
	AUTHORIZATION_FAILED: { message: "Invalid PIN", status: 403, transient: false },
	INSUFFICIENT_FUNDS: { message: "Insufficient balance", status: 400, transient: true },
	INVALID_ARGUMENT: { message: "Invalid argument", status: 400, transient: false },
	ACCOUNT_NOT_FOUND: { message: "Account not found", status: 404, transient: false },
	INVALID_STATUS_TRANSITION: {
		message: "Account status transition is not allowed",
		status: 409,
		transient: false,
	},
	PRIMARY_ACCOUNT_EXISTS: {
		message: "Owner already has a primary account",
		status: 409,
		transient: false,
	},

	// Mutation phase: rolled back before being surfaced.
	TRANSFER_FAILED: {
		message: "Transfer failed. Please try again.",
		status: 500,
		transient: true,
	},
	TRANSFER_ABORTED: { message: "Transfer was cancelled", status: 499, transient: true },
	OPTIMISTIC_LOCK_CONFLICT: {
		message: "Account was modified concurrently",
		status: 409,
		transient: true,
	},
	DUPLICATE_REFERENCE: {
		message: "Reference number already exists",
		status: 409,
		transient: true,
	},

	// Operational: alarms, not user-facing outcomes.
	REFERENCE_EXHAUSTED: {
		message: "Could not allocate a unique reference number",
		status: 503,
		transient: true,
		operational: true,
	},
	ACCOUNT_NUMBER_EXHAUSTED: {
		message: "Could not allocate a unique account number",
		status: 503,
		transient: true,
		operational: true,
	},
	AUDIT_WRITE_FAILED: {
		message: "Audit entry could not be written",
		status: 500,
		transient: false,
		operational: true,
	},
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;

export function isBaseErrorCode(code: string): code is BaseErrorCode {
	return Object.hasOwn(BASE_ERROR_CODES, code);
}
