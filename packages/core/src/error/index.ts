import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, isBaseErrorCode, type RawErrorCode } from "./codes.js";

export type LedgerErrorCode = BaseErrorCode;

/** The shape handed to a transport layer. Never includes `cause`. */
export interface LedgerErrorPayload {
	code: LedgerErrorCode;
	message: string;
	status: number;
	transient: boolean;
	details?: Record<string, unknown>;
}

export class LedgerError extends Error {
	readonly code: LedgerErrorCode;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether re-submitting the request may succeed.
	 *
	 * - `true`: funds may arrive, contention may clear, storage may recover.
	 * - `false`: validation or authorization failure, will always fail.
	 */
	readonly transient: boolean;
	/** Alarm condition for operators rather than an answer for the end user. */
	readonly operational: boolean;

	constructor(
		code: LedgerErrorCode,
		message: string,
		options?: {
			cause?: unknown;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		const raw: { status: number; transient?: boolean; operational?: boolean } =
			BASE_ERROR_CODES[code];
		this.code = code;
		this.status = raw.status;
		this.transient = raw.transient ?? false;
		this.operational = raw.operational ?? false;
		this.details = options?.details;
		this.name = "LedgerError";
	}

	/**
	 * Create a LedgerError from a code, using the registry's default message.
	 */
	static fromCode(
		code: LedgerErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): LedgerError {
		return new LedgerError(code, options?.message ?? BASE_ERROR_CODES[code].message, {
			cause: options?.cause,
			details: options?.details,
		});
	}

	toJSON(): LedgerErrorPayload {
		return {
			code: this.code,
			message: this.message,
			status: this.status,
			transient: this.transient,
			...(this.details ? { details: this.details } : {}),
		};
	}

	// --- Validation ---

	static invalidAmount(message = "Amount must be greater than 0", cause?: unknown) {
		return new LedgerError("INVALID_AMOUNT", message, { cause });
	}

	static selfTransferRejected(message = "Cannot transfer to the same account") {
		return new LedgerError("SELF_TRANSFER_REJECTED", message);
	}

	static sourceAccountUnavailable(message = "No active source account found") {
		return new LedgerError("SOURCE_ACCOUNT_UNAVAILABLE", message);
	}

	static destinationAccountUnavailable(message = "Recipient account not found") {
		return new LedgerError("DESTINATION_ACCOUNT_UNAVAILABLE", message);
	}

	static authorizationFailed(message = "Invalid PIN") {
		return new LedgerError("AUTHORIZATION_FAILED", message);
	}

	static insufficientFunds(message = "Insufficient balance", details?: Record<string, unknown>) {
		return new LedgerError("INSUFFICIENT_FUNDS", message, { details });
	}

	static invalidArgument(message = "Invalid argument", cause?: unknown) {
		return new LedgerError("INVALID_ARGUMENT", message, { cause });
	}

	static accountNotFound(message = "Account not found") {
		return new LedgerError("ACCOUNT_NOT_FOUND", message);
	}

	static invalidStatusTransition(message = "Account status transition is not allowed") {
		return new LedgerError("INVALID_STATUS_TRANSITION", message);
	}

	static primaryAccountExists(message = "Owner already has a primary account") {
		return new LedgerError("PRIMARY_ACCOUNT_EXISTS", message);
	}

	// --- Mutation phase ---

	static transferFailed(cause?: unknown, details?: Record<string, unknown>) {
		return new LedgerError("TRANSFER_FAILED", BASE_ERROR_CODES.TRANSFER_FAILED.message, {
			cause,
			details,
		});
	}

	static transferAborted(cause?: unknown) {
		return new LedgerError("TRANSFER_ABORTED", BASE_ERROR_CODES.TRANSFER_ABORTED.message, {
			cause,
		});
	}

	static optimisticLockConflict(message = "Account was modified concurrently") {
		return new LedgerError("OPTIMISTIC_LOCK_CONFLICT", message);
	}

	static duplicateReference(message = "Reference number already exists", cause?: unknown) {
		return new LedgerError("DUPLICATE_REFERENCE", message, { cause });
	}

	// --- Operational ---

	static referenceExhausted(attempts: number) {
		return new LedgerError(
			"REFERENCE_EXHAUSTED",
			`Could not allocate a unique reference number after ${attempts} attempts`,
			{ details: { attempts } },
		);
	}

	static accountNumberExhausted(attempts: number) {
		return new LedgerError(
			"ACCOUNT_NUMBER_EXHAUSTED",
			`Could not allocate a unique account number after ${attempts} attempts`,
			{ details: { attempts } },
		);
	}

	static auditWriteFailed(cause?: unknown) {
		return new LedgerError("AUDIT_WRITE_FAILED", BASE_ERROR_CODES.AUDIT_WRITE_FAILED.message, {
			cause,
		});
	}
}

export function isLedgerError(error: unknown): error is LedgerError {
	return error instanceof LedgerError;
}
