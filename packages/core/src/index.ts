// Store interface
export * from "./db/index.js";

// Errors
export type {
	BaseErrorCode,
	LedgerErrorCode,
	LedgerErrorPayload,
	RawErrorCode,
} from "./error/index.js";
export { BASE_ERROR_CODES, isBaseErrorCode, isLedgerError, LedgerError } from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
