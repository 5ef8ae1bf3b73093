import type { LedgerOptions } from "@fundline/core";
import { LedgerError } from "@fundline/core";

const VALID_CURRENCIES = new Set([
	"NGN",
	"GHS",
	"KES",
	"ZAR",
	"EGP",
	"XOF",
	"XAF",
	"USD",
	"EUR",
	"GBP",
	"CHF",
	"CAD",
	"AUD",
	"NZD",
	"JPY",
	"CNY",
	"KRW",
	"INR",
	"SGD",
	"HKD",
	"AED",
	"SAR",
	"QAR",
	"KWD",
	"BHD",
	"BRL",
	"MXN",
]);

function assertPositiveFinite(value: number | undefined, name: string): void {
	if (value !== undefined && (value <= 0 || !Number.isFinite(value))) {
		throw LedgerError.invalidArgument(`Ledger config: '${name}' must be a positive finite number`);
	}
}

function assertNonNegativeInteger(value: number | undefined, name: string): void {
	if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
		throw LedgerError.invalidArgument(
			`Ledger config: '${name}' must be a non-negative integer`,
		);
	}
}

/**
 * Validate ledger configuration options at runtime.
 * Throws LedgerError INVALID_ARGUMENT with the offending option named.
 */
export function validateConfig(options: LedgerOptions): void {
	if (!options.store) {
		throw LedgerError.invalidArgument("Ledger config: 'store' is required");
	}
	if (!options.auditSink) {
		throw LedgerError.invalidArgument("Ledger config: 'auditSink' is required");
	}
	if (!options.identity) {
		throw LedgerError.invalidArgument("Ledger config: 'identity' provider is required");
	}

	if (options.currency && !VALID_CURRENCIES.has(options.currency)) {
		throw LedgerError.invalidArgument(
			`Ledger config: unknown currency "${options.currency}". Use a valid ISO 4217 code.`,
		);
	}

	const refs = options.references;
	if (refs) {
		if (refs.prefix !== undefined && !/^[A-Z]{1,8}$/.test(refs.prefix)) {
			throw LedgerError.invalidArgument(
				`Ledger config: 'references.prefix' must be 1-8 uppercase letters, got "${refs.prefix}"`,
			);
		}
		if (
			refs.suffixDigits !== undefined &&
			(!Number.isInteger(refs.suffixDigits) || refs.suffixDigits < 1 || refs.suffixDigits > 12)
		) {
			throw LedgerError.invalidArgument(
				"Ledger config: 'references.suffixDigits' must be an integer between 1 and 12",
			);
		}
		if (refs.maxAttempts !== undefined && (!Number.isInteger(refs.maxAttempts) || refs.maxAttempts < 1)) {
			throw LedgerError.invalidArgument(
				"Ledger config: 'references.maxAttempts' must be a positive integer",
			);
		}
	}

	const adv = options.advanced;
	if (adv) {
		assertPositiveFinite(adv.maxTransferAmount, "advanced.maxTransferAmount");
		assertPositiveFinite(adv.lockTimeoutMs, "advanced.lockTimeoutMs");
		assertNonNegativeInteger(adv.commitRetryCount, "advanced.commitRetryCount");
		assertNonNegativeInteger(adv.commitRetryBaseDelayMs, "advanced.commitRetryBaseDelayMs");
		assertNonNegativeInteger(adv.commitRetryMaxDelayMs, "advanced.commitRetryMaxDelayMs");
		if (adv.accountNumberMaxAttempts !== undefined && adv.accountNumberMaxAttempts < 1) {
			throw LedgerError.invalidArgument(
				"Ledger config: 'advanced.accountNumberMaxAttempts' must be a positive integer",
			);
		}
		if (adv.maxTransferAmount !== undefined && !Number.isSafeInteger(adv.maxTransferAmount)) {
			throw LedgerError.invalidArgument(
				"Ledger config: 'advanced.maxTransferAmount' must be an integer in minor units",
			);
		}
	}
}

/**
 * Identity function for defining ledger configuration with autocomplete support.
 * Validates configuration at runtime before returning.
 *
 * @example
 * ```ts
 * import { defineLedgerConfig } from "fundline/config";
 *
 * export default defineLedgerConfig({
 *   store: kyselyStore(db),
 *   auditSink: kyselyAuditSink(db),
 *   identity: createPinVerifier({ lookupPinHash }),
 * });
 * ```
 */
export function defineLedgerConfig(options: LedgerOptions): LedgerOptions {
	validateConfig(options);
	return options;
}
