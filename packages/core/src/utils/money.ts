import { LedgerError } from "../error/index.js";

// =============================================================================
// MONEY -- exact arithmetic on integer minor units
// =============================================================================
// Amounts live as integers in the currency's smallest unit. Decimal input is
// parsed digit by digit; binary floating point never touches a balance.

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Convert smallest units (kobo/cents) to decimal string.
 * 25490 → "254.90"
 */
export function minorToDecimal(amount: number, currency = "USD"): string {
	const decimals = getDecimalPlaces(currency);
	const negative = amount < 0;
	const digits = Math.abs(amount).toString().padStart(decimals + 1, "0");
	if (decimals === 0) return `${negative ? "-" : ""}${digits}`;
	const major = digits.slice(0, digits.length - decimals);
	const minor = digits.slice(digits.length - decimals);
	return `${negative ? "-" : ""}${major}.${minor}`;
}

/**
 * Parse a decimal amount into smallest units.
 * "15000.00" (NGN) → 1500000
 *
 * @throws LedgerError INVALID_AMOUNT for non-finite input, malformed strings,
 * more fraction digits than the currency allows, or values beyond the safe
 * integer range.
 */
export function toMinorUnits(value: string | number, currency = "USD"): number {
	if (typeof value === "number" && !Number.isFinite(value)) {
		throw LedgerError.invalidAmount(`Amount must be a finite number, got ${value}`);
	}
	const text = (typeof value === "number" ? value.toString() : value).trim();
	const negative = text.startsWith("-");
	const match = DECIMAL_PATTERN.exec(negative ? text.slice(1) : text);
	if (!match) {
		throw LedgerError.invalidAmount(`Amount must be a decimal number, got "${text}"`);
	}

	const [, whole = "0", fraction = ""] = match;
	const decimals = getDecimalPlaces(currency);
	const significant = fraction.replace(/0+$/, "");
	if (significant.length > decimals) {
		throw LedgerError.invalidAmount(
			`Amount has more than ${decimals} decimal places for ${currency}: "${text}"`,
		);
	}

	const minor = Number(`${whole}${significant.padEnd(decimals, "0")}`);
	if (!Number.isSafeInteger(minor)) {
		throw LedgerError.invalidAmount(`Amount is out of range: "${text}"`);
	}
	return negative && minor !== 0 ? -minor : minor;
}

function assertMinor(value: number): void {
	if (!Number.isSafeInteger(value)) {
		throw LedgerError.invalidAmount(`Amount must be an integer in minor units, got ${value}`);
	}
}

export function addMinor(a: number, b: number): number {
	assertMinor(a);
	assertMinor(b);
	const sum = a + b;
	if (!Number.isSafeInteger(sum)) {
		throw LedgerError.invalidAmount("Amount overflow");
	}
	return sum;
}

export function subtractMinor(a: number, b: number): number {
	return addMinor(a, -b);
}

/** -1, 0 or 1 */
export function compareMinor(a: number, b: number): -1 | 0 | 1 {
	assertMinor(a);
	assertMinor(b);
	if (a === b) return 0;
	return a < b ? -1 : 1;
}

export function isPositiveMinor(amount: number): boolean {
	return Number.isSafeInteger(amount) && amount > 0;
}

/**
 * Get precision (subunit count) for a currency.
 * NGN → 100 (100 kobo = 1 naira)
 * USD → 100 (100 cents = 1 dollar)
 */
export function getCurrencyPrecision(currency: string): number {
	return 10 ** getDecimalPlaces(currency);
}

/**
 * Get decimal places (the currency's scale).
 */
export function getDecimalPlaces(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
		case "XOF":
		case "XAF":
			return 0;
		case "BHD":
		case "KWD":
			return 3;
		default:
			return 2;
	}
}
