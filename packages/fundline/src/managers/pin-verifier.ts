// =============================================================================
// PIN VERIFIER -- IdentityProvider over salted scrypt hashes
// =============================================================================
// Stored format: "scrypt$<salt hex>$<hash hex>". Comparison is constant-time.
// Where the hashes live is the caller's concern; the verifier only needs a
// lookup by identity.

import { randomBytes, scrypt, timingSafeEqual } from "node:crypto";
import type { IdentityProvider } from "@fundline/core";
import { LedgerError } from "@fundline/core";

const PIN_PATTERN = /^\d{4,6}$/;
const KEY_LENGTH = 32;
const SALT_BYTES = 16;

function deriveKey(pin: string, salt: Buffer): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		scrypt(pin, salt, KEY_LENGTH, (err, key) => {
			if (err) reject(err);
			else resolve(key);
		});
	});
}

/**
 * Hash a 4 to 6 digit transaction PIN for storage.
 */
export async function hashPin(pin: string): Promise<string> {
	if (!PIN_PATTERN.test(pin)) {
		throw LedgerError.invalidArgument("PIN must be 4 to 6 digits");
	}
	const salt = randomBytes(SALT_BYTES);
	const key = await deriveKey(pin, salt);
	return `scrypt$${salt.toString("hex")}$${key.toString("hex")}`;
}

/**
 * Constant-time check of `pin` against a stored hash. Malformed hashes and
 * malformed PINs verify as false.
 */
export async function verifyPin(pin: string, stored: string): Promise<boolean> {
	const [scheme, saltHex, hashHex] = stored.split("$");
	if (scheme !== "scrypt" || !saltHex || !hashHex) return false;
	if (!PIN_PATTERN.test(pin)) return false;

	const expected = Buffer.from(hashHex, "hex");
	if (expected.length !== KEY_LENGTH) return false;
	const actual = await deriveKey(pin, Buffer.from(saltHex, "hex"));
	return timingSafeEqual(actual, expected);
}

export interface PinVerifierOptions {
	/** Stored PIN hash for an identity, or null when none is set */
	lookupPinHash: (identity: string) => Promise<string | null>;
	/** Display name for counterparty fields */
	lookupDisplayName?: (identity: string) => Promise<string | null>;
}

export function createPinVerifier(options: PinVerifierOptions): IdentityProvider {
	const { lookupPinHash, lookupDisplayName } = options;
	return {
		async verifySecret(identity, secret) {
			const stored = await lookupPinHash(identity);
			if (!stored) return false;
			return verifyPin(secret, stored);
		},
		...(lookupDisplayName ? { displayName: lookupDisplayName } : {}),
	};
}
