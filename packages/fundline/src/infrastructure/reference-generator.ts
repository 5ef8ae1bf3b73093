// =============================================================================
// REFERENCE GENERATOR
// =============================================================================
// Human-facing transaction references: prefix + UTC timestamp (yyyyMMddHHmmss)
// + random digits, e.g. TXN202401311430071234. A candidate is rejected when
// the store already holds it or another in-flight transfer has reserved it;
// the suffix is re-rolled up to `maxAttempts` times.

import { randomInt } from "node:crypto";
import type {
	LedgerStoreReader,
	ReferenceGenerator,
	ResolvedReferenceOptions,
} from "@fundline/core";
import { LedgerError } from "@fundline/core";

export interface IdentifierSource {
	/** Produce a fresh candidate */
	candidate: () => string;
	/** Whether the candidate is already taken */
	isTaken: (candidate: string) => Promise<boolean>;
	maxAttempts: number;
	onExhausted: (attempts: number) => LedgerError;
}

/**
 * Bounded-retry allocation of a collision-free identifier. Used for
 * transaction references and account numbers alike.
 */
export async function generateUniqueIdentifier(source: IdentifierSource): Promise<string> {
	for (let attempt = 0; attempt < source.maxAttempts; attempt++) {
		const candidate = source.candidate();
		if (!(await source.isTaken(candidate))) {
			return candidate;
		}
	}
	throw source.onExhausted(source.maxAttempts);
}

export function randomDigits(length: number): string {
	let digits = "";
	for (let i = 0; i < length; i++) {
		digits += randomInt(0, 10).toString();
	}
	return digits;
}

/** 2024-01-31T14:30:07Z → "20240131143007" */
export function formatTimestamp(date: Date): string {
	const pad = (n: number) => n.toString().padStart(2, "0");
	return (
		date.getUTCFullYear().toString() +
		pad(date.getUTCMonth() + 1) +
		pad(date.getUTCDate()) +
		pad(date.getUTCHours()) +
		pad(date.getUTCMinutes()) +
		pad(date.getUTCSeconds())
	);
}

export interface ReferenceGeneratorDeps {
	now?: () => Date;
	digits?: (length: number) => string;
}

export function createReferenceGenerator(
	store: Pick<LedgerStoreReader, "existsReference">,
	options: ResolvedReferenceOptions,
	deps: ReferenceGeneratorDeps = {},
): ReferenceGenerator & { readonly reserved: number } {
	const now = deps.now ?? (() => new Date());
	const digits = deps.digits ?? randomDigits;
	const reserved = new Set<string>();

	return {
		async generate() {
			return generateUniqueIdentifier({
				candidate: () => `${options.prefix}${formatTimestamp(now())}${digits(options.suffixDigits)}`,
				isTaken: async (candidate) => {
					if (reserved.has(candidate)) return true;
					// Reserve before the store round-trip so a concurrent caller
					// cannot pick the same candidate while we wait.
					reserved.add(candidate);
					let exists: boolean;
					try {
						exists = await store.existsReference(candidate);
					} catch (error) {
						reserved.delete(candidate);
						throw error;
					}
					if (exists) reserved.delete(candidate);
					return exists;
				},
				maxAttempts: options.maxAttempts,
				onExhausted: (attempts) => LedgerError.referenceExhausted(attempts),
			});
		},
		release(reference) {
			reserved.delete(reference);
		},
		get reserved() {
			return reserved.size;
		},
	};
}
