import type { AuditSink, IdentityProvider, LedgerOptions, LedgerRecordStore } from "@fundline/core";
import { silentLogger } from "@fundline/core/logger";
import { type MemoryAuditSink, memoryAuditSink, memoryStore } from "@fundline/memory-adapter";
import { createLedger, type Ledger } from "fundline";

export interface TestInstanceOptions {
	/** Record store. Default: a fresh memoryStore() */
	store?: LedgerRecordStore;
	/** Audit sink. Default: a fresh memoryAuditSink() */
	auditSink?: AuditSink;
	/** Identity provider. Default: createTestIdentity() over `pins` */
	identity?: IdentityProvider;
	/** identity -> PIN for the default identity provider */
	pins?: Record<string, string>;
	/** identity -> display name for the default identity provider */
	names?: Record<string, string>;
	/** Currency. Default: "NGN" */
	currency?: string;
	advanced?: LedgerOptions["advanced"];
	guard?: LedgerOptions["guard"];
	logger?: LedgerOptions["logger"];
	onOperationalError?: LedgerOptions["onOperationalError"];
}

export interface TestInstance {
	ledger: Ledger;
	store: LedgerRecordStore;
	/** The memory sink when none was supplied, otherwise null */
	audit: MemoryAuditSink | null;
}

/**
 * IdentityProvider over plain-text PINs. For tests only: production code
 * uses createPinVerifier with stored hashes.
 */
export function createTestIdentity(
	pins: Record<string, string> = {},
	names: Record<string, string> = {},
): IdentityProvider {
	return {
		async verifySecret(identity, secret) {
			return Object.hasOwn(pins, identity) && pins[identity] === secret;
		},
		async displayName(identity) {
			return names[identity] ?? null;
		},
	};
}

export async function getTestInstance(options: TestInstanceOptions = {}): Promise<TestInstance> {
	const store = options.store ?? memoryStore();
	const audit = options.auditSink ? null : memoryAuditSink();
	const ledger = createLedger({
		store,
		auditSink: options.auditSink ?? audit ?? memoryAuditSink(),
		identity: options.identity ?? createTestIdentity(options.pins, options.names),
		currency: options.currency ?? "NGN",
		advanced: { commitRetryBaseDelayMs: 0, commitRetryMaxDelayMs: 0, ...options.advanced },
		guard: options.guard,
		logger: options.logger ?? silentLogger,
		onOperationalError: options.onOperationalError,
	});

	// Wait for initialization
	await ledger.$context;

	return { ledger, store, audit };
}
