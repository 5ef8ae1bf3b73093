// =============================================================================
// ACCOUNT GUARD -- Per-account mutual exclusion
// =============================================================================
// Serializes read-modify-write cycles on a single account. The in-memory
// implementation is a FIFO queue per account id; entries are created on first
// use and dropped when the last holder releases, so the table only ever holds
// accounts with work in flight.
//
// Multi-account callers go through withAccountLocks, which acquires in
// ascending id order so two transfers over the same pair in opposite
// directions can never deadlock.

import type { AccountGuard, AcquireOptions, ScopedLock } from "@fundline/core";
import { LedgerError } from "@fundline/core";

export interface InMemoryAccountGuard extends AccountGuard {
	/** Accounts currently held or waited on */
	readonly size: number;
}

interface LockEntry {
	waiters: Array<() => void>;
}

export function createAccountGuard(): InMemoryAccountGuard {
	const table = new Map<string, LockEntry>();

	function makeLock(accountId: string): ScopedLock {
		let released = false;
		return {
			accountId,
			release() {
				if (released) return;
				released = true;
				const entry = table.get(accountId);
				if (!entry) return;
				const next = entry.waiters.shift();
				if (next) {
					next();
				} else {
					table.delete(accountId);
				}
			},
		};
	}

	async function acquire(accountId: string, options?: AcquireOptions): Promise<ScopedLock> {
		const signal = options?.signal;
		if (signal?.aborted) {
			throw LedgerError.transferAborted(signal.reason);
		}

		const entry = table.get(accountId);
		if (!entry) {
			table.set(accountId, { waiters: [] });
			return makeLock(accountId);
		}

		return new Promise<ScopedLock>((resolve, reject) => {
			let timer: ReturnType<typeof setTimeout> | undefined;

			const cleanup = () => {
				if (timer) clearTimeout(timer);
				signal?.removeEventListener("abort", onAbort);
			};

			const grant = () => {
				cleanup();
				resolve(makeLock(accountId));
			};

			const withdraw = (error: LedgerError) => {
				const index = entry.waiters.indexOf(grant);
				if (index === -1) return;
				entry.waiters.splice(index, 1);
				cleanup();
				reject(error);
			};

			function onAbort() {
				withdraw(LedgerError.transferAborted(signal?.reason));
			}

			entry.waiters.push(grant);
			signal?.addEventListener("abort", onAbort, { once: true });

			const timeoutMs = options?.timeoutMs;
			if (timeoutMs !== undefined) {
				timer = setTimeout(() => {
					withdraw(
						LedgerError.transferFailed(
							new Error(`Timed out after ${timeoutMs}ms waiting for account lock`),
							{ accountId, timeoutMs },
						),
					);
				}, timeoutMs);
			}
		});
	}

	return {
		acquire,
		get size() {
			return table.size;
		},
	};
}

// =============================================================================
// MULTI-ACCOUNT SCOPE
// =============================================================================

/**
 * Run `fn` while holding the locks of every account in `accountIds`.
 * Ids are deduplicated and acquired in ascending order. Every lock taken is
 * released when `fn` settles or when a later acquisition fails.
 */
export async function withAccountLocks<T>(
	guard: AccountGuard,
	accountIds: readonly string[],
	options: AcquireOptions,
	fn: () => Promise<T>,
): Promise<T> {
	const ordered = [...new Set(accountIds)].sort();
	const held: ScopedLock[] = [];
	try {
		for (const accountId of ordered) {
			held.push(await guard.acquire(accountId, options));
		}
		return await fn();
	} finally {
		for (const lock of held.reverse()) {
			lock.release();
		}
	}
}
