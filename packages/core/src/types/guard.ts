export interface ScopedLock {
	readonly accountId: string;
	/** Idempotent. */
	release(): void;
}

export interface AcquireOptions {
	/** Abort while waiting. Has no effect once the lock is held. */
	signal?: AbortSignal;
	/** Give up waiting after this many ms. */
	timeoutMs?: number;
}

/**
 * Per-account mutual exclusion. Implementations may be in-process or backed by
 * a distributed lock service; callers must acquire multiple accounts in
 * ascending id order.
 */
export interface AccountGuard {
	acquire(accountId: string, options?: AcquireOptions): Promise<ScopedLock>;
}
