/** Exponential delay for retry `attempt` (0-based), capped, with ±50% jitter. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
	const delay = Math.min(baseMs * 2 ** attempt, maxMs);
	return Math.round(delay * (0.5 + Math.random()));
}

export function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => setTimeout(resolve, ms));
}
