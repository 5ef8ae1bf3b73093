import { randomUUID } from "node:crypto";

/** Random UUID v4, used for account, transaction, correlation and audit ids. */
export function generateId(): string {
	return randomUUID();
}
