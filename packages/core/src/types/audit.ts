export type AuditAction =
	| "LOGIN"
	| "LOGOUT"
	| "TRANSACTION"
	| "ACCOUNT_UPDATE"
	| "PASSWORD_CHANGE"
	| "CARD_OPERATION"
	| "BENEFICIARY_OP";

export interface AuditLogEntry {
	id: string;
	actorId: string | null;
	action: AuditAction;
	description: string;
	ipAddress: string | null;
	userAgent: string | null;
	additionalData: Record<string, unknown>;
	createdAt: Date;
}

export interface AuditQuery {
	actorId?: string;
	action?: AuditAction;
	limit?: number;
	offset?: number;
}

/**
 * Append-only sink for security-relevant events. There is deliberately no
 * update or delete.
 */
export interface AuditSink {
	id: string;
	append(entry: AuditLogEntry): Promise<void>;
	/** Newest first. Optional: write-only sinks (log shippers, queues) omit it. */
	list?(query?: AuditQuery): Promise<AuditLogEntry[]>;
}
