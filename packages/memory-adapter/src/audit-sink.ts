// =============================================================================
// MEMORY AUDIT SINK
// =============================================================================
// Append-only list of audit entries, newest first on read.

import type { AuditLogEntry, AuditQuery, AuditSink } from "@fundline/core";

const DEFAULT_LIST_LIMIT = 50;

export interface MemoryAuditSink extends AuditSink {
	list(query?: AuditQuery): Promise<AuditLogEntry[]>;
	/** Entries in append order. Test helper. */
	readonly entries: readonly AuditLogEntry[];
}

export function memoryAuditSink(): MemoryAuditSink {
	const entries: AuditLogEntry[] = [];

	return {
		id: "memory",

		async append(entry) {
			entries.push({ ...entry, additionalData: { ...entry.additionalData } });
		},

		async list(query = {}) {
			const { actorId, action, limit = DEFAULT_LIST_LIMIT, offset = 0 } = query;
			return entries
				.filter((e) => (actorId === undefined || e.actorId === actorId) && (!action || e.action === action))
				.reverse()
				.slice(offset, offset + limit)
				.map((e) => ({ ...e }));
		},

		get entries() {
			return entries;
		},
	};
}
