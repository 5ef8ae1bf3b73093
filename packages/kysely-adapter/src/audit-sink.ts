// =============================================================================
// KYSELY AUDIT SINK
// =============================================================================
// Append-only audit_log table. The sink never issues UPDATE or DELETE.

import type { AuditSink } from "@fundline/core";
import type { Kysely } from "kysely";
import { rowToAuditEntry, serializeAdditionalData } from "./row-mappers.js";
import type { LedgerDatabase } from "./schema.js";

const DEFAULT_LIST_LIMIT = 50;

export function kyselyAuditSink(
	db: Kysely<LedgerDatabase>,
): AuditSink & Required<Pick<AuditSink, "list">> {
	return {
		id: "kysely",

		async append(entry) {
			await db
				.insertInto("audit_log")
				.values({
					id: entry.id,
					actor_id: entry.actorId,
					action: entry.action,
					description: entry.description,
					ip_address: entry.ipAddress,
					user_agent: entry.userAgent,
					additional_data: serializeAdditionalData(entry.additionalData),
					created_at: entry.createdAt.toISOString(),
				})
				.execute();
		},

		async list(query = {}) {
			const { actorId, action, limit = DEFAULT_LIST_LIMIT, offset = 0 } = query;
			let select = db.selectFrom("audit_log").selectAll();
			if (actorId !== undefined) select = select.where("actor_id", "=", actorId);
			if (action !== undefined) select = select.where("action", "=", action);
			const rows = await select
				.orderBy("created_at", "desc")
				.orderBy("id", "desc")
				.limit(limit)
				.offset(offset)
				.execute();
			return rows.map(rowToAuditEntry);
		},
	};
}
