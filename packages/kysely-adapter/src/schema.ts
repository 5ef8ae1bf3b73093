// =============================================================================
// DATABASE SCHEMA TYPES
// =============================================================================
// Row shapes as Kysely sees them. The same tables run on PostgreSQL
// (production) and SQLite (tests), so read types admit both drivers'
// representations: pg returns BIGINT as string and TIMESTAMPTZ as Date,
// better-sqlite3 returns INTEGER as number and TEXT timestamps as string.

import type { ColumnType, Insertable, Selectable } from "kysely";

/** Written as ISO-8601 text; read back as Date (pg) or string (SQLite). */
export type Timestamp = ColumnType<Date | string, string, string>;

/** Smallest currency units. */
export type MinorUnits = ColumnType<number | string | bigint, number, number>;

/** Written as JSON text; read back parsed (pg JSONB) or as text (SQLite). */
export type JsonColumn = ColumnType<Record<string, unknown> | string, string, string>;

export interface LedgerAccountTable {
	id: string;
	account_number: string;
	owner_id: string;
	account_type_id: string;
	currency: string;
	balance: MinorUnits;
	available_balance: MinorUnits;
	status: string;
	/** 0 or 1 */
	is_primary: number;
	version: ColumnType<number | string, number, number>;
	created_at: Timestamp;
	updated_at: Timestamp;
}

export interface LedgerTransactionTable {
	id: string;
	reference_number: string;
	account_id: string;
	type: string;
	category: string;
	amount: MinorUnits;
	balance_before: MinorUnits;
	balance_after: MinorUnits;
	description: string;
	status: string;
	counterparty_account_number: string | null;
	counterparty_name: string | null;
	correlation_id: string;
	counterpart_reference: string | null;
	ip_address: string | null;
	user_agent: string | null;
	created_at: Timestamp;
}

export interface AuditLogTable {
	id: string;
	actor_id: string | null;
	action: string;
	description: string;
	ip_address: string | null;
	user_agent: string | null;
	additional_data: JsonColumn;
	created_at: Timestamp;
}

export interface LedgerDatabase {
	ledger_account: LedgerAccountTable;
	ledger_transaction: LedgerTransactionTable;
	audit_log: AuditLogTable;
}

export type AccountRow = Selectable<LedgerAccountTable>;
export type NewAccountRow = Insertable<LedgerAccountTable>;
export type TransactionRow = Selectable<LedgerTransactionTable>;
export type NewTransactionRow = Insertable<LedgerTransactionTable>;
export type AuditLogRow = Selectable<AuditLogTable>;
