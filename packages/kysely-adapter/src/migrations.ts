// =============================================================================
// MIGRATIONS
// =============================================================================
// Schema for the ledger tables, applied through Kysely's Migrator with an
// in-code provider. Column types differ per dialect; constraints do not.

import type {
	Kysely,
	Migration,
	MigrationInfo,
	MigrationProvider,
	MigrationResultSet,
} from "kysely";
import { Migrator, sql } from "kysely";

export type SchemaDialect = "postgres" | "sqlite";

interface DialectTypes {
	money: "bigint" | "integer";
	timestamp: "timestamptz" | "text";
	json: "jsonb" | "text";
	flag: "smallint" | "integer";
}

function typesFor(dialect: SchemaDialect): DialectTypes {
	return dialect === "postgres"
		? { money: "bigint", timestamp: "timestamptz", json: "jsonb", flag: "smallint" }
		: { money: "integer", timestamp: "text", json: "text", flag: "integer" };
}

function ledgerMigrations(dialect: SchemaDialect): Record<string, Migration> {
	const t = typesFor(dialect);

	return {
		"0001_ledger_tables": {
			async up(db) {
				await db.schema
					.createTable("ledger_account")
					.addColumn("id", "text", (col) => col.primaryKey())
					.addColumn("account_number", "text", (col) => col.notNull().unique())
					.addColumn("owner_id", "text", (col) => col.notNull())
					.addColumn("account_type_id", "text", (col) => col.notNull())
					.addColumn("currency", "text", (col) => col.notNull())
					.addColumn("balance", t.money, (col) => col.notNull().defaultTo(0))
					.addColumn("available_balance", t.money, (col) => col.notNull().defaultTo(0))
					.addColumn("status", "text", (col) =>
						col.notNull().check(sql`status IN ('ACTIVE', 'INACTIVE', 'SUSPENDED', 'CLOSED')`),
					)
					.addColumn("is_primary", t.flag, (col) => col.notNull().defaultTo(0))
					.addColumn("version", "integer", (col) => col.notNull().defaultTo(1))
					.addColumn("created_at", t.timestamp, (col) => col.notNull())
					.addColumn("updated_at", t.timestamp, (col) => col.notNull())
					.execute();

				await db.schema
					.createIndex("idx_ledger_account_owner")
					.on("ledger_account")
					.column("owner_id")
					.execute();

				// At most one primary account per owner.
				await db.schema
					.createIndex("uq_ledger_account_primary")
					.on("ledger_account")
					.column("owner_id")
					.unique()
					.where(sql<boolean>`is_primary = 1`)
					.execute();

				await db.schema
					.createTable("ledger_transaction")
					.addColumn("id", "text", (col) => col.primaryKey())
					.addColumn("reference_number", "text", (col) => col.notNull().unique())
					.addColumn("account_id", "text", (col) =>
						col.notNull().references("ledger_account.id"),
					)
					.addColumn("type", "text", (col) => col.notNull().check(sql`type IN ('CREDIT', 'DEBIT')`))
					.addColumn("category", "text", (col) => col.notNull())
					.addColumn("amount", t.money, (col) => col.notNull().check(sql`amount > 0`))
					.addColumn("balance_before", t.money, (col) => col.notNull())
					.addColumn("balance_after", t.money, (col) => col.notNull())
					.addColumn("description", "text", (col) => col.notNull())
					.addColumn("status", "text", (col) => col.notNull())
					.addColumn("counterparty_account_number", "text")
					.addColumn("counterparty_name", "text")
					.addColumn("correlation_id", "text", (col) => col.notNull())
					.addColumn("counterpart_reference", "text")
					.addColumn("ip_address", "text")
					.addColumn("user_agent", "text")
					.addColumn("created_at", t.timestamp, (col) => col.notNull())
					.execute();

				await db.schema
					.createIndex("idx_ledger_transaction_account_created")
					.on("ledger_transaction")
					.columns(["account_id", "created_at"])
					.execute();

				await db.schema
					.createIndex("idx_ledger_transaction_correlation")
					.on("ledger_transaction")
					.column("correlation_id")
					.execute();

				await db.schema
					.createTable("audit_log")
					.addColumn("id", "text", (col) => col.primaryKey())
					.addColumn("actor_id", "text")
					.addColumn("action", "text", (col) => col.notNull())
					.addColumn("description", "text", (col) => col.notNull())
					.addColumn("ip_address", "text")
					.addColumn("user_agent", "text")
					.addColumn("additional_data", t.json, (col) => col.notNull())
					.addColumn("created_at", t.timestamp, (col) => col.notNull())
					.execute();

				await db.schema
					.createIndex("idx_audit_log_actor_created")
					.on("audit_log")
					.columns(["actor_id", "created_at"])
					.execute();
			},

			async down(db) {
				await db.schema.dropTable("audit_log").execute();
				await db.schema.dropTable("ledger_transaction").execute();
				await db.schema.dropTable("ledger_account").execute();
			},
		},
	};
}

export function createMigrationProvider(dialect: SchemaDialect): MigrationProvider {
	return {
		async getMigrations() {
			return ledgerMigrations(dialect);
		},
	};
}

/**
 * Apply every pending migration. Rejects with the Migrator's error when one
 * fails; migrations already applied in the run stay applied.
 */
export async function migrateToLatest<DB>(
	db: Kysely<DB>,
	dialect: SchemaDialect,
): Promise<MigrationResultSet> {
	const migrator = new Migrator({ db, provider: createMigrationProvider(dialect) });
	const result = await migrator.migrateToLatest();
	if (result.error) {
		throw result.error;
	}
	return result;
}

/** Every known migration with the time it ran, or undefined when pending. */
export async function getMigrationStatus<DB>(
	db: Kysely<DB>,
	dialect: SchemaDialect,
): Promise<ReadonlyArray<MigrationInfo>> {
	const migrator = new Migrator({ db, provider: createMigrationProvider(dialect) });
	return migrator.getMigrations();
}
