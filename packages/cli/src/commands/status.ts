import * as p from "@clack/prompts";
import { getMigrationStatus } from "@fundline/kysely-adapter";
import { Command } from "commander";
import pc from "picocolors";
import { maskDatabaseUrl, openDatabase, resolveDatabaseUrl } from "../utils/database.js";
import { collectLedgerStatus, sanitizeErrorMessage } from "../utils/report.js";

export const statusCommand = new Command("status")
	.description("Show schema and ledger status")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.action(async (options: { url?: string }) => {
		p.intro(pc.bgCyan(pc.black(" fundline status ")));

		// ---- Configuration ----
		p.log.step(pc.bold("Configuration"));

		const url = resolveDatabaseUrl(options.url);
		if (!url) {
			p.log.warning(`  Database:      ${pc.yellow("not configured")} ${pc.dim("set DATABASE_URL or use --url")}`);
			p.outro(pc.dim("Nothing more to report."));
			process.exitCode = 1;
			return;
		}
		p.log.success(`  Database:      ${pc.dim(maskDatabaseUrl(url))}`);

		const db = openDatabase(url);
		try {
			// ---- Schema ----
			p.log.step(pc.bold("Schema"));
			const migrations = await getMigrationStatus(db, "postgres");
			const pending = migrations.filter((m) => m.executedAt === undefined);
			for (const migration of migrations) {
				const state = migration.executedAt
					? pc.green(`applied ${migration.executedAt.toISOString()}`)
					: pc.yellow("pending");
				p.log.info(`  ${migration.name}: ${state}`);
			}
			if (pending.length > 0) {
				p.log.warning(`  ${pending.length} pending migration(s) ${pc.dim("run fundline migrate")}`);
				p.outro(pc.dim("Ledger tables are not ready."));
				return;
			}

			// ---- Ledger ----
			p.log.step(pc.bold("Ledger"));
			const status = await collectLedgerStatus(db);
			const byStatus = Object.entries(status.accountsByStatus)
				.map(([name, count]) => `${name.toLowerCase()}=${count}`)
				.join(", ");
			p.log.info(`  Accounts:      ${pc.cyan(String(status.totalAccounts))} ${pc.dim(`(${byStatus})`)}`);
			p.log.info(`  Transactions:  ${pc.cyan(String(status.totalTransactions))}`);
			p.log.info(
				`  Last activity: ${status.lastTransactionAt ? status.lastTransactionAt.toISOString() : pc.dim("none")}`,
			);
			p.log.info(`  Audit entries: ${pc.cyan(String(status.auditEntries))}`);

			p.outro(pc.green("Status check complete."));
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			p.log.error(`Connection failed: ${pc.dim(sanitizeErrorMessage(message))}`);
			process.exitCode = 1;
		} finally {
			await db.destroy();
		}
	});
