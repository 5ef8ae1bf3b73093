import * as p from "@clack/prompts";
import { migrateToLatest } from "@fundline/kysely-adapter";
import { Command } from "commander";
import pc from "picocolors";
import { maskDatabaseUrl, openDatabase, resolveDatabaseUrl } from "../utils/database.js";
import { sanitizeErrorMessage } from "../utils/report.js";

export const migrateCommand = new Command("migrate")
	.description("Create or upgrade the ledger tables")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.action(async (options: { url?: string }) => {
		p.intro(pc.bgCyan(pc.black(" fundline migrate ")));

		const url = resolveDatabaseUrl(options.url);
		if (!url) {
			p.log.error(`${pc.red("No DATABASE_URL")} ${pc.dim("set DATABASE_URL or use --url")}`);
			p.outro(pc.dim("Cannot migrate without a database connection."));
			process.exitCode = 1;
			return;
		}

		p.log.info(`Database: ${pc.dim(maskDatabaseUrl(url))}`);
		const db = openDatabase(url);
		const s = p.spinner();
		s.start("Applying migrations...");

		try {
			const result = await migrateToLatest(db, "postgres");
			const applied = (result.results ?? []).filter((r) => r.status === "Success");
			if (applied.length === 0) {
				s.stop(`${pc.green("OK")} Schema is up to date`);
			} else {
				s.stop(`${pc.green("OK")} Applied ${applied.length} migration(s)`);
				for (const migration of applied) {
					p.log.info(`  ${migration.migrationName}`);
				}
			}
			p.outro(pc.green("Done."));
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			s.stop(`${pc.red("FAIL")} Migration failed`);
			p.log.error(sanitizeErrorMessage(message));
			p.outro(pc.dim("No further migrations were applied."));
			process.exitCode = 1;
		} finally {
			await db.destroy();
		}
	});
