import * as p from "@clack/prompts";
import { silentLogger } from "@fundline/core/logger";
import { kyselyAuditSink, kyselyStore } from "@fundline/kysely-adapter";
import { Command } from "commander";
import { createLedger } from "fundline";
import pc from "picocolors";
import { openDatabase, resolveDatabaseUrl } from "../utils/database.js";
import { formatMismatch, sanitizeErrorMessage } from "../utils/report.js";

const MAX_LISTED = 20;

export const verifyCommand = new Command("verify")
	.description("Check every stored balance against the sum of its completed transactions")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("--currency <code>", "Currency used to format amounts", "NGN")
	.action(async (options: { url?: string; currency: string }) => {
		p.intro(pc.bgCyan(pc.black(" fundline verify ")));

		const url = resolveDatabaseUrl(options.url);
		if (!url) {
			p.log.error(`${pc.red("No DATABASE_URL")} ${pc.dim("set DATABASE_URL or use --url")}`);
			p.outro(pc.dim("Cannot verify without a database connection."));
			process.exitCode = 1;
			return;
		}

		const db = openDatabase(url);
		// Read-only use: no operation here needs to authorize a transfer.
		const ledger = createLedger({
			store: kyselyStore(db),
			auditSink: kyselyAuditSink(db),
			identity: { verifySecret: async () => false },
			currency: options.currency,
			logger: silentLogger,
		});

		const s = p.spinner();
		s.start("Comparing balances with transaction totals...");

		try {
			const result = await ledger.ledger.verify();
			if (result.healthy) {
				s.stop(
					`${pc.green("PASS")} ${result.accountsChecked} account(s), ${result.transactionsChecked} transaction(s) consistent`,
				);
				p.outro(pc.green("Ledger identity holds."));
				return;
			}

			s.stop(`${pc.red("FAIL")} ${result.mismatches.length} account(s) out of balance`);
			for (const mismatch of result.mismatches.slice(0, MAX_LISTED)) {
				p.log.error(`  ${formatMismatch(mismatch, options.currency)}`);
			}
			if (result.mismatches.length > MAX_LISTED) {
				p.log.warn(`  ...and ${result.mismatches.length - MAX_LISTED} more`);
			}
			p.outro(pc.red("Verification found issues."));
			process.exitCode = 1;
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			s.stop(`${pc.red("FAIL")} Could not read the ledger`);
			p.log.error(sanitizeErrorMessage(message));
			process.exitCode = 1;
		} finally {
			await db.destroy();
		}
	});
