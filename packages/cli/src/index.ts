#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { isLedgerError } from "@fundline/core";
import { Command } from "commander";
import pc from "picocolors";
import { migrateCommand } from "./commands/migrate.js";
import { pinHashCommand } from "./commands/pin-hash.js";
import { statusCommand } from "./commands/status.js";
import { verifyCommand } from "./commands/verify.js";
import { sanitizeErrorMessage } from "./utils/report.js";

// Graceful shutdown
process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
	try {
		const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, "../package.json"), "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
		return "0.1.0";
	} catch {
		return "0.1.0";
	}
}

const cliVersion = readVersion();

const BANNER = `
  ${pc.bold(pc.cyan("fundline"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Double-entry funds transfer ledger")}
`;

const program = new Command()
	.name("fundline")
	.description("CLI for the fundline ledger: schema migrations, integrity checks and PIN hashing")
	.version(cliVersion, "-v, --version")
	.action(() => {
		console.log(BANNER);
		program.help();
	});

program.addCommand(migrateCommand);
program.addCommand(statusCommand);
program.addCommand(verifyCommand);
program.addCommand(pinHashCommand);

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error && error.code === "commander.helpDisplayed") {
		process.exit(0);
	}
	if (error instanceof Error && "code" in error && error.code === "commander.version") {
		process.exit(0);
	}
	const message = error instanceof Error ? error.message : String(error);
	const prefix = isLedgerError(error) ? `${error.code}: ` : "";
	console.error(pc.red(sanitizeErrorMessage(`${prefix}${message}`)));
	process.exit(1);
}
