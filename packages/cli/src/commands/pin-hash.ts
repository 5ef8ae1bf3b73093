import * as p from "@clack/prompts";
import { Command } from "commander";
import { hashPin } from "fundline";

const PIN_PATTERN = /^\d{4,6}$/;

export const pinHashCommand = new Command("pin-hash")
	.description("Hash a transaction PIN for storage by the PIN verifier")
	.option("--pin <pin>", "PIN to hash (prompted when omitted)")
	.action(async (options: { pin?: string }) => {
		let pin = options.pin;
		if (pin === undefined) {
			const answer = await p.password({
				message: "Transaction PIN",
				validate: (value) => (PIN_PATTERN.test(value) ? undefined : "PIN must be 4 to 6 digits"),
			});
			if (p.isCancel(answer)) {
				p.cancel("Cancelled.");
				process.exitCode = 1;
				return;
			}
			pin = answer;
		}

		process.stdout.write(`${await hashPin(pin)}\n`);
	});
