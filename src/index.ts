#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerDevicesCommand, registerLoginCommand } from "./commands/devices.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { closeLogger, getLogger } from "./logging.js";

const program = createProgram();

registerConfigCommand(program);
registerLoginCommand(program);
registerDevicesCommand(program);

// Global options must be applied before any command touches config or logging.
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (typeof opts.config === "string") {
		setConfigPath(opts.config);
	}
	if (opts.verbose === true) {
		setVerbose(true);
	}
	getLogger();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// Flush the pino destination so the process can exit.
		closeLogger();
	});
