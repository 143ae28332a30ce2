/**
 * CLI commands for the configuration file.
 *
 * Commands:
 * - leviton-bridge config set <key> <value> - Set a value (password/api_key encrypted by default)
 * - leviton-bridge config get <key> - Print a value (encrypted values need --reveal)
 * - leviton-bridge config list - List keys and whether they are encrypted
 * - leviton-bridge config unset <key> - Remove a key
 * - leviton-bridge config validate - Check the required connection keys
 */

import chalk from "chalk";
import type { Command } from "commander";

import { isSensitiveKey } from "../config/settings.js";
import { type ConfigEntrySummary, openConfigStore } from "../config/store.js";
import { type ConfigScalar, parseBoolean, parseInteger } from "../config/values.js";
import { isBridgeError } from "../errors.js";
import { getLazyChildLogger } from "../logging.js";
import { errorMessage } from "../utils.js";

const logger = getLazyChildLogger({ module: "cmd-config" });

export const VALUE_TYPES = ["string", "int", "bool"] as const;
export type ValueType = (typeof VALUE_TYPES)[number];

function isValueType(value: string): value is ValueType {
	return VALUE_TYPES.some((type) => type === value);
}

/**
 * Convert a command-line argument to the requested config value type.
 */
export function parseCliValue(raw: string, type: string = "string"): ConfigScalar {
	if (!isValueType(type)) {
		throw new Error(`Unknown value type "${type}". Use one of: ${VALUE_TYPES.join(", ")}`);
	}
	if (type === "int") {
		const parsed = parseInteger(raw);
		if (parsed === undefined) throw new Error(`"${raw}" is not an integer`);
		return parsed;
	}
	if (type === "bool") {
		const parsed = parseBoolean(raw);
		if (parsed === undefined) throw new Error(`"${raw}" is not true or false`);
		return parsed;
	}
	return raw;
}

export function runConfigSet(
	key: string,
	rawValue: string,
	opts: { encrypt?: boolean; type?: string } = {},
): { filePath: string; encrypted: boolean } {
	const { store } = openConfigStore();
	const encrypted = opts.encrypt ?? isSensitiveKey(key);
	store.set(key, parseCliValue(rawValue, opts.type), encrypted);
	store.save();
	return { filePath: store.filePath, encrypted };
}

export function runConfigGet(
	key: string,
	opts: { reveal?: boolean } = {},
): { found: false } | { found: true; encrypted: boolean; value: string | null } {
	const { store } = openConfigStore();
	if (!store.has(key)) {
		return { found: false };
	}
	const encrypted = store.isEncrypted(key);
	if (encrypted && !opts.reveal) {
		return { found: true, encrypted, value: null };
	}
	const value = store.get(key);
	return { found: true, encrypted, value: value === undefined ? null : String(value) };
}

export function runConfigList(): { filePath: string; entries: ConfigEntrySummary[] } {
	const { store } = openConfigStore();
	return { filePath: store.filePath, entries: store.describe() };
}

export function runConfigUnset(key: string): boolean {
	const { store } = openConfigStore();
	const removed = store.delete(key);
	if (removed) {
		store.save();
	}
	return removed;
}

export function runConfigValidate(): { filePath: string; found: boolean; issues: string[] } {
	const { store, load } = openConfigStore();
	return {
		filePath: store.filePath,
		found: load.status === "loaded",
		issues: store.validationIssues(),
	};
}

export function registerConfigCommand(program: Command): void {
	const config = program.command("config").description("Manage the bridge configuration file");

	const fail = (err: unknown) => {
		logger().error(
			{ error: errorMessage(err), code: isBridgeError(err) ? err.code : undefined },
			"config command failed",
		);
		console.error(`Error: ${errorMessage(err)}`);
		process.exitCode = 1;
	};

	config
		.command("set <key> <value>")
		.description("Set a configuration value")
		.option("--encrypt", "Encrypt the value at rest (default for password and api_key)")
		.option("--no-encrypt", "Store the value in plain text")
		.option("-t, --type <type>", "Value type: string, int or bool", "string")
		.action((key: string, value: string, opts: { encrypt?: boolean; type: string }) => {
			try {
				const result = runConfigSet(key, value, opts);
				console.log(
					`Saved ${key}${result.encrypted ? chalk.dim(" (encrypted)") : ""} to ${result.filePath}`,
				);
			} catch (err) {
				fail(err);
			}
		});

	config
		.command("get <key>")
		.description("Print a configuration value")
		.option("--reveal", "Decrypt and print encrypted values")
		.action((key: string, opts: { reveal?: boolean }) => {
			try {
				const result = runConfigGet(key, opts);
				if (!result.found) {
					console.error(`${key} is not set`);
					process.exitCode = 1;
					return;
				}
				if (result.value === null) {
					console.log(
						result.encrypted ? chalk.dim("<encrypted, use --reveal to print>") : chalk.dim("<empty>"),
					);
					return;
				}
				console.log(result.value);
			} catch (err) {
				fail(err);
			}
		});

	config
		.command("list")
		.description("List configuration keys (values not shown)")
		.option("--json", "Output as JSON")
		.action((opts: { json?: boolean }) => {
			try {
				const { filePath, entries } = runConfigList();
				if (opts.json) {
					console.log(JSON.stringify(entries, null, 2));
					return;
				}
				if (entries.length === 0) {
					console.log(`No configuration values in ${filePath}.`);
					return;
				}
				console.log(`\n${chalk.bold("CONFIGURATION")} ${chalk.dim(filePath)}\n`);
				console.log(`${"KEY".padEnd(24)}${"TYPE".padEnd(12)}`);
				for (const entry of entries) {
					const kind = entry.encrypted ? chalk.yellow("encrypted") : entry.kind;
					console.log(`${entry.key.padEnd(24)}${kind}`);
				}
				console.log();
			} catch (err) {
				fail(err);
			}
		});

	config
		.command("unset <key>")
		.description("Remove a configuration value")
		.action((key: string) => {
			try {
				if (runConfigUnset(key)) {
					console.log(`Removed ${key}`);
				} else {
					console.error(`${key} is not set`);
					process.exitCode = 1;
				}
			} catch (err) {
				fail(err);
			}
		});

	config
		.command("validate")
		.description("Check that host, port and username are configured")
		.action(() => {
			try {
				const result = runConfigValidate();
				if (!result.found) {
					console.error(chalk.red(`No configuration file at ${result.filePath}`));
					process.exitCode = 1;
					return;
				}
				if (result.issues.length > 0) {
					console.error(chalk.red(`Configuration in ${result.filePath} is invalid:`));
					for (const issue of result.issues) {
						console.error(`  - ${issue}`);
					}
					process.exitCode = 1;
					return;
				}
				console.log(chalk.green(`Configuration in ${result.filePath} is valid`));
			} catch (err) {
				fail(err);
			}
		});
}
