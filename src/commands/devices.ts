/**
 * CLI commands that talk to the cloud API.
 *
 * Each invocation logs in with the stored credentials, runs one request and
 * exits; tokens are never printed or persisted.
 */

import chalk from "chalk";
import type { Command } from "commander";

import { describeDevice, describeState } from "../api/types.js";
import { openConfigStore } from "../config/store.js";
import { parseBoolean, parseInteger } from "../config/values.js";
import { isBridgeError } from "../errors.js";
import { getLazyChildLogger } from "../logging.js";
import { type BridgeConnection, connect } from "../session/connect.js";
import { errorMessage } from "../utils.js";

const logger = getLazyChildLogger({ module: "cmd-devices" });

/**
 * Load the config file and log in. A missing config file is reported with a
 * hint rather than as a load failure.
 */
export async function openConnection(): Promise<BridgeConnection> {
	const { store, load } = openConfigStore();
	if (load.status === "missing") {
		throw new Error(
			`No configuration file at ${load.filePath}. Set host, port, username and password with "leviton-bridge config set".`,
		);
	}
	try {
		return await connect(store);
	} finally {
		store.clearSensitiveData();
	}
}

export function parsePowerArgument(value: string): boolean {
	const normalized = value.trim().toLowerCase();
	if (normalized === "on") return true;
	if (normalized === "off") return false;
	const parsed = parseBoolean(normalized);
	if (parsed === undefined) {
		throw new Error(`Power must be "on" or "off", got "${value}"`);
	}
	return parsed;
}

function parseIntegerArgument(label: string, value: string): number {
	const parsed = parseInteger(value);
	if (parsed === undefined) {
		throw new Error(`${label} must be an integer, got "${value}"`);
	}
	return parsed;
}

export function registerLoginCommand(program: Command): void {
	program
		.command("login")
		.description("Authenticate with the stored credentials and report the token lifetime")
		.action(async () => {
			try {
				const { login } = await openConnection();
				console.log(
					`${chalk.green("Authenticated.")} Token expires at ${new Date(login.expiresAt).toISOString()} (in ${Math.round(login.expiresIn / 60)} min).`,
				);
			} catch (err) {
				logger().error(
					{ error: errorMessage(err), code: isBridgeError(err) ? err.code : undefined },
					"login failed",
				);
				console.error(`Error: ${errorMessage(err)}`);
				process.exitCode = 1;
			}
		});
}

export function registerDevicesCommand(program: Command): void {
	const devices = program.command("devices").description("List and control devices");

	const run = (action: string, fn: (conn: BridgeConnection) => Promise<void>) => async () => {
		try {
			const conn = await openConnection();
			await fn(conn);
		} catch (err) {
			logger().error(
				{ action, error: errorMessage(err), code: isBridgeError(err) ? err.code : undefined },
				"device command failed",
			);
			console.error(`Error: ${errorMessage(err)}`);
			process.exitCode = 1;
		}
	};

	devices
		.command("list")
		.description("List devices on the account")
		.option("--json", "Output as JSON")
		.action((opts: { json?: boolean }) =>
			run("list", async ({ client }) => {
				const list = await client.listDevices();
				if (opts.json) {
					console.log(JSON.stringify(list, null, 2));
					return;
				}
				if (list.length === 0) {
					console.log("No devices found.");
					return;
				}
				for (const device of list) {
					console.log(describeDevice(device));
				}
			})(),
		);

	devices
		.command("state <id>")
		.description("Show the current state of a device")
		.action((id: string) =>
			run("state", async ({ client }) => {
				console.log(describeState(await client.getDeviceState(id)));
			})(),
		);

	devices
		.command("power <id> <state>")
		.description("Turn a device on or off")
		.action((id: string, state: string) =>
			run("power", async ({ client }) => {
				const on = parsePowerArgument(state);
				console.log(describeState(await client.setPower(id, on)));
			})(),
		);

	devices
		.command("brightness <id> <level>")
		.description("Set brightness (0-100) of a dimmable device")
		.action((id: string, level: string) =>
			run("brightness", async ({ client }) => {
				const brightness = parseIntegerArgument("Brightness", level);
				console.log(describeState(await client.setBrightness(id, brightness)));
			})(),
		);

	devices
		.command("color-temp <id> <kelvin>")
		.description("Set color temperature (2000-6500 K) of a tunable device")
		.action((id: string, kelvin: string) =>
			run("color-temp", async ({ client }) => {
				const value = parseIntegerArgument("Color temperature", kelvin);
				console.log(describeState(await client.setColorTemperature(id, value)));
			})(),
		);
}
