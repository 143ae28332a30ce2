import path from "node:path";

import { getDataDir } from "../utils.js";

export const DEFAULT_CONFIG_FILE_NAME = "leviton.json";

let configPathOverride: string | null = null;

/**
 * Resolve the config file path from:
 * 1. Programmatic override (--config)
 * 2. LEVITON_BRIDGE_CONFIG environment variable
 * 3. <data dir>/leviton.json
 */
export function resolveConfigPath(): string {
	if (configPathOverride) {
		return configPathOverride;
	}

	const envPath = process.env.LEVITON_BRIDGE_CONFIG;
	if (envPath) {
		return path.resolve(envPath);
	}

	return path.join(getDataDir(), DEFAULT_CONFIG_FILE_NAME);
}

export function setConfigPath(configPath: string | null): void {
	configPathOverride = configPath ? path.resolve(configPath) : null;
}

export function resetConfigPath(): void {
	configPathOverride = null;
}
