import os from "node:os";
import path from "node:path";

/**
 * Directory holding the config file, key file and logs.
 * LEVITON_BRIDGE_DATA_DIR overrides the default ~/.leviton-bridge.
 */
export function getDataDir(): string {
	return process.env.LEVITON_BRIDGE_DATA_DIR || path.join(os.homedir(), ".leviton-bridge");
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

export function isBlank(value: string | undefined | null): boolean {
	return value == null || value.trim() === "";
}
