import type { ConfigStore } from "./store.js";

export const DEFAULT_API_BASE_URL = "https://api.leviton.com/api";
export const DEFAULT_PORT = 8080;
export const DEFAULT_CONNECTION_TIMEOUT_MS = 5000;

/** Keys the CLI encrypts unless told otherwise. */
export const SENSITIVE_KEYS: readonly string[] = ["password", "api_key"];

export function isSensitiveKey(key: string): boolean {
	return SENSITIVE_KEYS.includes(key.trim().toLowerCase());
}

/**
 * Login and device calls go to `apiBaseUrl` only. `host`, `port`, `useSsl`
 * and `apiKey` describe the local bridge the installation is paired with;
 * they are validated and reported but never used to build cloud URLs.
 */
export type ConnectionSettings = {
	host: string;
	port: number;
	username: string;
	password: string;
	apiKey?: string;
	/** Deadline for login and device requests. */
	connectionTimeoutMs: number;
	useSsl: boolean;
	apiBaseUrl: string;
};

/**
 * Typed view over the connection-related config keys. Unparseable values fall
 * back to their defaults rather than failing; run store.validate() first when
 * the caller needs to know.
 */
export function readConnectionSettings(store: ConfigStore): ConnectionSettings {
	const apiKey = store.getString("api_key");
	const connectionTimeoutMs = store.getInt("connection_timeout", DEFAULT_CONNECTION_TIMEOUT_MS);

	return {
		host: store.getString("host", ""),
		port: store.getInt("port", DEFAULT_PORT),
		username: store.getString("username", ""),
		password: store.getString("password", ""),
		apiKey: apiKey ? apiKey : undefined,
		connectionTimeoutMs:
			connectionTimeoutMs > 0 ? connectionTimeoutMs : DEFAULT_CONNECTION_TIMEOUT_MS,
		useSsl: store.getBool("use_ssl", false),
		apiBaseUrl: store.getString("api_base_url", DEFAULT_API_BASE_URL).replace(/\/+$/, ""),
	};
}
