import { DeviceApiClient } from "../api/client.js";
import { type ConnectionSettings, readConnectionSettings } from "../config/settings.js";
import type { ConfigStore } from "../config/store.js";
import { ConfigIncompleteError } from "../errors.js";
import type { FetchLike } from "../infra/http.js";
import { isBlank } from "../utils.js";
import { type AuthenticationResult, SessionTokenManager } from "./token-manager.js";

export type BridgeConnection = {
	settings: ConnectionSettings;
	session: SessionTokenManager;
	client: DeviceApiClient;
	login: AuthenticationResult;
};

/**
 * Log in with the credentials held in a loaded config store and return a
 * device client bound to the new session.
 *
 * @throws ConfigIncompleteError listing every missing or invalid setting
 */
export async function connect(
	store: ConfigStore,
	options: { fetchImpl?: FetchLike; now?: () => number; signal?: AbortSignal } = {},
): Promise<BridgeConnection> {
	const issues = store.validationIssues();
	const settings = readConnectionSettings(store);
	if (isBlank(settings.password)) {
		issues.push("password is required");
	}
	if (issues.length > 0) {
		throw new ConfigIncompleteError(store.filePath, issues);
	}

	const session = new SessionTokenManager({
		apiBaseUrl: settings.apiBaseUrl,
		fetchImpl: options.fetchImpl,
		now: options.now,
		timeoutMs: settings.connectionTimeoutMs,
	});
	const login = await session.authenticate(settings.username, settings.password, {
		signal: options.signal,
	});
	const client = new DeviceApiClient({
		session,
		baseUrl: settings.apiBaseUrl,
		fetchImpl: options.fetchImpl,
		timeoutMs: settings.connectionTimeoutMs,
	});

	return { settings, session, client, login };
}
