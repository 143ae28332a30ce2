/**
 * Session token manager.
 *
 * Exchanges username/password for a bearer token at the login endpoint and
 * caches it with its expiry. Every authenticated device call checks the cache
 * through validateAuthenticated() first.
 *
 * Concurrency:
 * - The (token, expiresAt) pair lives in a TokenSlot and is replaced whole
 * - Commits and clears are serialized by one mutex per manager
 * - The network exchange runs outside the lock; concurrent authenticate()
 *   calls race and the last one to commit wins
 *
 * There is no retry: failures surface to the caller.
 */

import { z } from "zod";

import { DEFAULT_API_BASE_URL } from "../config/settings.js";
import { AuthError, NotAuthenticatedError, TokenExpiredError } from "../errors.js";
import { type FetchLike, type JsonResponse, requestJson, TimeoutError } from "../infra/http.js";
import { Mutex } from "../infra/mutex.js";
import { getLazyChildLogger } from "../logging.js";
import { errorMessage, isBlank } from "../utils.js";
import { type SessionToken, TokenSlot, type TokenSnapshotStore } from "./token-slot.js";

const logger = getLazyChildLogger({ module: "session-token" });

/** Refresh this long before expiry. */
export const REFRESH_THRESHOLD_MS = 300 * 1000;
export const DEFAULT_EXPIRES_IN_SECONDS = 3600;
/** Ten years. Longer lifetimes are treated as a malformed response. */
export const MAX_EXPIRES_IN_SECONDS = 10 * 365 * 24 * 3600;
/** Largest epoch-millisecond value a Date can hold. */
const MAX_DATE_MS = 8_640_000_000_000_000;
export const DEFAULT_AUTH_TIMEOUT_MS = 30 * 1000;
export const LOGIN_PATH = "/user/login";

const LoginResponseSchema = z.object({
	access_token: z.string().min(1),
	expires_in: z.number().int().nonnegative().max(MAX_EXPIRES_IN_SECONDS).optional(),
});

export type SessionState = "unauthenticated" | "authenticating" | "authenticated" | "expired";

export type AuthenticationResult = {
	accessToken: string;
	expiresIn: number;
	expiresAt: number;
};

export type AuthCheck =
	| { ok: true; session: SessionToken }
	| { ok: false; error: NotAuthenticatedError | TokenExpiredError };

export interface SessionTokenManagerOptions {
	apiBaseUrl?: string;
	fetchImpl?: FetchLike;
	/** Clock in epoch milliseconds. */
	now?: () => number;
	timeoutMs?: number;
	userAgent?: string;
	slot?: TokenSnapshotStore;
}

export class SessionTokenManager {
	private readonly apiBaseUrl: string;
	private readonly fetchImpl: FetchLike;
	private readonly now: () => number;
	private readonly timeoutMs: number;
	private readonly userAgent: string | undefined;
	private readonly slot: TokenSnapshotStore;
	private readonly lock = new Mutex();
	private inFlight = 0;

	constructor(options: SessionTokenManagerOptions = {}) {
		this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.now = options.now ?? Date.now;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS;
		this.userAgent = options.userAgent;
		this.slot = options.slot ?? new TokenSlot();
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Authentication
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Log in and replace the cached token.
	 *
	 * @throws AuthError on transport failure, timeout, non-success status, or a
	 *   response without an access token
	 */
	async authenticate(
		username: string,
		password: string,
		options: { signal?: AbortSignal } = {},
	): Promise<AuthenticationResult> {
		if (isBlank(username)) {
			throw new TypeError("Username cannot be empty");
		}
		if (isBlank(password)) {
			throw new TypeError("Password cannot be empty");
		}

		this.inFlight++;
		try {
			const { accessToken, expiresIn } = await this.exchangeCredentials(
				username,
				password,
				options.signal,
			);

			return await this.lock.withLock(() => {
				const expiresAt = this.now() + expiresIn * 1000;
				if (!Number.isFinite(expiresAt) || Math.abs(expiresAt) > MAX_DATE_MS) {
					throw new AuthError(
						`Token expiry ${expiresAt} is outside the representable date range`,
					);
				}
				const expiresAtIso = new Date(expiresAt).toISOString();
				this.slot.replace({ token: accessToken, expiresAt });
				logger().info({ expiresIn, expiresAt: expiresAtIso }, "authenticated");
				return { accessToken, expiresIn, expiresAt };
			});
		} finally {
			this.inFlight--;
		}
	}

	/**
	 * Authenticate only if the cached token is missing or inside the refresh
	 * window. Returns whether a login happened.
	 */
	async refreshIfNeeded(
		username: string,
		password: string,
		options: { signal?: AbortSignal } = {},
	): Promise<boolean> {
		if (!this.needsRefresh()) {
			return false;
		}
		logger().debug("token missing or near expiry, re-authenticating");
		await this.authenticate(username, password, options);
		return true;
	}

	/**
	 * Drop the cached token.
	 */
	async clear(): Promise<void> {
		await this.lock.withLock(() => {
			this.slot.replace(null);
		});
		logger().info("session cleared");
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// State checks
	// ═══════════════════════════════════════════════════════════════════════════

	needsRefresh(): boolean {
		const session = this.slot.snapshot();
		if (!session) {
			return true;
		}
		return this.now() + REFRESH_THRESHOLD_MS >= session.expiresAt;
	}

	checkAuthenticated(): AuthCheck {
		const session = this.slot.snapshot();
		if (!session) {
			return { ok: false, error: new NotAuthenticatedError() };
		}
		if (this.now() >= session.expiresAt) {
			return { ok: false, error: new TokenExpiredError(session.expiresAt) };
		}
		return { ok: true, session };
	}

	/**
	 * Returns the current token pair for an authenticated call.
	 *
	 * @throws NotAuthenticatedError when no token is cached
	 * @throws TokenExpiredError when the cached token has expired
	 */
	validateAuthenticated(): SessionToken {
		const check = this.checkAuthenticated();
		if (!check.ok) {
			throw check.error;
		}
		return check.session;
	}

	get state(): SessionState {
		if (this.inFlight > 0) {
			return "authenticating";
		}
		const session = this.slot.snapshot();
		if (!session) {
			return "unauthenticated";
		}
		return this.now() >= session.expiresAt ? "expired" : "authenticated";
	}

	/** Expiry of the cached token, if any. */
	get expiresAt(): number | undefined {
		return this.slot.snapshot()?.expiresAt;
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Internals
	// ═══════════════════════════════════════════════════════════════════════════

	private async exchangeCredentials(
		username: string,
		password: string,
		signal: AbortSignal | undefined,
	): Promise<{ accessToken: string; expiresIn: number }> {
		const url = `${this.apiBaseUrl}${LOGIN_PATH}`;

		let response: JsonResponse;
		try {
			response = await requestJson(this.fetchImpl, {
				method: "POST",
				url,
				headers: this.userAgent ? { "User-Agent": this.userAgent } : undefined,
				body: { username, password },
				timeoutMs: this.timeoutMs,
				signal,
			});
		} catch (err) {
			const reason = err instanceof TimeoutError ? "timed out" : "could not reach server";
			logger().warn({ error: errorMessage(err) }, `authentication request ${reason}`);
			throw new AuthError(`Authentication request ${reason}: ${errorMessage(err)}`, undefined, {
				cause: err,
			});
		}

		if (!response.ok) {
			logger().warn({ status: response.status }, "authentication rejected");
			throw new AuthError(
				`Authentication failed with status ${response.status}: ${response.raw || response.statusText}`,
				response.status,
			);
		}

		const parsed = LoginResponseSchema.safeParse(response.payload);
		if (!parsed.success) {
			const tokenMissing = parsed.error.issues.some(
				(issue) => issue.path.length === 0 || issue.path[0] === "access_token",
			);
			throw new AuthError(
				tokenMissing
					? "No access token returned from authentication endpoint"
					: "Malformed authentication response",
				response.status,
			);
		}

		return {
			accessToken: parsed.data.access_token,
			expiresIn: parsed.data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS,
		};
	}
}
