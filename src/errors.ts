/**
 * Error taxonomy for the bridge.
 *
 * Every error carries a stable `code` so callers (and the CLI) can branch on
 * the kind of failure without matching message text.
 */

export type BridgeErrorCode =
	| "KEY_CORRUPT"
	| "KEY_STORE"
	| "ENCRYPTION"
	| "DECRYPTION"
	| "CONFIG_LOAD"
	| "CONFIG_SAVE"
	| "CONFIG_INCOMPLETE"
	| "NOT_AUTHENTICATED"
	| "TOKEN_EXPIRED"
	| "AUTH"
	| "API_REQUEST";

export class BridgeError extends Error {
	constructor(
		message: string,
		public readonly code: BridgeErrorCode,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "BridgeError";
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Key material
// ═══════════════════════════════════════════════════════════════════════════════

export class KeyCorruptError extends BridgeError {
	constructor(
		public readonly filePath: string,
		public readonly actualLength: number,
	) {
		super(
			`Encryption key file ${filePath} is ${actualLength} bytes, expected 32. Refusing to regenerate.`,
			"KEY_CORRUPT",
		);
		this.name = "KeyCorruptError";
	}
}

export class KeyStoreError extends BridgeError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "KEY_STORE", options);
		this.name = "KeyStoreError";
	}
}

export class EncryptionError extends BridgeError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "ENCRYPTION", options);
		this.name = "EncryptionError";
	}
}

export class DecryptionError extends BridgeError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "DECRYPTION", options);
		this.name = "DecryptionError";
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration persistence
// ═══════════════════════════════════════════════════════════════════════════════

export class ConfigLoadError extends BridgeError {
	constructor(
		message: string,
		public readonly filePath: string,
		options?: { cause?: unknown },
	) {
		super(message, "CONFIG_LOAD", options);
		this.name = "ConfigLoadError";
	}
}

export class ConfigSaveError extends BridgeError {
	constructor(
		message: string,
		public readonly filePath: string,
		options?: { cause?: unknown },
	) {
		super(message, "CONFIG_SAVE", options);
		this.name = "ConfigSaveError";
	}
}

export class ConfigIncompleteError extends BridgeError {
	constructor(
		public readonly filePath: string,
		public readonly issues: readonly string[],
	) {
		super(`Configuration in ${filePath} is incomplete: ${issues.join("; ")}`, "CONFIG_INCOMPLETE");
		this.name = "ConfigIncompleteError";
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Session
// ═══════════════════════════════════════════════════════════════════════════════

export class NotAuthenticatedError extends BridgeError {
	constructor() {
		super("Not authenticated. Call authenticate() first.", "NOT_AUTHENTICATED");
		this.name = "NotAuthenticatedError";
	}
}

export class TokenExpiredError extends BridgeError {
	constructor(public readonly expiresAt: number) {
		super(
			`Authentication token expired at ${new Date(expiresAt).toISOString()}. Authenticate again.`,
			"TOKEN_EXPIRED",
		);
		this.name = "TokenExpiredError";
	}
}

export class AuthError extends BridgeError {
	constructor(
		message: string,
		public readonly status?: number,
		options?: { cause?: unknown },
	) {
		super(message, "AUTH", options);
		this.name = "AuthError";
	}
}

export class ApiRequestError extends BridgeError {
	constructor(
		message: string,
		public readonly status?: number,
		public readonly body?: string,
		options?: { cause?: unknown },
	) {
		super(message, "API_REQUEST", options);
		this.name = "ApiRequestError";
	}
}

export function isBridgeError(err: unknown): err is BridgeError {
	return err instanceof BridgeError;
}
