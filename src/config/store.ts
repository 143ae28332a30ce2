/**
 * Key/value configuration store with per-entry encryption.
 *
 * The store is one flat JSON object on disk. Secrets (password, api_key) are
 * kept as `{ "isEncrypted": true, "value": "<blob>" }` and decrypted only when
 * read. Values are never logged, only keys.
 *
 * Persistence is synchronous and unlocked: one store instance must not be
 * loaded or saved from concurrent tasks. save() overwrites the file in place,
 * so a crash mid-write can leave it truncated.
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { CredentialCipher } from "../crypto/cipher.js";
import { KeyStore, keyPathForConfig } from "../crypto/key-store.js";
import { ConfigLoadError, ConfigSaveError, DecryptionError } from "../errors.js";
import { getLazyChildLogger } from "../logging.js";
import { errorMessage, isBlank, isNodeError } from "../utils.js";
import { resolveConfigPath } from "./path.js";
import {
	type ConfigScalar,
	type ConfigValue,
	type ConfigValueKind,
	fromScalar,
	fromStored,
	parseBoolean,
	parseInteger,
	type StoredConfig,
	StoredConfigSchema,
	scalarToString,
	toStored,
} from "./values.js";

const logger = getLazyChildLogger({ module: "config-store" });

export const REQUIRED_KEYS = ["host", "port", "username"] as const;

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

export interface ConfigStoreOptions {
	/** Config file; defaults to resolveConfigPath(). */
	filePath?: string;
	/** Key file; defaults to `.key` beside the config file. */
	keyFilePath?: string;
	/** Use this key instead of the key file. */
	key?: Buffer;
}

export type LoadResult =
	| { status: "missing"; filePath: string }
	| { status: "loaded"; filePath: string; entries: number; valid: boolean };

export type ConfigEntrySummary = {
	key: string;
	kind: ConfigValueKind;
	encrypted: boolean;
};

export class ConfigStore {
	readonly filePath: string;
	private entries = new Map<string, ConfigValue>();
	private cipher: CredentialCipher;

	constructor(options: ConfigStoreOptions = {}) {
		this.filePath = options.filePath ?? resolveConfigPath();

		if (options.key) {
			this.cipher = new CredentialCipher(options.key);
		} else {
			const keyStore = new KeyStore(options.keyFilePath ?? keyPathForConfig(this.filePath));
			this.cipher = new CredentialCipher(keyStore.ensureKey());
			// The cipher keeps its own copy.
			keyStore.clear();
		}
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Entries
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Store a value, encrypting it first when `encrypt` is set. Non-string
	 * values are stringified before encryption.
	 */
	set(key: string, value: ConfigScalar, encrypt = false): void {
		if (isBlank(key)) {
			throw new TypeError("Configuration key cannot be empty");
		}

		if (encrypt) {
			const blob = this.cipher.encrypt(scalarToString(value));
			this.entries.set(key, { kind: "encrypted", blob });
		} else {
			this.entries.set(key, fromScalar(value));
		}

		logger().debug({ configKey: key, encrypted: encrypt }, "config value set");
	}

	/**
	 * Raw value for `key`, decrypted if it is an encrypted entry.
	 * Decryption failures propagate as DecryptionError.
	 */
	get(key: string): ConfigScalar | undefined;
	get<T>(key: string, defaultValue: T): ConfigScalar | T;
	get<T>(key: string, defaultValue?: T): ConfigScalar | T | undefined {
		const entry = this.entries.get(key);
		if (!entry) {
			return defaultValue;
		}
		return this.resolve(entry);
	}

	getString(key: string): string | undefined;
	getString(key: string, defaultValue: string): string;
	getString(key: string, defaultValue?: string): string | undefined {
		const value = this.tryResolve(key);
		return value === undefined ? defaultValue : scalarToString(value);
	}

	getInt(key: string): number | undefined;
	getInt(key: string, defaultValue: number): number;
	getInt(key: string, defaultValue?: number): number | undefined {
		const value = this.tryResolve(key);
		if (typeof value === "number") return value;
		if (typeof value === "string") return parseInteger(value) ?? defaultValue;
		return defaultValue;
	}

	getBool(key: string): boolean | undefined;
	getBool(key: string, defaultValue: boolean): boolean;
	getBool(key: string, defaultValue?: boolean): boolean | undefined {
		const value = this.tryResolve(key);
		if (typeof value === "boolean") return value;
		if (typeof value === "string") return parseBoolean(value) ?? defaultValue;
		return defaultValue;
	}

	has(key: string): boolean {
		return this.entries.has(key);
	}

	delete(key: string): boolean {
		return this.entries.delete(key);
	}

	isEncrypted(key: string): boolean {
		return this.entries.get(key)?.kind === "encrypted";
	}

	keys(): string[] {
		return [...this.entries.keys()];
	}

	get size(): number {
		return this.entries.size;
	}

	/**
	 * Key names and kinds, safe to print or log.
	 */
	describe(): ConfigEntrySummary[] {
		return [...this.entries].map(([key, value]) => ({
			key,
			kind: value.kind,
			encrypted: value.kind === "encrypted",
		}));
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Persistence
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Merge entries from a config file into the store.
	 * A missing file is a normal first-run state, reported as `missing`.
	 * On any other failure the store is left untouched.
	 */
	load(filePath: string = this.filePath): LoadResult {
		let raw: string;
		try {
			raw = readFileSync(filePath, "utf8");
		} catch (err) {
			if (isNodeError(err) && err.code === "ENOENT") {
				logger().debug({ filePath }, "config file not found");
				return { status: "missing", filePath };
			}
			throw new ConfigLoadError(`Failed to read configuration file ${filePath}`, filePath, {
				cause: err,
			});
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (err) {
			throw new ConfigLoadError(
				`Configuration file ${filePath} is not valid JSON: ${errorMessage(err)}`,
				filePath,
				{ cause: err },
			);
		}

		const result = StoredConfigSchema.safeParse(parsed);
		if (!result.success) {
			const details = result.error.issues
				.map((issue) =>
					issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
				)
				.join("; ");
			throw new ConfigLoadError(`Invalid configuration file ${filePath}: ${details}`, filePath, {
				cause: result.error,
			});
		}

		const loaded = Object.entries(result.data);
		for (const [key, entry] of loaded) {
			this.entries.set(key, fromStored(entry));
		}

		const valid = this.validate();
		logger().info({ filePath, entries: loaded.length, valid }, "loaded configuration");
		return { status: "loaded", filePath, entries: loaded.length, valid };
	}

	/**
	 * Write the whole store to disk, creating parent directories as needed.
	 */
	save(filePath: string = this.filePath): void {
		const data: StoredConfig = {};
		for (const [key, value] of this.entries) {
			data[key] = toStored(value);
		}

		try {
			mkdirSync(dirname(filePath), { recursive: true, mode: 0o700 });
			writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, {
				encoding: "utf8",
				mode: 0o600,
			});
		} catch (err) {
			throw new ConfigSaveError(`Failed to save configuration to ${filePath}`, filePath, {
				cause: err,
			});
		}

		logger().info({ filePath, entries: this.entries.size }, "saved configuration");
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Validation
	// ═══════════════════════════════════════════════════════════════════════════

	/**
	 * Human-readable problems with the required connection keys. Empty when valid.
	 */
	validationIssues(): string[] {
		const issues: string[] = [];

		for (const key of REQUIRED_KEYS) {
			if (isBlank(this.getString(key))) {
				issues.push(`${key} is required`);
			}
		}

		if (!isBlank(this.getString("port"))) {
			const port = this.getInt("port");
			if (port === undefined || port < MIN_PORT || port > MAX_PORT) {
				issues.push(`port must be an integer between ${MIN_PORT} and ${MAX_PORT}`);
			}
		}

		return issues;
	}

	/**
	 * Health signal for the required keys; never throws.
	 */
	validate(): boolean {
		return this.validationIssues().length === 0;
	}

	/**
	 * Drop every entry and wipe the cipher key. The store is unusable for
	 * encrypted values afterwards.
	 */
	clearSensitiveData(): void {
		this.entries.clear();
		this.cipher.dispose();
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Internals
	// ═══════════════════════════════════════════════════════════════════════════

	private resolve(entry: ConfigValue): ConfigScalar {
		return entry.kind === "encrypted" ? this.cipher.decrypt(entry.blob) : entry.value;
	}

	/**
	 * Like get(), but a value that cannot be decrypted reads as absent.
	 */
	private tryResolve(key: string): ConfigScalar | undefined {
		const entry = this.entries.get(key);
		if (!entry) {
			return undefined;
		}
		try {
			return this.resolve(entry);
		} catch (err) {
			if (err instanceof DecryptionError) {
				logger().warn({ configKey: key, error: err.message }, "could not decrypt config value");
				return undefined;
			}
			throw err;
		}
	}
}

/**
 * Create a store for the resolved (or given) config path and load it.
 */
export function openConfigStore(options: ConfigStoreOptions = {}): {
	store: ConfigStore;
	load: LoadResult;
} {
	const store = new ConfigStore(options);
	return { store, load: store.load() };
}
