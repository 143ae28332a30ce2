/**
 * Symmetric key file management.
 *
 * The key is 32 random bytes written raw (never JSON or base64) to a file
 * beside the config file. It is created on first run and reused afterwards.
 *
 * Security:
 * - Generated with crypto.randomBytes
 * - File written 0600, directory 0700 (best effort on filesystems without modes)
 * - A key file of the wrong length is an error; it is never overwritten
 * - Key bytes are never logged
 */

import { randomBytes } from "node:crypto";
import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";

import { KeyCorruptError, KeyStoreError } from "../errors.js";
import { getLazyChildLogger } from "../logging.js";
import { errorMessage } from "../utils.js";

const logger = getLazyChildLogger({ module: "key-store" });

export const KEY_LENGTH = 32;
export const KEY_FILE_NAME = ".key";

/**
 * Key file location for a given config file: `.key` in the same directory.
 */
export function keyPathForConfig(configPath: string): string {
	return join(dirname(configPath), KEY_FILE_NAME);
}

export class KeyStore {
	private cachedKey: Buffer | null = null;

	constructor(readonly filePath: string) {}

	/**
	 * Load the key, generating and persisting it if the file does not exist.
	 * Repeated calls return the same bytes.
	 */
	ensureKey(): Buffer {
		if (this.cachedKey) {
			return this.cachedKey;
		}

		const key = existsSync(this.filePath) ? this.readKey() : this.createKey();
		this.cachedKey = key;
		return key;
	}

	/** Whether a key file is present on disk. */
	exists(): boolean {
		return existsSync(this.filePath);
	}

	/**
	 * Zero-fill and forget the cached key. The next ensureKey() reads the file again.
	 */
	clear(): void {
		if (this.cachedKey) {
			this.cachedKey.fill(0);
			this.cachedKey = null;
		}
	}

	private readKey(): Buffer {
		let key: Buffer;
		try {
			key = readFileSync(this.filePath);
		} catch (err) {
			throw new KeyStoreError(`Failed to read encryption key file ${this.filePath}`, {
				cause: err,
			});
		}

		if (key.length !== KEY_LENGTH) {
			logger().error(
				{ filePath: this.filePath, length: key.length },
				"encryption key file has wrong length",
			);
			key.fill(0);
			throw new KeyCorruptError(this.filePath, key.length);
		}

		logger().debug({ filePath: this.filePath }, "loaded encryption key");
		return key;
	}

	private createKey(): Buffer {
		const key = randomBytes(KEY_LENGTH);

		try {
			mkdirSync(dirname(this.filePath), { recursive: true, mode: 0o700 });
			writeFileSync(this.filePath, key, { mode: 0o600 });
		} catch (err) {
			key.fill(0);
			throw new KeyStoreError(`Failed to write encryption key file ${this.filePath}`, {
				cause: err,
			});
		}

		// The write mode only applies when the file is newly created.
		try {
			chmodSync(this.filePath, 0o600);
		} catch (err) {
			logger().debug(
				{ filePath: this.filePath, error: errorMessage(err) },
				"could not restrict key file permissions",
			);
		}

		logger().info({ filePath: this.filePath }, "generated new encryption key");
		return key;
	}
}
