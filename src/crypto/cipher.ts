/**
 * Value-level encryption for secrets stored in the config file.
 *
 * Blob format: base64( IV[16] || AES-256-CBC ciphertext with PKCS7 padding ).
 * A fresh random IV is drawn for every call.
 *
 * NOTE: CBC carries no authentication tag. A corrupted or tampered blob whose
 * padding still happens to validate decrypts to wrong plaintext without error.
 * Switching to an authenticated mode changes the on-disk format, so it is a
 * migration rather than a drop-in fix.
 */

import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";

import { DecryptionError, EncryptionError } from "../errors.js";
import { KEY_LENGTH } from "./key-store.js";

export const CIPHER_ALGORITHM = "aes-256-cbc";
export const IV_LENGTH = 16;
export const BLOCK_SIZE = 16;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Encrypt a single string value.
 * Empty and absent values pass through unchanged so "no value set" is never
 * confused with a crypto failure.
 */
export function encryptValue(plaintext: string, key: Buffer): string;
export function encryptValue(
	plaintext: string | null | undefined,
	key: Buffer,
): string | null | undefined;
export function encryptValue(
	plaintext: string | null | undefined,
	key: Buffer,
): string | null | undefined {
	if (plaintext == null || plaintext === "") {
		return plaintext;
	}
	if (key.length !== KEY_LENGTH) {
		throw new EncryptionError(`Encryption key must be ${KEY_LENGTH} bytes, got ${key.length}`);
	}

	try {
		const iv = randomBytes(IV_LENGTH);
		const cipher = createCipheriv(CIPHER_ALGORITHM, key, iv);
		const encrypted = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
		return Buffer.concat([iv, encrypted]).toString("base64");
	} catch (err) {
		throw new EncryptionError("Failed to encrypt credential", { cause: err });
	}
}

/**
 * Decrypt a blob produced by encryptValue().
 */
export function decryptValue(blob: string, key: Buffer): string;
export function decryptValue(
	blob: string | null | undefined,
	key: Buffer,
): string | null | undefined;
export function decryptValue(
	blob: string | null | undefined,
	key: Buffer,
): string | null | undefined {
	if (blob == null || blob === "") {
		return blob;
	}
	if (key.length !== KEY_LENGTH) {
		throw new DecryptionError(`Encryption key must be ${KEY_LENGTH} bytes, got ${key.length}`);
	}
	if (!BASE64_PATTERN.test(blob)) {
		throw new DecryptionError("Encrypted value is not valid base64");
	}

	const buffer = Buffer.from(blob, "base64");
	if (buffer.length < IV_LENGTH + BLOCK_SIZE) {
		throw new DecryptionError(
			`Encrypted value is truncated (${buffer.length} bytes, need at least ${IV_LENGTH + BLOCK_SIZE})`,
		);
	}
	const ciphertext = buffer.subarray(IV_LENGTH);
	if (ciphertext.length % BLOCK_SIZE !== 0) {
		throw new DecryptionError(
			`Ciphertext length ${ciphertext.length} is not a multiple of ${BLOCK_SIZE}`,
		);
	}

	try {
		const decipher = createDecipheriv(CIPHER_ALGORITHM, key, buffer.subarray(0, IV_LENGTH));
		const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
		return decrypted.toString("utf8");
	} catch (err) {
		throw new DecryptionError("Failed to decrypt credential (wrong key or corrupted value)", {
			cause: err,
		});
	}
}

/**
 * Cipher bound to one key. Holds its own copy of the key so dispose() can
 * wipe it without touching the caller's buffer.
 */
export class CredentialCipher {
	private key: Buffer | null;

	constructor(key: Buffer) {
		if (key.length !== KEY_LENGTH) {
			throw new EncryptionError(`Encryption key must be ${KEY_LENGTH} bytes, got ${key.length}`);
		}
		this.key = Buffer.from(key);
	}

	encrypt(plaintext: string): string {
		return encryptValue(plaintext, this.requireKey(EncryptionError));
	}

	decrypt(blob: string): string {
		return decryptValue(blob, this.requireKey(DecryptionError));
	}

	get disposed(): boolean {
		return this.key === null;
	}

	dispose(): void {
		if (this.key) {
			this.key.fill(0);
			this.key = null;
		}
	}

	private requireKey(ErrorType: typeof EncryptionError | typeof DecryptionError): Buffer {
		if (!this.key) {
			throw new ErrorType("Cipher key has been cleared");
		}
		return this.key;
	}
}
