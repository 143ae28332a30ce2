/**
 * Configuration value model.
 *
 * In memory every entry is a tagged ConfigValue; on disk plain entries are
 * bare JSON scalars and encrypted entries keep the nested
 * `{ "isEncrypted": true, "value": "<blob>" }` shape.
 */

import { z } from "zod";

export type ConfigScalar = string | number | boolean;

export type ConfigValue =
	| { kind: "string"; value: string }
	| { kind: "int"; value: number }
	| { kind: "bool"; value: boolean }
	| { kind: "encrypted"; blob: string };

export type ConfigValueKind = ConfigValue["kind"];

// ═══════════════════════════════════════════════════════════════════════════════
// Stored form
// ═══════════════════════════════════════════════════════════════════════════════

export const EncryptedEntrySchema = z
	.object({
		isEncrypted: z.literal(true),
		value: z.string(),
	})
	.strict();

export const StoredEntrySchema = z.union([
	z.string(),
	z.number().int().safe(),
	z.boolean(),
	EncryptedEntrySchema,
]);

export const StoredConfigSchema = z.record(z.string(), StoredEntrySchema);

export type EncryptedEntry = z.infer<typeof EncryptedEntrySchema>;
export type StoredEntry = z.infer<typeof StoredEntrySchema>;
export type StoredConfig = z.infer<typeof StoredConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// Conversions
// ═══════════════════════════════════════════════════════════════════════════════

export function fromScalar(value: ConfigScalar): ConfigValue {
	if (typeof value === "string") {
		return { kind: "string", value };
	}
	if (typeof value === "boolean") {
		return { kind: "bool", value };
	}
	if (!Number.isSafeInteger(value)) {
		throw new RangeError(`Config numbers must be safe integers, got ${value}`);
	}
	return { kind: "int", value };
}

export function fromStored(entry: StoredEntry): ConfigValue {
	if (typeof entry === "object") {
		return { kind: "encrypted", blob: entry.value };
	}
	return fromScalar(entry);
}

export function toStored(value: ConfigValue): StoredEntry {
	if (value.kind === "encrypted") {
		return { isEncrypted: true, value: value.blob };
	}
	return value.value;
}

/**
 * Textual form of a scalar, used before encrypting a non-string value.
 */
export function scalarToString(value: ConfigScalar): string {
	return typeof value === "string" ? value : String(value);
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a base-10 integer. Surrounding whitespace is allowed; anything else
 * (decimals, hex, trailing text, out of safe range) yields undefined.
 */
export function parseInteger(text: string): number | undefined {
	const trimmed = text.trim();
	if (!INTEGER_PATTERN.test(trimmed)) {
		return undefined;
	}
	const parsed = Number.parseInt(trimmed, 10);
	return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Parse "true"/"false" case-insensitively, ignoring surrounding whitespace.
 */
export function parseBoolean(text: string): boolean | undefined {
	const normalized = text.trim().toLowerCase();
	if (normalized === "true") return true;
	if (normalized === "false") return false;
	return undefined;
}
