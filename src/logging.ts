import fs from "node:fs";
import path from "node:path";

import pino, { type Bindings, type DestinationStream, type LevelWithSilent, type Logger } from "pino";
import { isVerbose } from "./globals.js";
import { getDataDir, isNodeError } from "./utils.js";

/** Destination value that routes logs to stderr instead of a file. */
export const STDERR_DESTINATION = "-";

const ALLOWED_LEVELS: readonly LevelWithSilent[] = [
	"silent",
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
];

/**
 * Field paths censored in every log line. Credentials and key material must
 * never reach the log file even if a caller passes them by mistake.
 */
export const REDACT_PATHS = [
	"password",
	"token",
	"accessToken",
	"access_token",
	"key",
	"apiKey",
	"api_key",
	"*.password",
	"*.token",
	"*.accessToken",
	"*.access_token",
	"*.apiKey",
];

export type LoggerSettings = {
	level?: LevelWithSilent;
	file?: string;
};

export type LoggerResolvedSettings = {
	level: LevelWithSilent;
	file: string;
};

type LogDestination = ReturnType<typeof pino.destination>;

let cachedLogger: Logger | null = null;
let cachedSettings: LoggerResolvedSettings | null = null;
let cachedDestination: LogDestination | null = null;
let overrideSettings: LoggerSettings | null = null;

export function defaultLogFile(): string {
	return path.join(getDataDir(), "logs", "leviton-bridge.log");
}

function isLevel(value: string): value is LevelWithSilent {
	return ALLOWED_LEVELS.some((level) => level === value);
}

function normalizeLevel(level?: string): LevelWithSilent {
	if (isVerbose()) return "debug";
	const candidate = level?.trim().toLowerCase() ?? "info";
	return isLevel(candidate) ? candidate : "info";
}

function resolveSettings(): LoggerResolvedSettings {
	const level = normalizeLevel(overrideSettings?.level ?? process.env.LEVITON_BRIDGE_LOG_LEVEL);
	const file = overrideSettings?.file ?? process.env.LEVITON_BRIDGE_LOG_FILE ?? defaultLogFile();
	return { level, file };
}

function settingsChanged(a: LoggerResolvedSettings | null, b: LoggerResolvedSettings) {
	if (!a) return true;
	return a.level !== b.level || a.file !== b.file;
}

function closeDestination(dest: LogDestination): void {
	try {
		dest.flushSync();
	} catch {
		// flushSync throws when nothing was ever opened; nothing left to flush
	}
	dest.end();
}

/**
 * Create the log file with 0600 before pino opens it, so logs are never
 * world-readable even for the first line.
 */
function prepareLogFile(file: string): void {
	const logDir = path.dirname(file);
	fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });
	try {
		const fd = fs.openSync(
			file,
			fs.constants.O_WRONLY | fs.constants.O_CREAT | fs.constants.O_EXCL,
			0o600,
		);
		fs.closeSync(fd);
	} catch (err) {
		if (!isNodeError(err) || err.code !== "EEXIST") throw err;
		fs.chmodSync(file, 0o600);
	}
}

function buildLogger(settings: LoggerResolvedSettings): {
	logger: Logger;
	destination: LogDestination | null;
} {
	const options: pino.LoggerOptions = {
		level: settings.level,
		base: undefined,
		timestamp: pino.stdTimeFunctions.isoTime,
		redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
	};

	if (settings.level === "silent") {
		return { logger: pino(options), destination: null };
	}

	let destination: LogDestination;
	if (settings.file === STDERR_DESTINATION) {
		destination = pino.destination({ dest: 2, sync: true });
	} else {
		prepareLogFile(settings.file);
		destination = pino.destination({ dest: settings.file, mkdir: true, sync: true });
	}
	const stream: DestinationStream = destination;
	return { logger: pino(options, stream), destination };
}

export function getLogger(): Logger {
	const settings = resolveSettings();
	if (!cachedLogger || settingsChanged(cachedSettings, settings)) {
		if (cachedDestination) {
			closeDestination(cachedDestination);
			cachedDestination = null;
		}
		const built = buildLogger(settings);
		cachedLogger = built.logger;
		cachedDestination = built.destination;
		cachedSettings = settings;
	}
	return cachedLogger;
}

/**
 * Module-level logger accessor. The child is rebuilt whenever the root logger
 * is (for example after --verbose is applied), so modules can hold the getter
 * from import time without pinning a stale destination.
 */
export function getLazyChildLogger(bindings: Bindings): () => Logger {
	let root: Logger | null = null;
	let child: Logger | null = null;
	return () => {
		const current = getLogger();
		if (!child || root !== current) {
			root = current;
			child = current.child(bindings);
		}
		return child;
	};
}

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
	return resolveSettings();
}

export function setLoggerOverride(settings: LoggerSettings | null) {
	overrideSettings = settings;
	closeLogger();
}

export function closeLogger(): void {
	if (cachedDestination) {
		closeDestination(cachedDestination);
		cachedDestination = null;
	}
	cachedLogger = null;
	cachedSettings = null;
}
