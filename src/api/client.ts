/**
 * Device API client.
 *
 * Thin JSON client over the cloud device endpoints. Every call checks the
 * session first (NotAuthenticatedError / TokenExpiredError), then sends the
 * cached bearer token. Re-authentication is the caller's job.
 */

import type { z } from "zod";

import { DEFAULT_API_BASE_URL } from "../config/settings.js";
import { ApiRequestError } from "../errors.js";
import { type FetchLike, type HttpMethod, type JsonResponse, requestJson } from "../infra/http.js";
import { getLazyChildLogger } from "../logging.js";
import type { SessionTokenManager } from "../session/token-manager.js";
import { errorMessage, isBlank } from "../utils.js";
import {
	type DeviceInfo,
	DeviceInfoSchema,
	DeviceListSchema,
	type DeviceState,
	type DeviceStateRequest,
	DeviceStateSchema,
	MAX_BRIGHTNESS,
	MAX_COLOR_TEMPERATURE,
	MIN_BRIGHTNESS,
	MIN_COLOR_TEMPERATURE,
} from "./types.js";

const logger = getLazyChildLogger({ module: "device-api" });

export const USER_AGENT = "LevitonBridge/1.0";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30 * 1000;

export interface DeviceApiClientOptions {
	session: SessionTokenManager;
	baseUrl?: string;
	fetchImpl?: FetchLike;
	timeoutMs?: number;
}

export class DeviceApiClient {
	private readonly session: SessionTokenManager;
	private readonly baseUrl: string;
	private readonly fetchImpl: FetchLike;
	private readonly timeoutMs: number;

	constructor(options: DeviceApiClientOptions) {
		this.session = options.session;
		this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
	}

	async listDevices(options: { signal?: AbortSignal } = {}): Promise<DeviceInfo[]> {
		return this.call("GET", "/devices", DeviceListSchema, "list devices", options.signal);
	}

	async getDevice(deviceId: string, options: { signal?: AbortSignal } = {}): Promise<DeviceInfo> {
		return this.call(
			"GET",
			devicePath(deviceId),
			DeviceInfoSchema,
			`get device ${deviceId}`,
			options.signal,
		);
	}

	async getDeviceState(
		deviceId: string,
		options: { signal?: AbortSignal } = {},
	): Promise<DeviceState> {
		return this.call(
			"GET",
			`${devicePath(deviceId)}/state`,
			DeviceStateSchema,
			`get state of device ${deviceId}`,
			options.signal,
		);
	}

	async setDeviceState(
		deviceId: string,
		request: DeviceStateRequest,
		options: { signal?: AbortSignal } = {},
	): Promise<DeviceState> {
		return this.call(
			"PUT",
			`${devicePath(deviceId)}/state`,
			DeviceStateSchema,
			`set state of device ${deviceId}`,
			options.signal,
			request,
		);
	}

	async setPower(
		deviceId: string,
		on: boolean,
		options: { signal?: AbortSignal } = {},
	): Promise<DeviceState> {
		return this.setDeviceState(deviceId, { power: on ? "on" : "off" }, options);
	}

	async setBrightness(
		deviceId: string,
		brightness: number,
		options: { signal?: AbortSignal } = {},
	): Promise<DeviceState> {
		assertIntegerInRange("Brightness", brightness, MIN_BRIGHTNESS, MAX_BRIGHTNESS);
		return this.setDeviceState(deviceId, { brightness }, options);
	}

	async setColorTemperature(
		deviceId: string,
		kelvin: number,
		options: { signal?: AbortSignal } = {},
	): Promise<DeviceState> {
		assertIntegerInRange("Color temperature", kelvin, MIN_COLOR_TEMPERATURE, MAX_COLOR_TEMPERATURE);
		return this.setDeviceState(deviceId, { color_temperature: kelvin }, options);
	}

	private async call<S extends z.ZodTypeAny>(
		method: HttpMethod,
		path: string,
		schema: S,
		action: string,
		signal: AbortSignal | undefined,
		body?: unknown,
	): Promise<z.output<S>> {
		const { token } = this.session.validateAuthenticated();

		let response: JsonResponse;
		try {
			response = await requestJson(this.fetchImpl, {
				method,
				url: `${this.baseUrl}${path}`,
				headers: {
					Authorization: `Bearer ${token}`,
					"User-Agent": USER_AGENT,
				},
				body,
				timeoutMs: this.timeoutMs,
				signal,
			});
		} catch (err) {
			logger().warn({ action, error: errorMessage(err) }, "device request failed to complete");
			throw new ApiRequestError(`Failed to ${action}: ${errorMessage(err)}`, undefined, undefined, {
				cause: err,
			});
		}

		if (!response.ok) {
			logger().warn({ action, status: response.status }, "device request rejected");
			throw new ApiRequestError(
				`Failed to ${action} (${response.status}): ${response.raw || response.statusText}`,
				response.status,
				response.raw,
			);
		}

		const parsed = schema.safeParse(response.payload);
		if (!parsed.success) {
			throw new ApiRequestError(
				`Failed to ${action}: unexpected response body`,
				response.status,
				response.raw,
				{ cause: parsed.error },
			);
		}

		logger().debug({ action, status: response.status }, "device request completed");
		return parsed.data;
	}
}

function devicePath(deviceId: string): string {
	if (isBlank(deviceId)) {
		throw new TypeError("Device ID cannot be empty");
	}
	return `/devices/${encodeURIComponent(deviceId)}`;
}

function assertIntegerInRange(label: string, value: number, min: number, max: number): void {
	if (!Number.isInteger(value) || value < min || value > max) {
		throw new RangeError(`${label} must be an integer between ${min} and ${max}, got ${value}`);
	}
}
