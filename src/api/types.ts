/**
 * Device JSON contract of the cloud API.
 *
 * Field names are the wire names (snake_case) and are kept as-is; unknown
 * fields pass through untouched so a fetched object can be sent back.
 */

import { z } from "zod";

export const DeviceStateSchema = z
	.object({
		power: z.string().nullish(),
		brightness: z.number().int().nullish(),
		color_temperature: z.number().int().nullish(),
		hue: z.number().int().nullish(),
		saturation: z.number().int().nullish(),
		on_off: z.boolean().nullish(),
		timestamp: z.string().nullish(),
	})
	.passthrough();

export const DeviceInfoSchema = z
	.object({
		id: z.string(),
		name: z.string().nullish(),
		type: z.string().nullish(),
		model: z.string().nullish(),
		location: z.string().nullish(),
		state: DeviceStateSchema.nullish(),
		capabilities: z.array(z.string()).nullish(),
		status: z.string().nullish(),
		last_updated: z.string().nullish(),
	})
	.passthrough();

export const DeviceListSchema = z.array(DeviceInfoSchema);

export type DeviceState = z.infer<typeof DeviceStateSchema>;
export type DeviceInfo = z.infer<typeof DeviceInfoSchema>;

/** Body of PUT /devices/{id}/state. Omitted fields are left unchanged. */
export type DeviceStateRequest = {
	power?: "on" | "off";
	brightness?: number;
	color_temperature?: number;
	hue?: number;
	saturation?: number;
};

export const MIN_BRIGHTNESS = 0;
export const MAX_BRIGHTNESS = 100;
export const MIN_COLOR_TEMPERATURE = 2000;
export const MAX_COLOR_TEMPERATURE = 6500;

export function describeDevice(device: DeviceInfo): string {
	return `${device.name ?? "(unnamed)"} (${device.id}) - type: ${device.type ?? "unknown"} - status: ${device.status ?? "unknown"}`;
}

export function describeState(state: DeviceState): string {
	const parts = [`power: ${state.power ?? "unknown"}`];
	if (state.brightness != null) parts.push(`brightness: ${state.brightness}%`);
	if (state.color_temperature != null) parts.push(`color temp: ${state.color_temperature}K`);
	if (state.hue != null) parts.push(`hue: ${state.hue}`);
	if (state.saturation != null) parts.push(`saturation: ${state.saturation}%`);
	return parts.join(" | ");
}
