// src/config.ts

import * as fs from "node:fs";
import { z } from "zod";
import { DEFAULT_NAVIGATION_CONTROLLERS } from "./navigation";
import { FADER_ZONE_COUNT } from "./protocol";
import {
	type HuiTranslatorOptions,
	NavigationButton,
	ZoneMappingMode,
} from "./types";
import { DEFAULT_CHANNEL_ZONES, DEFAULT_CONTROLLER_ZONES } from "./zones";

const controllerNumber = z.number().int().min(0).max(127);

const zoneTable = z
	.array(controllerNumber)
	.length(FADER_ZONE_COUNT)
	.describe("Controller number feeding each fader zone, zone 1 first.");

const fadersSchema = z
	.discriminatedUnion("mode", [
		z
			.object({
				mode: z.literal(ZoneMappingMode.CONTROLLER),
				controllers: zoneTable
					.default([...DEFAULT_CONTROLLER_ZONES])
					.refine((ccs) => new Set(ccs).size === ccs.length, {
						message: "Controller numbers must be distinct in controller mode",
					}),
				restrictChannels: z
					.boolean()
					.default(false)
					.describe("Ignore events outside MIDI channels 1-8."),
			})
			.strict(),
		z
			.object({
				mode: z.literal(ZoneMappingMode.CHANNEL),
				controllers: zoneTable.default([...DEFAULT_CHANNEL_ZONES]),
			})
			.strict(),
	])
	.default({ mode: ZoneMappingMode.CONTROLLER });

const navigationSchema = z
	.object({
		controllers: z
			.object({
				[NavigationButton.BANK_LEFT]: controllerNumber,
				[NavigationButton.BANK_RIGHT]: controllerNumber,
				[NavigationButton.CHANNEL_LEFT]: controllerNumber,
				[NavigationButton.CHANNEL_RIGHT]: controllerNumber,
			})
			.strict()
			.default({ ...DEFAULT_NAVIGATION_CONTROLLERS })
			.refine((ccs) => new Set(Object.values(ccs)).size === 4, {
				message: "Each navigation button needs its own controller number",
			}),
		triggerOnNonZero: z
			.boolean()
			.default(true)
			.describe("Only fire on nonzero values; 0 is treated as a button release."),
	})
	.strict();

export const configSchema = z
	.object({
		input: z.string().min(1).describe("Fader controller input port name."),
		output: z
			.string()
			.min(1)
			.describe("Output port the DAW listens to for HUI."),
		navigationInput: z
			.string()
			.min(1)
			.nullable()
			.default(null)
			.describe("Optional port sending bank/channel navigation CCs."),
		releaseTimeoutMs: z.number().int().positive().default(250),
		pollIntervalMs: z.number().int().min(1).default(10),
		faders: fadersSchema,
		navigation: navigationSchema.default({}),
		debug: z.boolean().default(false),
	})
	.strict();

export type BridgeConfig = z.infer<typeof configSchema>;

/**
 * Configuration values used when a file or flag does not set them.
 * Port names have no defaults.
 */
export const DEFAULT_CONFIG: Omit<BridgeConfig, "input" | "output"> = {
	navigationInput: null,
	releaseTimeoutMs: 250,
	pollIntervalMs: 10,
	faders: {
		mode: ZoneMappingMode.CONTROLLER,
		controllers: [...DEFAULT_CONTROLLER_ZONES],
		restrictChannels: false,
	},
	navigation: {
		controllers: { ...DEFAULT_NAVIGATION_CONTROLLERS },
		triggerOnNonZero: true,
	},
	debug: false,
};

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");
}

/**
 * Validates raw configuration and fills in defaults.
 * @throws Error listing every invalid field.
 */
export function parseConfig(raw: unknown): BridgeConfig {
	const result = configSchema.safeParse(raw);
	if (!result.success) {
		throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
	}
	return result.data;
}

/**
 * Reads a JSON configuration file. Values in `overrides` win over the file.
 */
export function loadConfig(
	path: string,
	overrides: Record<string, unknown> = {},
): BridgeConfig {
	let text: string;
	try {
		text = fs.readFileSync(path, "utf8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new Error(`Cannot read configuration file ${path}: ${reason}`);
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new Error(`Configuration file ${path} is not valid JSON: ${reason}`);
	}
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		throw new Error(`Configuration file ${path} must contain a JSON object`);
	}

	return parseConfig({ ...raw, ...overrides });
}

/**
 * Maps a validated configuration to translator options.
 */
export function toTranslatorOptions(config: BridgeConfig): HuiTranslatorOptions {
	const { faders } = config;
	return {
		zones:
			faders.mode === ZoneMappingMode.CONTROLLER
				? {
						mode: faders.mode,
						controllers: faders.controllers,
						restrictChannels: faders.restrictChannels,
					}
				: { mode: faders.mode, controllers: faders.controllers },
		navigation: config.navigationInput
			? {
					controllers: config.navigation.controllers,
					triggerOnNonZero: config.navigation.triggerOnNonZero,
				}
			: null,
		releaseTimeoutMs: config.releaseTimeoutMs,
		pollIntervalMs: config.pollIntervalMs,
		debug: config.debug,
	};
}
