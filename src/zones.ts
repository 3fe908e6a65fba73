// src/zones.ts

import { FADER_ZONE_COUNT } from "./protocol";
import { ZoneMappingMode, type ZoneMappingOptions } from "./types";

/**
 * Default controller-keyed table, zone i is fed by entry i.
 * Fader 1 = CC11 (expression), 2 = CC1 (mod wheel), 3 = CC2 (breath), 4 = CC21,
 * 5 = CC5 (portamento time), 6 = CC3, 7 = CC9, 8 = CC7 (volume).
 */
export const DEFAULT_CONTROLLER_ZONES: readonly number[] = [
	11, 1, 2, 21, 5, 3, 9, 7,
];

/**
 * Default channel-keyed table, channel i drives zone i with entry i.
 */
export const DEFAULT_CHANNEL_ZONES: readonly number[] = [
	1, 11, 2, 21, 5, 3, 9, 7,
];

/**
 * Resolves incoming CC events to HUI fader zones.
 * The table is validated and frozen at construction.
 */
export class ZoneMapper {
	public readonly mode: ZoneMappingMode;
	private readonly controllers: readonly number[];
	private readonly restrictChannels: boolean;
	private readonly byController: ReadonlyMap<number, number>;

	constructor(options: ZoneMappingOptions) {
		const { mode, controllers } = options;

		if (controllers.length !== FADER_ZONE_COUNT) {
			throw new Error(
				`Zone mapping needs exactly ${FADER_ZONE_COUNT} controllers, got ${controllers.length}`,
			);
		}
		for (const cc of controllers) {
			if (!Number.isInteger(cc) || cc < 0 || cc > 127) {
				throw new Error(`Controller number must be between 0 and 127, got ${cc}`);
			}
		}

		const byController = new Map<number, number>();
		controllers.forEach((cc, zone) => {
			if (mode === ZoneMappingMode.CONTROLLER && byController.has(cc)) {
				throw new Error(
					`Controller ${cc} is assigned to zones ${byController.get(cc)} and ${zone}`,
				);
			}
			byController.set(cc, zone);
		});

		this.mode = mode;
		this.controllers = Object.freeze([...controllers]);
		this.restrictChannels = options.restrictChannels ?? false;
		this.byController = byController;
	}

	/**
	 * Look up the zone for a controller on a channel.
	 * @param controller The incoming controller number.
	 * @param channel The incoming MIDI channel (0-15).
	 * @returns The zone index 0-7, or null when the event is not mapped.
	 */
	public resolve(controller: number, channel: number): number | null {
		if (this.mode === ZoneMappingMode.CHANNEL) {
			if (channel < 0 || channel >= FADER_ZONE_COUNT) return null;
			// A mismatching controller on a mapped channel is ignored, not reported
			return this.controllers[channel] === controller ? channel : null;
		}

		if (
			this.restrictChannels &&
			(channel < 0 || channel >= FADER_ZONE_COUNT)
		) {
			return null;
		}
		return this.byController.get(controller) ?? null;
	}

	/**
	 * The configured controller number for each zone.
	 */
	public getControllers(): readonly number[] {
		return this.controllers;
	}

	/**
	 * Human-readable summary with 1-based faders and channels,
	 * e.g. `CC11->1 CC1->2 ...` or `ch1/CC1->1 ch2/CC11->2 ...`.
	 */
	public describe(): string {
		return this.controllers
			.map((cc, zone) =>
				this.mode === ZoneMappingMode.CHANNEL
					? `ch${zone + 1}/CC${cc}->${zone + 1}`
					: `CC${cc}->${zone + 1}`,
			)
			.join(" ");
	}
}
