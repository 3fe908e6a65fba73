// src/navigation.ts

import { NavigationButton, type MidiEvent, type NavigationOptions } from "./types";

/**
 * Default controller numbers for the navigation buttons.
 * Controllers that send 0/127 work best.
 */
export const DEFAULT_NAVIGATION_CONTROLLERS: Readonly<
	Record<NavigationButton, number>
> = {
	[NavigationButton.BANK_RIGHT]: 75,
	[NavigationButton.BANK_LEFT]: 76,
	[NavigationButton.CHANNEL_RIGHT]: 77,
	[NavigationButton.CHANNEL_LEFT]: 78,
};

/**
 * Turns CC events from the secondary controller into navigation button presses.
 */
export class NavigationTranslator {
	private readonly buttons: ReadonlyMap<number, NavigationButton>;
	private readonly triggerOnNonZero: boolean;

	constructor(options: NavigationOptions) {
		const buttons = new Map<number, NavigationButton>();
		for (const button of Object.values(NavigationButton)) {
			const cc = options.controllers[button];
			if (!Number.isInteger(cc) || cc < 0 || cc > 127) {
				throw new Error(
					`Navigation controller for ${button} must be between 0 and 127, got ${cc}`,
				);
			}
			const existing = buttons.get(cc);
			if (existing !== undefined) {
				throw new Error(
					`Controller ${cc} is assigned to both ${existing} and ${button}`,
				);
			}
			buttons.set(cc, button);
		}

		this.buttons = buttons;
		this.triggerOnNonZero = options.triggerOnNonZero ?? true;
	}

	/**
	 * Decide whether an event fires a navigation button.
	 * @returns The button to press, or null when the event is ignored.
	 */
	public translate(event: MidiEvent): NavigationButton | null {
		if (event.type !== "control_change") return null;
		// Zero is the release half of a momentary button
		if (this.triggerOnNonZero && event.value === 0) return null;
		return this.buttons.get(event.controller) ?? null;
	}

	/**
	 * Human-readable summary, e.g. `bank<=76 bank=>75 chan<=78 chan=>77`.
	 */
	public describe(): string {
		const ccFor = (button: NavigationButton): string => {
			for (const [cc, b] of this.buttons) {
				if (b === button) return `${cc}`;
			}
			return "-";
		};
		return [
			`bank<=${ccFor(NavigationButton.BANK_LEFT)}`,
			`bank=>${ccFor(NavigationButton.BANK_RIGHT)}`,
			`chan<=${ccFor(NavigationButton.CHANNEL_LEFT)}`,
			`chan=>${ccFor(NavigationButton.CHANNEL_RIGHT)}`,
		].join(" ");
	}
}
