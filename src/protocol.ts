// src/protocol.ts

import { split14 } from "./converters";
import { type MidiEvent, NavigationButton } from "./types";

// HUI runs entirely on CC, MIDI channel 1 (status 0xB0)
export const HUI_CHANNEL = 0;

/** Number of fader zones addressed by one HUI surface. */
export const FADER_ZONE_COUNT = 8;

/**
 * Controller numbers and values from the HUI reference mapping.
 */
export const HUI = {
	// Fader touch: zone select, then touch on/off
	FADER_ZONE_SELECT: 0x0f,
	FADER_TOUCH: 0x2f,
	TOUCH_ON: 0x40,
	TOUCH_OFF: 0x00,

	// Fader position: high byte on 0x00+zone, low byte on 0x20+zone
	FADER_HIGH_BASE: 0x00,
	FADER_LOW_BASE: 0x20,

	// Switches: zone select, then port on (0x40|port) / off (port)
	BUTTON_ZONE_SELECT: 0x0c,
	BUTTON_PORT: 0x2c,
	PORT_ON: 0x40,
} as const;

/** Switch zone holding the bank/channel navigation buttons. */
export const NAVIGATION_ZONE = 0x0a;

/**
 * Port of each navigation button within NAVIGATION_ZONE.
 */
export const NAVIGATION_PORTS: Readonly<Record<NavigationButton, number>> = {
	[NavigationButton.CHANNEL_LEFT]: 0,
	[NavigationButton.BANK_LEFT]: 1,
	[NavigationButton.CHANNEL_RIGHT]: 2,
	[NavigationButton.BANK_RIGHT]: 3,
};

/**
 * Builds one outgoing HUI control change. Controller and value are masked to 7 bits.
 */
export function huiControlChange(controller: number, value: number): MidiEvent {
	return {
		type: "control_change",
		channel: HUI_CHANNEL,
		controller: controller & 0x7f,
		value: value & 0x7f,
	};
}

/**
 * Touch fader `zone`: `B0 0F 0z`, `B0 2F 40`.
 */
export function encodeTouch(zone: number): MidiEvent[] {
	return [
		huiControlChange(HUI.FADER_ZONE_SELECT, zone),
		huiControlChange(HUI.FADER_TOUCH, HUI.TOUCH_ON),
	];
}

/**
 * Release fader `zone`: `B0 0F 0z`, `B0 2F 00`.
 */
export function encodeRelease(zone: number): MidiEvent[] {
	return [
		huiControlChange(HUI.FADER_ZONE_SELECT, zone),
		huiControlChange(HUI.FADER_TOUCH, HUI.TOUCH_OFF),
	];
}

/**
 * Move fader `zone` to a 14-bit position: `B0 0z hi`, `B0 2z lo`.
 * The position is clamped to 0-16383.
 */
export function encodeMove(zone: number, value14: number): MidiEvent[] {
	const { high, low } = split14(value14);
	return [
		huiControlChange(HUI.FADER_HIGH_BASE + zone, high),
		huiControlChange(HUI.FADER_LOW_BASE + zone, low),
	];
}

/**
 * Momentary press of a HUI switch: `B0 0C zz`, `B0 2C 4p`, `B0 2C 0p`.
 * There is no hold state; every press is followed by its release.
 */
export function encodeButtonPress(zone: number, port: number): MidiEvent[] {
	const p = port & 0x07;
	return [
		huiControlChange(HUI.BUTTON_ZONE_SELECT, zone),
		huiControlChange(HUI.BUTTON_PORT, HUI.PORT_ON | p),
		huiControlChange(HUI.BUTTON_PORT, p),
	];
}

/**
 * Press of one of the bank/channel navigation buttons.
 */
export function encodeNavigation(button: NavigationButton): MidiEvent[] {
	return encodeButtonPress(NAVIGATION_ZONE, NAVIGATION_PORTS[button]);
}

/**
 * Check if a number addresses one of the 8 fader zones
 */
export function isFaderZone(zone: number): boolean {
	return Number.isInteger(zone) && zone >= 0 && zone < FADER_ZONE_COUNT;
}
