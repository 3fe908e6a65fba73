// src/messages.ts

import type { MidiEvent, MidiEventType } from "./types";

const STATUS_TYPES: Partial<Record<number, MidiEventType>> = {
	0x80: "note_off",
	0x90: "note_on",
	0xa0: "poly_pressure",
	0xb0: "control_change",
	0xc0: "program_change",
	0xd0: "channel_pressure",
	0xe0: "pitch_bend",
};

const TYPE_STATUS: Record<MidiEventType, number> = {
	note_off: 0x80,
	note_on: 0x90,
	poly_pressure: 0xa0,
	control_change: 0xb0,
	program_change: 0xc0,
	channel_pressure: 0xd0,
	pitch_bend: 0xe0,
};

// Program change and channel pressure carry a single data byte
function dataLength(type: MidiEventType): number {
	return type === "program_change" || type === "channel_pressure" ? 1 : 2;
}

/**
 * Parses raw bytes from a MIDI port into a structured event.
 * @param bytes The raw message, status byte first.
 * @returns The event, or null for system messages and truncated input.
 */
export function parseMidiMessage(bytes: readonly number[]): MidiEvent | null {
	if (bytes.length === 0) return null;

	const status = bytes[0];
	const type = STATUS_TYPES[status & 0xf0];
	// System messages (0xF0-0xFF) and running-status data bytes
	if (type === undefined) return null;

	const length = dataLength(type);
	if (bytes.length < 1 + length) return null;

	return {
		type,
		channel: status & 0x0f,
		controller: bytes[1] & 0x7f,
		value: length === 2 ? bytes[2] & 0x7f : 0,
	};
}

/**
 * Serializes an event into the raw bytes sent to a MIDI port.
 */
export function toMidiBytes(event: MidiEvent): number[] {
	const status = TYPE_STATUS[event.type] | (event.channel & 0x0f);
	if (dataLength(event.type) === 1) {
		return [status, event.controller & 0x7f];
	}
	return [status, event.controller & 0x7f, event.value & 0x7f];
}

/**
 * Formats an event as hex bytes, e.g. `B0 0F 03`.
 */
export function formatMidiEvent(event: MidiEvent): string {
	return toMidiBytes(event)
		.map((byte) => byte.toString(16).toUpperCase().padStart(2, "0"))
		.join(" ");
}
