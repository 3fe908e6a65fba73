// src/midi.ts

import * as midi from "@julusian/midi";
import { parseMidiMessage, toMidiBytes } from "./messages";
import type { MidiEvent, MidiEventSink, MidiEventSource } from "./types";

/**
 * Names of the MIDI ports currently visible to the system.
 */
export interface MidiPortList {
	inputs: string[];
	outputs: string[];
}

interface PortEnumerator {
	getPortCount(): number;
	getPortName(port: number): string;
}

function portNames(device: PortEnumerator): string[] {
	const names: string[] = [];
	const count = device.getPortCount();
	for (let i = 0; i < count; i++) {
		names.push(device.getPortName(i));
	}
	return names;
}

function findPort(
	device: PortEnumerator,
	name: string,
	direction: "input" | "output",
): number {
	const names = portNames(device);
	const index = names.indexOf(name);
	if (index === -1) {
		const available = names.length > 0 ? names.join(", ") : "(none)";
		throw new Error(
			`MIDI ${direction} port "${name}" not found. Available: ${available}`,
		);
	}
	return index;
}

/**
 * Lists the available input and output port names.
 */
export function listMidiPorts(): MidiPortList {
	const input = new midi.Input();
	const output = new midi.Output();
	try {
		return { inputs: portNames(input), outputs: portNames(output) };
	} finally {
		input.closePort();
		output.closePort();
	}
}

/**
 * Input port that buffers incoming messages until they are drained.
 */
export class MidiInputPort implements MidiEventSource {
	private pending: MidiEvent[] = [];
	private closed = false;

	private constructor(
		private readonly device: midi.Input,
		public readonly name: string,
	) {
		device.on("message", (_deltaTime: number, message: number[]) => {
			const event = parseMidiMessage(message);
			if (event) this.pending.push(event);
		});
	}

	/**
	 * Opens the input port with exactly this name.
	 * @throws Error if no such port exists or it cannot be opened.
	 */
	public static open(name: string): MidiInputPort {
		const device = new midi.Input();
		try {
			device.openPort(findPort(device, name, "input"));
		} catch (error) {
			device.closePort();
			throw error;
		}
		// Drop sysex, timing clock and active sensing
		device.ignoreTypes(true, true, true);
		return new MidiInputPort(device, name);
	}

	public drain(): MidiEvent[] {
		const events = this.pending;
		this.pending = [];
		return events;
	}

	public close(): void {
		if (this.closed) return;
		this.closed = true;
		this.pending = [];
		this.device.closePort();
	}
}

/**
 * Output port that sends each event immediately, in submission order.
 */
export class MidiOutputPort implements MidiEventSink {
	private closed = false;

	private constructor(
		private readonly device: midi.Output,
		public readonly name: string,
	) {}

	/**
	 * Opens the output port with exactly this name.
	 * @throws Error if no such port exists or it cannot be opened.
	 */
	public static open(name: string): MidiOutputPort {
		const device = new midi.Output();
		try {
			device.openPort(findPort(device, name, "output"));
		} catch (error) {
			device.closePort();
			throw error;
		}
		return new MidiOutputPort(device, name);
	}

	public send(event: MidiEvent): void {
		if (this.closed) {
			throw new Error(`MIDI output port "${this.name}" is closed`);
		}
		this.device.sendMessage(toMidiBytes(event));
	}

	public close(): void {
		if (this.closed) return;
		this.closed = true;
		this.device.closePort();
	}
}
