// src/faders.ts

import { scale7To14 } from "./converters";
import {
	encodeMove,
	encodeRelease,
	encodeTouch,
	FADER_ZONE_COUNT,
	isFaderZone,
} from "./protocol";
import type { FaderState, MidiEvent } from "./types";

/**
 * Receives each encoded HUI sequence, in order.
 */
export type HuiOutput = (messages: readonly MidiEvent[]) => void;

/**
 * Touch/release state machine for the 8 HUI fader zones.
 *
 * A zone is touched right before the first move of a gesture and released once
 * no move has arrived for the release timeout. State only changes after the
 * corresponding messages were handed to the output. A touched zone always has a
 * move time, so it is released on timeout even when its first move failed.
 */
export class FaderBank {
	private readonly faders: FaderState[] = Array.from(
		{ length: FADER_ZONE_COUNT },
		() => ({ touched: false, lastMoveAt: null }),
	);

	constructor(private readonly output: HuiOutput) {}

	/**
	 * Apply an incoming 7-bit value to a zone, touching it first if needed.
	 * @param zone The fader zone, 0-7.
	 * @param value7 The incoming CC value.
	 * @param now The current time in ms.
	 * @returns The 14-bit position that was sent, and whether a touch was sent.
	 */
	public move(
		zone: number,
		value7: number,
		now: number,
	): { value14: number; touched: boolean } {
		this.assertZone(zone);
		const state = this.faders[zone];

		let touched = false;
		if (!state.touched) {
			this.output(encodeTouch(zone));
			// The touch time starts the timeout even if the move below fails
			state.touched = true;
			state.lastMoveAt = now;
			touched = true;
		}

		const value14 = scale7To14(value7);
		this.output(encodeMove(zone, value14));
		state.lastMoveAt = now;

		return { value14, touched };
	}

	/**
	 * Release every touched zone idle for at least `timeoutMs`.
	 * @returns The zones that were released, in zone order.
	 */
	public sweep(now: number, timeoutMs: number): number[] {
		const released: number[] = [];
		this.faders.forEach((state, zone) => {
			if (
				state.touched &&
				state.lastMoveAt !== null &&
				now - state.lastMoveAt >= timeoutMs
			) {
				this.release(zone);
				released.push(zone);
			}
		});
		return released;
	}

	/**
	 * Force-release every touched zone. Every zone is attempted; the first
	 * failure is rethrown afterwards.
	 * @returns The zones that were released.
	 */
	public releaseAll(): number[] {
		const released: number[] = [];
		let firstError: unknown = null;

		this.faders.forEach((state, zone) => {
			if (!state.touched) return;
			try {
				this.release(zone);
				released.push(zone);
			} catch (error) {
				firstError ??= error;
			}
		});

		if (firstError !== null) throw firstError;
		return released;
	}

	public isTouched(zone: number): boolean {
		this.assertZone(zone);
		return this.faders[zone].touched;
	}

	/**
	 * Snapshot of every zone's state.
	 */
	public getStates(): FaderState[] {
		return this.faders.map((state) => ({ ...state }));
	}

	private release(zone: number): void {
		const state = this.faders[zone];
		this.output(encodeRelease(zone));
		state.touched = false;
		state.lastMoveAt = null;
	}

	private assertZone(zone: number): void {
		if (!isFaderZone(zone)) {
			throw new Error(`Fader zone must be between 0 and 7, got ${zone}`);
		}
	}
}
