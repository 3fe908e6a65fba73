// tests/protocol.test.ts

import {
	encodeButtonPress,
	encodeMove,
	encodeNavigation,
	encodeRelease,
	encodeTouch,
	HUI_CHANNEL,
	huiControlChange,
	isFaderZone,
	NAVIGATION_ZONE,
} from "../src/protocol";
import { type MidiEvent, NavigationButton } from "../src/types";

const pairs = (events: MidiEvent[]) =>
	events.map((event) => [event.controller, event.value]);

describe("📡 Protocol", () => {
	test("should send every message as CC on channel 1", () => {
		const events = [
			...encodeTouch(2),
			...encodeMove(2, 1000),
			...encodeRelease(2),
			...encodeButtonPress(NAVIGATION_ZONE, 1),
		];

		for (const event of events) {
			expect(event.type).toBe("control_change");
			expect(event.channel).toBe(HUI_CHANNEL);
		}
		expect(HUI_CHANNEL).toBe(0);
	});

	describe("fader touch and release", () => {
		test("should select the zone then send touch on", () => {
			expect(pairs(encodeTouch(3))).toEqual([
				[0x0f, 0x03],
				[0x2f, 0x40],
			]);
		});

		test("should select the zone then send touch off", () => {
			expect(pairs(encodeRelease(7))).toEqual([
				[0x0f, 0x07],
				[0x2f, 0x00],
			]);
		});
	});

	describe("encodeMove", () => {
		test("should send the high byte then the low byte on zone-offset controllers", () => {
			expect(pairs(encodeMove(0, 8256))).toEqual([
				[0x00, 64],
				[0x20, 64],
			]);
			expect(pairs(encodeMove(5, 0x2abc))).toEqual([
				[0x05, 0x55],
				[0x25, 0x3c],
			]);
		});

		test("should clamp the position to 14 bits", () => {
			expect(pairs(encodeMove(1, 99999))).toEqual([
				[0x01, 0x7f],
				[0x21, 0x7f],
			]);
		});
	});

	describe("encodeButtonPress", () => {
		test("should send zone select, port on, port off", () => {
			expect(pairs(encodeButtonPress(0x0a, 3))).toEqual([
				[0x0c, 0x0a],
				[0x2c, 0x43],
				[0x2c, 0x03],
			]);
		});

		test("should mask the port to 3 bits", () => {
			expect(pairs(encodeButtonPress(0x0a, 9))).toEqual([
				[0x0c, 0x0a],
				[0x2c, 0x41],
				[0x2c, 0x01],
			]);
		});
	});

	describe("encodeNavigation", () => {
		test("should map each button to its port in the channel-selection zone", () => {
			const testCases = [
				{ button: NavigationButton.CHANNEL_LEFT, port: 0 },
				{ button: NavigationButton.BANK_LEFT, port: 1 },
				{ button: NavigationButton.CHANNEL_RIGHT, port: 2 },
				{ button: NavigationButton.BANK_RIGHT, port: 3 },
			];

			testCases.forEach(({ button, port }) => {
				expect(pairs(encodeNavigation(button))).toEqual([
					[0x0c, 0x0a],
					[0x2c, 0x40 | port],
					[0x2c, port],
				]);
			});
		});
	});

	test("should mask controller and value to 7 bits", () => {
		expect(huiControlChange(0x8f, 0x1c0)).toEqual({
			type: "control_change",
			channel: 0,
			controller: 0x0f,
			value: 0x40,
		});
	});

	test("should recognise the 8 fader zones", () => {
		expect(isFaderZone(0)).toBe(true);
		expect(isFaderZone(7)).toBe(true);
		expect(isFaderZone(8)).toBe(false);
		expect(isFaderZone(-1)).toBe(false);
		expect(isFaderZone(1.5)).toBe(false);
	});
});
