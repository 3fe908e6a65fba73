// tests/config.test.ts

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
	DEFAULT_CONFIG,
	loadConfig,
	parseConfig,
	toTranslatorOptions,
} from "../src/config";
import { NavigationButton, ZoneMappingMode } from "../src/types";

describe("Configuration", () => {
	describe("parseConfig", () => {
		test("should fill in defaults for everything but the port names", () => {
			const config = parseConfig({ input: "Faders", output: "HUI Out" });

			expect(config).toEqual({
				...DEFAULT_CONFIG,
				input: "Faders",
				output: "HUI Out",
			});
			expect(config.faders).toEqual({
				mode: ZoneMappingMode.CONTROLLER,
				controllers: [11, 1, 2, 21, 5, 3, 9, 7],
				restrictChannels: false,
			});
		});

		test("should use the channel-keyed defaults in channel mode", () => {
			const config = parseConfig({
				input: "Faders",
				output: "HUI Out",
				faders: { mode: "channel" },
			});

			expect(config.faders).toEqual({
				mode: ZoneMappingMode.CHANNEL,
				controllers: [1, 11, 2, 21, 5, 3, 9, 7],
			});
		});

		test("should require the port names", () => {
			expect(() => parseConfig({ output: "HUI Out" })).toThrow(
				/^Invalid configuration: input: /,
			);
		});

		test("should reject a zero release timeout", () => {
			expect(() =>
				parseConfig({ input: "a", output: "b", releaseTimeoutMs: 0 }),
			).toThrow(/releaseTimeoutMs/);
		});

		test("should reject duplicate controllers in controller mode", () => {
			expect(() =>
				parseConfig({
					input: "a",
					output: "b",
					faders: { mode: "controller", controllers: [1, 1, 2, 3, 4, 5, 6, 7] },
				}),
			).toThrow(
				"faders.controllers: Controller numbers must be distinct in controller mode",
			);
		});

		test("should reject a table without 8 entries", () => {
			expect(() =>
				parseConfig({
					input: "a",
					output: "b",
					faders: { mode: "channel", controllers: [7, 7] },
				}),
			).toThrow(/faders\.controllers/);
		});

		test("should reject two navigation buttons on one controller", () => {
			expect(() =>
				parseConfig({
					input: "a",
					output: "b",
					navigation: {
						controllers: {
							bankLeft: 75,
							bankRight: 75,
							channelLeft: 78,
							channelRight: 77,
						},
					},
				}),
			).toThrow(
				"navigation.controllers: Each navigation button needs its own controller number",
			);
		});

		test("should reject unknown keys inside the fader mapping", () => {
			expect(() =>
				parseConfig({
					input: "a",
					output: "b",
					faders: { mode: "channel", restrictChannels: true },
				}),
			).toThrow(/^Invalid configuration: faders: Unrecognized key/);
		});

		test("should reject unknown keys inside the navigation settings", () => {
			expect(() =>
				parseConfig({
					input: "a",
					output: "b",
					navigation: { triggerOnNonzero: false },
				}),
			).toThrow(/^Invalid configuration: navigation: Unrecognized key/);
		});

		test("should reject unknown keys", () => {
			expect(() =>
				parseConfig({ input: "a", output: "b", releaseMs: 100 }),
			).toThrow(/Unrecognized key/);
		});
	});

	describe("loadConfig", () => {
		let dir: string;

		beforeEach(() => {
			dir = fs.mkdtempSync(path.join(os.tmpdir(), "cc-hui-"));
		});

		afterEach(() => {
			fs.rmSync(dir, { recursive: true, force: true });
		});

		test("should read a file and apply overrides on top", () => {
			const file = path.join(dir, "bridge.json");
			fs.writeFileSync(
				file,
				JSON.stringify({
					input: "Faders",
					output: "HUI Out",
					navigationInput: "Nav",
					releaseTimeoutMs: 400,
				}),
			);

			const config = loadConfig(file, { navigationInput: null, debug: true });

			expect(config.input).toBe("Faders");
			expect(config.releaseTimeoutMs).toBe(400);
			expect(config.navigationInput).toBeNull();
			expect(config.debug).toBe(true);
		});

		test("should report a missing file", () => {
			const file = path.join(dir, "missing.json");
			expect(() => loadConfig(file)).toThrow(
				`Cannot read configuration file ${file}`,
			);
		});

		test("should report invalid JSON", () => {
			const file = path.join(dir, "broken.json");
			fs.writeFileSync(file, "{ input: ");
			expect(() => loadConfig(file)).toThrow("is not valid JSON");
		});

		test("should require a JSON object", () => {
			const file = path.join(dir, "list.json");
			fs.writeFileSync(file, "[]");
			expect(() => loadConfig(file)).toThrow("must contain a JSON object");
		});

		test("should load the bundled example", () => {
			const config = loadConfig(
				path.join(__dirname, "..", "config", "example.json"),
			);

			expect(config.navigationInput).toBe("Supernova II");
			expect(config.navigation.controllers[NavigationButton.BANK_RIGHT]).toBe(
				75,
			);
		});
	});

	describe("toTranslatorOptions", () => {
		test("should disable navigation without a navigation input", () => {
			const options = toTranslatorOptions(
				parseConfig({ input: "a", output: "b" }),
			);

			expect(options.navigation).toBeNull();
			expect(options.zones).toEqual({
				mode: ZoneMappingMode.CONTROLLER,
				controllers: [11, 1, 2, 21, 5, 3, 9, 7],
				restrictChannels: false,
			});
			expect(options.releaseTimeoutMs).toBe(250);
			expect(options.pollIntervalMs).toBe(10);
		});

		test("should pass the navigation mapping through", () => {
			const options = toTranslatorOptions(
				parseConfig({
					input: "a",
					output: "b",
					navigationInput: "Nav",
					navigation: { triggerOnNonZero: false },
				}),
			);

			expect(options.navigation).toEqual({
				controllers: {
					bankLeft: 76,
					bankRight: 75,
					channelLeft: 78,
					channelRight: 77,
				},
				triggerOnNonZero: false,
			});
		});
	});
});
