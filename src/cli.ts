#!/usr/bin/env node

import {
	type BridgeConfig,
	DEFAULT_CONFIG,
	loadConfig,
	parseConfig,
	toTranslatorOptions,
} from "./config";
import { listMidiPorts, MidiInputPort, MidiOutputPort } from "./midi";
import { HuiTranslator } from "./translator";
import type { TranslatorIo } from "./types";

// Helper function to add timestamps to console output
function logWithTimestamp(message: string, ...args: unknown[]) {
	const timestamp = new Date().toISOString();
	console.log(`[${timestamp}] ${message}`, ...args);
}

interface CliOptions {
	config?: string;
	input?: string;
	output?: string;
	nav?: string;
	noNav?: boolean;
	releaseMs?: number;
	pollMs?: number;
	debug?: boolean;
	list?: boolean;
	help?: boolean;
}

function parseNumber(flag: string, value: string | undefined): number {
	const parsed = Number(value);
	if (value === undefined || !Number.isFinite(parsed)) {
		throw new Error(`${flag} expects a number, got ${value ?? "nothing"}`);
	}
	return parsed;
}

// Parse command line arguments
function parseArgs(args: string[]): CliOptions {
	const options: CliOptions = {};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--list":
			case "-l":
				options.list = true;
				break;
			case "--config":
			case "-c":
				options.config = args[++i];
				break;
			case "--input":
			case "-i":
				options.input = args[++i];
				break;
			case "--output":
			case "-o":
				options.output = args[++i];
				break;
			case "--nav":
				options.nav = args[++i];
				break;
			case "--no-nav":
				options.noNav = true;
				break;
			case "--release-ms":
				options.releaseMs = parseNumber(arg, args[++i]);
				break;
			case "--poll-ms":
				options.pollMs = parseNumber(arg, args[++i]);
				break;
			case "--debug":
				options.debug = true;
				break;
			default:
				throw new Error(`Unknown option: ${arg}`);
		}
	}

	return options;
}

// Show help information
function showHelp() {
	console.log(`
CC to HUI bridge

Translates MIDI CC faders into HUI fader touch/move/release messages and,
optionally, CC buttons into HUI bank/channel navigation.

Usage: cc-hui-bridge [options]

Options:
  -h, --help           Show this help message
  -l, --list           List available MIDI ports and exit
  -c, --config FILE    JSON configuration file
  -i, --input NAME     Fader controller input port
  -o, --output NAME    Output port the DAW reads HUI from
  --nav NAME           Navigation controller input port
  --no-nav             Disable the navigation input
  --release-ms MS      Release a fader after MS of inactivity (default: ${DEFAULT_CONFIG.releaseTimeoutMs})
  --poll-ms MS         Poll interval (default: ${DEFAULT_CONFIG.pollIntervalMs})
  --debug              Log every message sent
`);
}

function printPorts() {
	const { inputs, outputs } = listMidiPorts();
	console.log("Available inputs:");
	for (const name of inputs) console.log(`   ${name}`);
	console.log("Available outputs:");
	for (const name of outputs) console.log(`   ${name}`);
}

function buildConfig(options: CliOptions): BridgeConfig {
	const overrides: Record<string, unknown> = {};
	if (options.input !== undefined) overrides.input = options.input;
	if (options.output !== undefined) overrides.output = options.output;
	if (options.nav !== undefined) overrides.navigationInput = options.nav;
	if (options.noNav) overrides.navigationInput = null;
	if (options.releaseMs !== undefined)
		overrides.releaseTimeoutMs = options.releaseMs;
	if (options.pollMs !== undefined) overrides.pollIntervalMs = options.pollMs;
	if (options.debug) overrides.debug = true;

	return options.config
		? loadConfig(options.config, overrides)
		: parseConfig(overrides);
}

// Any port that fails to open aborts startup; the ones already open are closed
function openPorts(config: BridgeConfig): TranslatorIo {
	const opened: { close(): void }[] = [];
	try {
		const input = MidiInputPort.open(config.input);
		opened.push(input);
		let navigationInput: MidiInputPort | null = null;
		if (config.navigationInput) {
			navigationInput = MidiInputPort.open(config.navigationInput);
			opened.push(navigationInput);
		}
		const output = MidiOutputPort.open(config.output);
		return { input, output, navigationInput };
	} catch (error) {
		for (const port of opened) port.close();
		throw error;
	}
}

// Main execution function
function main(): void {
	const options = parseArgs(process.argv.slice(2));

	if (options.help) {
		showHelp();
		return;
	}

	printPorts();
	if (options.list) return;

	const config = buildConfig(options);
	const translatorOptions = toTranslatorOptions(config);

	const translator = new HuiTranslator(openPorts(config), translatorOptions);

	translator.on("error", (error) => {
		console.error(`[${new Date().toISOString()}] Error:`, error.message);
	});

	logWithTimestamp("CC->HUI running");
	logWithTimestamp(`Primary input : ${config.input}`);
	logWithTimestamp(`Nav input     : ${config.navigationInput ?? "(none)"}`);
	logWithTimestamp(`Output        : ${config.output}`);
	logWithTimestamp(`Fader mapping : ${translator.getZoneMapper().describe()}`);
	const navigation = translator.getNavigationTranslator();
	if (navigation) {
		logWithTimestamp(`Nav CCs       : ${navigation.describe()}`);
	}

	const shutdown = () => {
		try {
			translator.stop();
		} catch (error) {
			process.exitCode = 1;
			console.error(
				"Shutdown error:",
				error instanceof Error ? error.message : error,
			);
		}
		logWithTimestamp("Stopped");
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	translator.start();
}

try {
	main();
} catch (error) {
	console.error(error instanceof Error ? error.message : error);
	process.exitCode = 1;
}
