// src/index.ts

export { HuiTranslator } from "./translator";
export { FaderBank, type HuiOutput } from "./faders";
export { ZoneMapper, DEFAULT_CHANNEL_ZONES, DEFAULT_CONTROLLER_ZONES } from "./zones";
export {
	NavigationTranslator,
	DEFAULT_NAVIGATION_CONTROLLERS,
} from "./navigation";

// Protocol encoding and conversion utilities
export * from "./protocol";
export * from "./converters";
export * from "./messages";

// Configuration
export {
	type BridgeConfig,
	configSchema,
	DEFAULT_CONFIG,
	loadConfig,
	parseConfig,
	toTranslatorOptions,
} from "./config";

// All types and interfaces
export * from "./types";

// Hardware ports
export {
	listMidiPorts,
	MidiInputPort,
	MidiOutputPort,
	type MidiPortList,
} from "./midi";
