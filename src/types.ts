// src/types.ts

/**
 * Channel-voice message types understood by the message codec.
 * Only `control_change` carries meaning for the translator.
 */
export type MidiEventType =
	| "note_off"
	| "note_on"
	| "poly_pressure"
	| "control_change"
	| "program_change"
	| "channel_pressure"
	| "pitch_bend";

/**
 * A single channel-voice MIDI message.
 */
export interface MidiEvent {
	type: MidiEventType;
	/** MIDI channel, 0-15 */
	channel: number;
	/** Controller number for CC, first data byte otherwise */
	controller: number;
	/** 7-bit value for CC, second data byte otherwise */
	value: number;
}

/**
 * Non-blocking source of incoming events.
 */
export interface MidiEventSource {
	/** Returns every event received since the last call, oldest first. */
	drain(): MidiEvent[];
	close(): void;
}

/**
 * Ordered, synchronous sink for outgoing events.
 */
export interface MidiEventSink {
	send(event: MidiEvent): void;
	close(): void;
}

/**
 * Touch state of one HUI fader zone.
 */
export interface FaderState {
	/** A touch was sent and no release has been sent since */
	touched: boolean;
	/** Time (ms) of the last move while touched, null when untouched */
	lastMoveAt: number | null;
}

/**
 * The four logical navigation buttons of the HUI channel-selection zone.
 */
export enum NavigationButton {
	CHANNEL_LEFT = "channelLeft",
	BANK_LEFT = "bankLeft",
	CHANNEL_RIGHT = "channelRight",
	BANK_RIGHT = "bankRight",
}

/**
 * How incoming CC events are assigned to fader zones.
 */
export enum ZoneMappingMode {
	/** Zone looked up by controller number, channel ignored */
	CONTROLLER = "controller",
	/** Zone equals channel (0-7), controller must match that channel's entry */
	CHANNEL = "channel",
}

export interface ZoneMappingOptions {
	mode: ZoneMappingMode;
	/**
	 * Controller number feeding each zone; entry i belongs to zone i.
	 * Exactly 8 entries.
	 */
	controllers: readonly number[];
	/**
	 * Controller mode only: drop events on channels outside 0-7.
	 * @default false
	 */
	restrictChannels?: boolean;
}

export interface NavigationOptions {
	/** Controller number that triggers each button */
	controllers: Readonly<Record<NavigationButton, number>>;
	/**
	 * Ignore events whose value is 0 (the release half of a button).
	 * @default true
	 */
	triggerOnNonZero?: boolean;
}

/**
 * Inputs and output the translator drives. The translator takes ownership
 * and closes all of them on stop.
 */
export interface TranslatorIo {
	input: MidiEventSource;
	output: MidiEventSink;
	navigationInput?: MidiEventSource | null;
}

/**
 * Timing and mapping options for the HuiTranslator.
 */
export interface HuiTranslatorOptions {
	zones: ZoneMappingOptions;
	/** Navigation mapping; omit to disable the navigation input */
	navigation?: NavigationOptions | null;
	/**
	 * Inactivity (ms) after which a touched fader is released.
	 * @default 250
	 */
	releaseTimeoutMs?: number;
	/**
	 * Sleep (ms) between loop iterations.
	 * @default 10
	 */
	pollIntervalMs?: number;
	/**
	 * Clock used for move times and timeout checks.
	 * @default Date.now
	 */
	clock?: () => number;
	/**
	 * Whether to enable debug logging.
	 * @default false
	 */
	debug?: boolean;
}

/**
 * Defines the event map for the HuiTranslator's EventEmitter.
 */
export interface HuiTranslatorEvents {
	/** Emitted when the polling loop starts */
	start: () => void;
	/** Emitted after shutdown released all faders and closed all ports */
	stop: () => void;
	/** Emitted when a touch was sent for a zone */
	touch: (zone: number) => void;
	/** Emitted when a 14-bit move was sent for a zone */
	move: (zone: number, value14: number) => void;
	/** Emitted when a release was sent for a zone */
	release: (zone: number) => void;
	/** Emitted when a navigation button press was sent */
	navigate: (button: NavigationButton) => void;
	/** Emitted when a loop iteration throws */
	error: (error: Error) => void;
}
