// src/translator.ts

import { EventEmitter } from "node:events";
import { FaderBank } from "./faders";
import { formatMidiEvent } from "./messages";
import { encodeNavigation } from "./protocol";
import { NavigationTranslator } from "./navigation";
import type {
	FaderState,
	HuiTranslatorEvents,
	HuiTranslatorOptions,
	MidiEvent,
	MidiEventSink,
	MidiEventSource,
	TranslatorIo,
} from "./types";
import { ZoneMapper } from "./zones";

const DEFAULT_OPTIONS = {
	releaseTimeoutMs: 250,
	pollIntervalMs: 10,
	debug: false,
};

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

interface ResolvedOptions {
	zones: ZoneMapper;
	navigation: NavigationTranslator | null;
	releaseTimeoutMs: number;
	pollIntervalMs: number;
}

function resolveOptions(options: HuiTranslatorOptions): ResolvedOptions {
	const releaseTimeoutMs =
		options.releaseTimeoutMs ?? DEFAULT_OPTIONS.releaseTimeoutMs;
	const pollIntervalMs =
		options.pollIntervalMs ?? DEFAULT_OPTIONS.pollIntervalMs;

	// Must be positive: a move is never swept in the iteration that recorded it
	if (!(releaseTimeoutMs > 0)) {
		throw new Error(
			`releaseTimeoutMs must be greater than 0, got ${releaseTimeoutMs}`,
		);
	}
	if (!(pollIntervalMs >= 0)) {
		throw new Error(
			`pollIntervalMs must not be negative, got ${pollIntervalMs}`,
		);
	}

	return {
		zones: new ZoneMapper(options.zones),
		navigation: options.navigation
			? new NavigationTranslator(options.navigation)
			: null,
		releaseTimeoutMs,
		pollIntervalMs,
	};
}

/**
 * Polls the fader (and optional navigation) input, translates CC events into
 * HUI messages and releases faders that stopped moving.
 *
 * Each iteration drains both inputs in arrival order, sweeps for timed-out
 * faders, then sleeps `pollIntervalMs` before the next iteration.
 */
export class HuiTranslator extends EventEmitter {
	private readonly input: MidiEventSource;
	private readonly output: MidiEventSink;
	private readonly navigationInput: MidiEventSource | null;
	private readonly zones: ZoneMapper;
	private readonly navigation: NavigationTranslator | null;
	private readonly faders: FaderBank;
	private readonly releaseTimeoutMs: number;
	private readonly pollIntervalMs: number;
	private readonly clock: () => number;
	private readonly debug: boolean;
	private timer: NodeJS.Timeout | null = null;
	private running = false;
	private stopped = false;

	constructor(io: TranslatorIo, options: HuiTranslatorOptions) {
		super();

		let resolved: ResolvedOptions;
		try {
			resolved = resolveOptions(options);
		} catch (error) {
			// The translator owns the ports; rejected options close them
			for (const resource of [io.input, io.navigationInput, io.output]) {
				try {
					resource?.close();
				} catch (closeError) {
					if (options.debug) {
						console.debug(
							`[HuiTranslator] Failed to close port: ${toError(closeError).message}`,
						);
					}
				}
			}
			throw error;
		}

		this.zones = resolved.zones;
		this.navigation = resolved.navigation;
		this.releaseTimeoutMs = resolved.releaseTimeoutMs;
		this.pollIntervalMs = resolved.pollIntervalMs;
		this.input = io.input;
		this.output = io.output;
		// Without a mapping the navigation input is still owned, and closed on stop
		this.navigationInput = io.navigationInput ?? null;
		this.faders = new FaderBank((messages) => this.send(messages));
		this.clock = options.clock ?? Date.now;
		this.debug = options.debug ?? DEFAULT_OPTIONS.debug;
	}

	// Safely override EventEmitter methods with strong types
	on<K extends keyof HuiTranslatorEvents>(
		event: K,
		listener: HuiTranslatorEvents[K],
	): this {
		return super.on(event, listener as (...args: unknown[]) => void);
	}
	once<K extends keyof HuiTranslatorEvents>(
		event: K,
		listener: HuiTranslatorEvents[K],
	): this {
		return super.once(event, listener as (...args: unknown[]) => void);
	}
	emit<K extends keyof HuiTranslatorEvents>(
		event: K,
		...args: Parameters<HuiTranslatorEvents[K]>
	): boolean {
		return super.emit(event, ...args);
	}

	/**
	 * Starts the polling loop. The first iteration runs immediately.
	 */
	public start(): void {
		if (this.stopped) {
			throw new Error("Translator was stopped and cannot be restarted");
		}
		if (this.running) return;

		this.running = true;
		this.debugWithTimestamp(
			`[HuiTranslator] Started (release ${this.releaseTimeoutMs}ms, poll ${this.pollIntervalMs}ms)`,
		);
		this.emit("start");
		this.runIteration();
	}

	/**
	 * Runs one loop iteration: drain inputs, dispatch, sweep for timeouts.
	 */
	public tick(): void {
		const now = this.clock();

		for (const event of this.input.drain()) {
			this.handleFaderEvent(event, now);
		}

		if (this.navigationInput) {
			for (const event of this.navigationInput.drain()) {
				this.handleNavigationEvent(event);
			}
		}

		for (const zone of this.faders.sweep(now, this.releaseTimeoutMs)) {
			this.debugWithTimestamp(`[HuiTranslator] Released fader ${zone + 1}`);
			this.emit("release", zone);
		}
	}

	/**
	 * Stops the loop, releases every touched fader and closes all ports.
	 * Every step is attempted; the first failure is rethrown once all ports
	 * were closed.
	 */
	public stop(): void {
		if (this.stopped) return;
		this.stopped = true;
		this.running = false;

		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}

		const errors: Error[] = [];

		try {
			for (const zone of this.faders.releaseAll()) {
				this.emit("release", zone);
			}
		} catch (error) {
			errors.push(toError(error));
		}

		const resources: [string, { close(): void } | null][] = [
			["input", this.input],
			["navigation input", this.navigationInput],
			["output", this.output],
		];
		for (const [name, resource] of resources) {
			if (!resource) continue;
			try {
				resource.close();
			} catch (error) {
				const err = toError(error);
				this.debugWithTimestamp(
					`[HuiTranslator] Failed to close ${name}: ${err.message}`,
				);
				errors.push(err);
			}
		}

		this.debugWithTimestamp("[HuiTranslator] Stopped");
		this.emit("stop");

		if (errors.length > 0) throw errors[0];
	}

	public isRunning(): boolean {
		return this.running;
	}

	/**
	 * Snapshot of the touch state of all 8 faders.
	 */
	public getFaderStates(): FaderState[] {
		return this.faders.getStates();
	}

	public getZoneMapper(): ZoneMapper {
		return this.zones;
	}

	public getNavigationTranslator(): NavigationTranslator | null {
		return this.navigation;
	}

	private runIteration(): void {
		if (!this.running) return;

		try {
			this.tick();
		} catch (error) {
			this.emit("error", toError(error));
		}

		// A listener may have stopped the translator
		if (this.running) {
			this.timer = setTimeout(() => this.runIteration(), this.pollIntervalMs);
		}
	}

	private handleFaderEvent(event: MidiEvent, now: number): void {
		if (event.type !== "control_change") return;

		const zone = this.zones.resolve(event.controller, event.channel);
		if (zone === null) {
			this.debugWithTimestamp(
				`[HuiTranslator] Ignored CC${event.controller} on channel ${event.channel + 1}`,
			);
			return;
		}

		const { value14, touched } = this.faders.move(zone, event.value, now);
		if (touched) this.emit("touch", zone);
		this.emit("move", zone, value14);
	}

	private handleNavigationEvent(event: MidiEvent): void {
		if (!this.navigation) return;

		const button = this.navigation.translate(event);
		if (button === null) return;

		this.send(encodeNavigation(button));
		this.debugWithTimestamp(`[HuiTranslator] Navigation ${button}`);
		this.emit("navigate", button);
	}

	private send(messages: readonly MidiEvent[]): void {
		for (const message of messages) {
			if (this.debug) {
				this.debugWithTimestamp(
					`[HuiTranslator] >>> TX: ${formatMidiEvent(message)}`,
				);
			}
			this.output.send(message);
		}
	}

	private debugWithTimestamp(...args: unknown[]) {
		if (this.debug) {
			const timestamp = new Date().toISOString();
			console.debug(`[${timestamp}]`, ...args);
		}
	}
}
