// SPDX-License-Identifier: MIT
// Circwait Test Fixtures
// Small event-stream scenarios shared by the unit and integration tests

import type { Logger } from "../src/config.ts";
import type { EventKind, ThreadContext } from "../src/types.ts";
import { validateEventStream, type EventStream } from "../src/validator.ts";
import type { EventInput, EventStreamInput } from "../src/zod-schemas.ts";

export type Step = [threadId: string, kind: EventKind, resourceId: string];

export function events(...steps: Step[]): EventInput[] {
	return steps.map(([threadId, kind, resourceId]) => ({ threadId, kind, resourceId }));
}

/** Validate a raw stream, failing the test on invalid input */
export function parse(input: EventStreamInput): EventStream {
	const result = validateEventStream(input);
	if (!result.valid) {
		throw new Error("fixture is invalid: " + result.errors.map((e) => e.path + " " + e.message).join("; "));
	}
	return result.value;
}

/** Per-thread programs of a stream, in first-appearance order */
export function threadsOf(stream: EventStream): Map<string, ThreadContext> {
	const threads = new Map<string, ThreadContext>();
	for (const event of stream.events) {
		const existing = threads.get(event.threadId);
		threads.set(event.threadId, { id: event.threadId, events: [...(existing?.events ?? []), event] });
	}
	return threads;
}

//==============================================================================
// Scenarios
//==============================================================================

/** T1 takes A then B while T2 takes B then A, interleaved into a deadlock */
export function classicInversion(): EventStreamInput {
	return {
		events: events(
			["T1", "acquire", "A"],
			["T2", "acquire", "B"],
			["T1", "acquire", "B"],
			["T2", "acquire", "A"],
			["T1", "release", "B"],
			["T1", "release", "A"],
			["T2", "release", "A"],
			["T2", "release", "B"],
		),
	};
}

/** Three threads each holding one resource and waiting for the next */
export function threeThreadRing(): EventStreamInput {
	return {
		events: events(
			["T1", "acquire", "A"],
			["T2", "acquire", "B"],
			["T3", "acquire", "C"],
			["T1", "acquire", "B"],
			["T2", "acquire", "C"],
			["T3", "acquire", "A"],
		),
	};
}

/** Opposite nesting orders of A and B, both taken under gate lock G, run one thread after the other */
export function gatedInversion(): EventStreamInput {
	return {
		events: events(
			["T1", "acquire", "G"],
			["T1", "acquire", "A"],
			["T1", "acquire", "B"],
			["T1", "release", "B"],
			["T1", "release", "A"],
			["T1", "release", "G"],
			["T2", "acquire", "G"],
			["T2", "acquire", "B"],
			["T2", "acquire", "A"],
			["T2", "release", "A"],
			["T2", "release", "B"],
			["T2", "release", "G"],
		),
	};
}

/** Opposite nesting orders of A and B without a gate, run one thread after the other */
export function sequentialInversion(): EventStreamInput {
	return {
		events: events(
			["T1", "acquire", "A"],
			["T1", "acquire", "B"],
			["T1", "release", "B"],
			["T1", "release", "A"],
			["T2", "acquire", "B"],
			["T2", "acquire", "A"],
			["T2", "release", "A"],
			["T2", "release", "B"],
		),
	};
}

//==============================================================================
// Logging
//==============================================================================

export interface RecordingLogger extends Logger {
	warnings: string[];
	infos: string[];
}

/** Logger that keeps warnings and info lines for assertions */
export function recordingLogger(): RecordingLogger {
	const warnings: string[] = [];
	const infos: string[] = [];
	return {
		warnings,
		infos,
		debug: () => undefined,
		info: (message: string) => { infos.push(message); },
		warn: (message: string) => { warnings.push(message); },
	};
}
