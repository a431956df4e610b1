// SPDX-License-Identifier: MIT
// Circwait Event Stream Validator
// Two-phase validation: Zod safeParse for structure, then semantic checks.

import {
	invalidResult,
	validResult,
	type ValidationError,
	type ValidationResult,
} from "./errors.ts";
import type { LockEvent, Resource } from "./types.ts";
import {
	EventStreamSchema,
	type ControlFlowFactsInput,
	type EventInput,
	type OrderingsInput,
	type ParsedEventStream,
} from "./zod-schemas.ts";

//==============================================================================
// Normalized Stream
//==============================================================================

/** Event stream after validation: ids and locations filled in */
export interface EventStream {
	/** Declared resources; empty when the front-end declares none */
	resources: Resource[];
	events: LockEvent[];
	facts?: ControlFlowFactsInput | undefined;
	orderings?: OrderingsInput | undefined;
}

//==============================================================================
// Validation
//==============================================================================

/**
 * Validate and normalize a raw event stream.
 */
export function validateEventStream(input: unknown): ValidationResult<EventStream> {
	const parsed = EventStreamSchema.safeParse(input);
	if (!parsed.success) {
		return invalidResult(parsed.error.issues.map((issue) => ({
			path: formatPath(issue.path),
			message: issue.message,
		})));
	}

	const stream = normalizeStream(parsed.data);
	const errors = [
		...checkDuplicateEvents(stream.events),
		...checkDuplicateResources(stream.resources),
	];
	return errors.length > 0 ? invalidResult(errors) : validResult(stream);
}

function formatPath(path: readonly PropertyKey[]): string {
	let out = "";
	for (const segment of path) {
		out += typeof segment === "number" ? "[" + String(segment) + "]" : "/" + String(segment);
	}
	return out === "" ? "/" : out;
}

function normalizeStream(data: ParsedEventStream): EventStream {
	const perThread = new Map<string, number>();
	const events = data.events.map((input) => {
		const index = perThread.get(input.threadId) ?? 0;
		perThread.set(input.threadId, index + 1);
		return normalizeEvent(input, index);
	});
	const resources: Resource[] = (data.resources ?? []).map((decl) => ({
		id: decl.id,
		kind: decl.kind,
		scope: decl.scope,
	}));
	return { resources, events, facts: data.facts, orderings: data.orderings };
}

function normalizeEvent(input: EventInput, index: number): LockEvent {
	return {
		id: input.id ?? `${input.threadId}#${String(index)}`,
		threadId: input.threadId,
		kind: input.kind,
		resourceId: input.resourceId,
		location: input.location ?? { line: 0 },
	};
}

function checkDuplicateEvents(events: LockEvent[]): ValidationError[] {
	const seen = new Set<string>();
	const errors: ValidationError[] = [];
	events.forEach((event, i) => {
		if (seen.has(event.id)) {
			errors.push({ path: `/events[${String(i)}]/id`, message: "Duplicate event id", value: event.id });
		}
		seen.add(event.id);
	});
	return errors;
}

function checkDuplicateResources(resources: Resource[]): ValidationError[] {
	const seen = new Set<string>();
	const errors: ValidationError[] = [];
	resources.forEach((resource, i) => {
		if (seen.has(resource.id)) {
			errors.push({ path: `/resources[${String(i)}]/id`, message: "Duplicate resource declaration", value: resource.id });
		}
		seen.add(resource.id);
	});
	return errors;
}

/**
 * Build a stream directly from normalized events, bypassing schema parsing.
 * Useful for callers that already hold LockEvent values.
 */
export function streamFromEvents(events: LockEvent[], resources: Resource[] = []): EventStream {
	return { resources, events };
}
