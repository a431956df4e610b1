// SPDX-License-Identifier: MIT
// Circwait Lock-Order Graph Builder
// Potential-wait graph over every thread's nested acquisitions

import { CircwaitError, MalformedEventError } from "../errors.ts";
import type { LockEvent } from "../types.ts";
import type { EventStream } from "../validator.ts";
import { collectThreads, registerResources, type BuildOptions, type BuildResult } from "./builder.ts";
import { ResourceAllocationGraph } from "./rag.ts";

/**
 * Build a graph of potential waits instead of a single snapshot.
 *
 * Each thread is replayed on its own. Whenever it acquires (or waits on) a
 * resource while holding others, it gets a `holds` edge from every held
 * resource and a `waits-for` edge to the requested one. A cycle in this graph
 * is an acquisition-order inversion that some interleaving may turn into a
 * circular wait; the simulator decides whether one does.
 *
 * Unlike snapshot graphs, several threads may hold the same resource here,
 * since the edges come from different points in time.
 */
export function buildLockOrderGraph(stream: EventStream, options: BuildOptions = {}): BuildResult {
	if (stream.events.length === 0) throw CircwaitError.emptyStream();
	const logger = options.logger ?? console;

	const rag = new ResourceAllocationGraph();
	const { resources, anomalies } = registerResources(stream, rag, logger);
	const threads = collectThreads(stream.events, rag);
	const errors: MalformedEventError[] = [];

	for (const thread of threads.values()) {
		try {
			foldThread(rag, thread.events);
		} catch (error) {
			if (!(error instanceof MalformedEventError) || options.strict) throw error;
			errors.push(error);
		}
	}

	return {
		rag,
		threads,
		resources,
		events: new Map(stream.events.map((e) => [e.id, e])),
		errors,
		anomalies,
		blocked: new Map(),
	};
}

function foldThread(rag: ResourceAllocationGraph, events: readonly LockEvent[]): void {
	// resource id -> acquiring event, in acquisition order
	const held = new Map<string, LockEvent>();

	for (const event of events) {
		switch (event.kind) {
		case "acquire":
			if (held.has(event.resourceId)) throw new MalformedEventError(event, "reacquire-held");
			addNestedEdges(rag, held, event);
			held.set(event.resourceId, event);
			break;
		case "wait":
			if (!held.has(event.resourceId)) addNestedEdges(rag, held, event);
			break;
		case "release":
			if (!held.delete(event.resourceId)) throw new MalformedEventError(event, "release-unheld");
			break;
		}
	}
}

function addNestedEdges(
	rag: ResourceAllocationGraph,
	held: Map<string, LockEvent>,
	event: LockEvent,
): void {
	if (held.size === 0) return;
	for (const [resourceId, holdEvent] of held) {
		rag.addHolds(resourceId, event.threadId, holdEvent.id);
	}
	rag.addWaitsFor(event.threadId, event.resourceId, event.id);
}
