// SPDX-License-Identifier: MIT
// Circwait Graph Builder
// Folds an event stream into a Resource Allocation Graph

import type { Logger } from "../config.ts";
import { CircwaitError, MalformedEventError } from "../errors.ts";
import { getOrCreateList, type LockEvent, type Resource, type ThreadContext } from "../types.ts";
import type { EventStream } from "../validator.ts";
import { ResourceAllocationGraph } from "./rag.ts";

//==============================================================================
// Options and Results
//==============================================================================

export interface BuildOptions {
	/** Throw the first MalformedEventError instead of isolating the thread */
	strict?: boolean;
	logger?: Logger;
}

/** Non-fatal input irregularity */
export interface BuildAnomaly {
	code: "UnknownResourceReference";
	resourceId: string;
	eventId: string;
	message: string;
}

export interface BuildResult {
	rag: ResourceAllocationGraph;
	/** Per-thread event sequences in program order */
	threads: Map<string, ThreadContext>;
	resources: Map<string, Resource>;
	events: Map<string, LockEvent>;
	/** One entry per thread whose contribution was cut short */
	errors: MalformedEventError[];
	anomalies: BuildAnomaly[];
	/** Threads still parked on a resource at the end of the stream */
	blocked: Map<string, string>;
}

//==============================================================================
// Fold State
//==============================================================================

interface Waiter {
	event: LockEvent;
}

interface FoldState {
	rag: ResourceAllocationGraph;
	holder: Map<string, string>;
	/** FIFO pending queue per resource */
	queues: Map<string, Waiter[]>;
	/** Resource each parked thread waits on */
	parked: Map<string, string>;
	/** Events of parked threads, replayed once they are granted */
	deferred: Map<string, LockEvent[]>;
	faulted: Set<string>;
	errors: MalformedEventError[];
	strict: boolean;
}

//==============================================================================
// Graph Builder
//==============================================================================

/**
 * Build a RAG from an event stream.
 *
 * Events are folded in arrival order. An acquire or wait on a resource held
 * by another thread parks the thread behind a `waits-for` edge; its later
 * events are deferred until a release grants it the resource. Releases hand
 * the resource to the earliest waiter.
 *
 * @throws CircwaitError (EmptyEventStream) when there are no events
 * @throws MalformedEventError in strict mode
 */
export function buildGraph(stream: EventStream, options: BuildOptions = {}): BuildResult {
	if (stream.events.length === 0) throw CircwaitError.emptyStream();
	const logger = options.logger ?? console;

	const rag = new ResourceAllocationGraph();
	const { resources, anomalies } = registerResources(stream, rag, logger);
	const threads = collectThreads(stream.events, rag);

	const state: FoldState = {
		rag,
		holder: new Map(),
		queues: new Map(),
		parked: new Map(),
		deferred: new Map(),
		faulted: new Set(),
		errors: [],
		strict: options.strict ?? false,
	};

	for (const event of stream.events) {
		dispatch(state, event);
	}

	return {
		rag,
		threads,
		resources,
		events: new Map(stream.events.map((e) => [e.id, e])),
		errors: state.errors,
		anomalies,
		blocked: new Map(state.parked),
	};
}

export function registerResources(
	stream: EventStream,
	rag: ResourceAllocationGraph,
	logger: Logger,
): { resources: Map<string, Resource>; anomalies: BuildAnomaly[] } {
	const resources = new Map<string, Resource>();
	for (const r of stream.resources) {
		resources.set(r.id, r);
		rag.addResource(r.id, r.kind);
	}
	const checkDeclared = stream.resources.length > 0;
	const anomalies: BuildAnomaly[] = [];

	for (const event of stream.events) {
		if (resources.has(event.resourceId)) continue;
		const kind = checkDeclared ? "unknown" : "mutex";
		resources.set(event.resourceId, { id: event.resourceId, kind });
		rag.addResource(event.resourceId, kind);
		if (checkDeclared) {
			const err = CircwaitError.unknownResource(event.resourceId, event.id);
			logger.warn(`[GraphBuilder] ${err.message}; treating it as a fresh resource`);
			anomalies.push({
				code: "UnknownResourceReference",
				resourceId: event.resourceId,
				eventId: event.id,
				message: err.message,
			});
		}
	}
	return { resources, anomalies };
}

export function collectThreads(events: LockEvent[], rag: ResourceAllocationGraph): Map<string, ThreadContext> {
	const perThread = new Map<string, LockEvent[]>();
	for (const event of events) {
		getOrCreateList(perThread, event.threadId).push(event);
		rag.addThread(event.threadId);
	}
	const threads = new Map<string, ThreadContext>();
	for (const [id, list] of perThread) {
		threads.set(id, { id, events: list });
	}
	return threads;
}

//==============================================================================
// Event Folding
//==============================================================================

function dispatch(state: FoldState, event: LockEvent): void {
	if (state.faulted.has(event.threadId)) return;
	if (state.parked.has(event.threadId)) {
		getOrCreateList(state.deferred, event.threadId).push(event);
		return;
	}
	try {
		apply(state, event);
	} catch (error) {
		if (!(error instanceof MalformedEventError) || state.strict) throw error;
		isolateThread(state, error);
	}
}

function apply(state: FoldState, event: LockEvent): void {
	switch (event.kind) {
	case "acquire":
		applyAcquire(state, event);
		return;
	case "release":
		applyRelease(state, event);
		return;
	case "wait":
		applyWait(state, event);
		return;
	}
}

function applyAcquire(state: FoldState, event: LockEvent): void {
	const current = state.holder.get(event.resourceId);
	if (current === event.threadId) {
		throw new MalformedEventError(event, "reacquire-held");
	}
	if (current === undefined) {
		grant(state, event);
		return;
	}
	park(state, event);
}

function applyWait(state: FoldState, event: LockEvent): void {
	const current = state.holder.get(event.resourceId);
	if (current === undefined || current === event.threadId) return;
	park(state, event);
}

function applyRelease(state: FoldState, event: LockEvent): void {
	if (state.holder.get(event.resourceId) !== event.threadId) {
		throw new MalformedEventError(event, "release-unheld");
	}
	state.holder.delete(event.resourceId);
	state.rag.removeHolds(event.resourceId, event.threadId);
	handOver(state, event.resourceId);
}

function grant(state: FoldState, event: LockEvent): void {
	state.holder.set(event.resourceId, event.threadId);
	state.rag.addHolds(event.resourceId, event.threadId, event.id);
}

function park(state: FoldState, event: LockEvent): void {
	state.parked.set(event.threadId, event.resourceId);
	state.rag.addWaitsFor(event.threadId, event.resourceId, event.id);
	getOrCreateList(state.queues, event.resourceId).push({ event });
}

/**
 * Hand a freed resource to queued waiters in FIFO order. Wait-only waiters
 * are unblocked without taking the resource and the queue keeps draining
 * until an acquirer takes it or the queue empties. Unblocked threads resume
 * only after the grant, so their later acquires queue behind the new holder.
 */
function handOver(state: FoldState, resourceId: string): void {
	const queue = state.queues.get(resourceId);
	const unblocked: string[] = [];
	while (queue && queue.length > 0 && !state.holder.has(resourceId)) {
		const waiter = queue.shift();
		if (!waiter) break;
		const { event } = waiter;
		state.rag.removeWaitsFor(event.threadId, resourceId);
		state.parked.delete(event.threadId);
		if (event.kind === "acquire") grant(state, event);
		unblocked.push(event.threadId);
	}
	for (const threadId of unblocked) {
		resume(state, threadId);
	}
}

/** Replay a thread's deferred events after it is unparked */
function resume(state: FoldState, threadId: string): void {
	const pending = state.deferred.get(threadId);
	if (!pending) return;
	state.deferred.delete(threadId);
	// dispatch re-defers whatever follows a new park
	for (const event of pending) {
		dispatch(state, event);
	}
}

/**
 * Cut a malformed thread's contribution short. Holds it already took stay in
 * the graph; its remaining and deferred events are dropped.
 */
function isolateThread(state: FoldState, error: MalformedEventError): void {
	state.errors.push(error);
	state.faulted.add(error.threadId);
	state.deferred.delete(error.threadId);
}
